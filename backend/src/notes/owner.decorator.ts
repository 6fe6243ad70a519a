import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';

export const OWNER_HEADER = 'x-owner-id';
export const DEFAULT_OWNER = 'global';

/** Reads the note owner from a raw header value, falling back to the shared owner. */
export function resolveOwner(header: string | string[] | undefined): string {
  const value = Array.isArray(header) ? header[0] : header;
  const owner = value?.trim();
  return owner ? owner : DEFAULT_OWNER;
}

/**
 * Partition owner for the current request, taken from `X-Owner-Id`.
 *
 * @example
 * @Get()
 * findAll(@Owner() owner: string) { ... }
 */
export const Owner = createParamDecorator((_data: unknown, ctx: ExecutionContext): string => {
  const request = ctx.switchToHttp().getRequest<Request>();
  return resolveOwner(request.headers[OWNER_HEADER]);
});
