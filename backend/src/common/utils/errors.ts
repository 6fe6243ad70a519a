/**
 * Helpers for reading fields off values caught as `unknown`.
 *
 * AWS SDK v3 exceptions carry their code in `name`, Node system errors in
 * `code`, and both may carry `$metadata.httpStatusCode`.
 */

function field(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null || !(key in error)) {
    return undefined;
  }
  return Reflect.get(error, key);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return JSON.stringify(error) ?? String(error);
}

export function errorName(error: unknown): string {
  const name = field(error, 'name');
  return typeof name === 'string' ? name : 'Error';
}

export function errorCode(error: unknown): string | undefined {
  const code = field(error, 'code') ?? field(error, 'Code');
  return typeof code === 'string' ? code : undefined;
}

export function httpStatusOf(error: unknown): number | undefined {
  const status = field(field(error, '$metadata'), 'httpStatusCode') ?? field(error, 'statusCode');
  return typeof status === 'number' ? status : undefined;
}

/** True when a DynamoDB conditional write was rejected by its ConditionExpression. */
export function isConditionalCheckFailure(error: unknown): boolean {
  return errorName(error) === 'ConditionalCheckFailedException';
}
