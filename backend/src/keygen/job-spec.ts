import { JobValidationError, MalformedJobMessageError } from './keygen.errors';

export const KEY_TYPES = ['rsa', 'ed25519'] as const;
export type KeyType = (typeof KEY_TYPES)[number];

export const RSA_KEY_SIZES = [2048, 4096] as const;
export type RsaKeyBits = (typeof RSA_KEY_SIZES)[number];

export const DEFAULT_KEY_TYPE: KeyType = 'rsa';
export const DEFAULT_RSA_KEY_BITS: RsaKeyBits = 2048;

/** A fully resolved key specification. `key_bits` is null for fixed-size key types. */
export type KeySpec =
  | { key_type: 'rsa'; key_bits: RsaKeyBits }
  | { key_type: 'ed25519'; key_bits: null };

/** Queue message payload. Immutable once enqueued. */
export type JobRequest = { request_id: string } & KeySpec;

export interface KeySpecInput {
  key_type?: unknown;
  key_bits?: unknown;
}

export function isKeyType(value: unknown): value is KeyType {
  return KEY_TYPES.some((type) => type === value);
}

export function isRsaKeyBits(value: unknown): value is RsaKeyBits {
  return RSA_KEY_SIZES.some((bits) => bits === value);
}

/**
 * Applies defaults and checks the (key_type, key_bits) combination.
 * Used at submission and again by the worker before generating.
 */
export function resolveKeySpec(input: KeySpecInput): KeySpec {
  const keyType = input.key_type ?? DEFAULT_KEY_TYPE;
  if (!isKeyType(keyType)) {
    throw new JobValidationError(
      `key_type must be one of ${KEY_TYPES.join(', ')} (got ${JSON.stringify(keyType)})`,
    );
  }

  if (keyType === 'ed25519') {
    return { key_type: 'ed25519', key_bits: null };
  }

  const keyBits = input.key_bits ?? DEFAULT_RSA_KEY_BITS;
  if (!isRsaKeyBits(keyBits)) {
    throw new JobValidationError(
      `key_bits must be one of ${RSA_KEY_SIZES.join(', ')} for rsa (got ${JSON.stringify(keyBits)})`,
    );
  }

  return { key_type: 'rsa', key_bits: keyBits };
}

/** An unvalidated queue message: only the request id is guaranteed. */
export interface JobMessage extends KeySpecInput {
  request_id: string;
}

export function parseJobMessage(body: string): JobMessage {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    throw new MalformedJobMessageError('Message body is not valid JSON');
  }

  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new MalformedJobMessageError('Message body must be a JSON object');
  }

  const requestId: unknown = Reflect.get(payload, 'request_id');
  if (typeof requestId !== 'string' || requestId.trim() === '') {
    throw new MalformedJobMessageError('Message body has no request_id');
  }

  return {
    request_id: requestId,
    key_type: Reflect.get(payload, 'key_type'),
    key_bits: Reflect.get(payload, 'key_bits'),
  };
}

export function toJobRequest(requestId: string, spec: KeySpec): JobRequest {
  return { request_id: requestId, ...spec };
}
