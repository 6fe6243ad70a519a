import { Logger } from '@nestjs/common';
import { errorCode, errorMessage, errorName, httpStatusOf } from './errors';

const logger = new Logger('RetryUtil');

export interface RetryOptions {
  /** Maximum number of attempts (including the first). Default: 3 */
  maxAttempts?: number;
  /** Initial delay in ms before the first retry. Default: 200 */
  baseDelayMs?: number;
  /** Maximum delay cap in ms. Default: 5000 */
  maxDelayMs?: number;
  /** Jitter factor (0–1). Default: 0.2 */
  jitterFactor?: number;
  /** Only retry if this returns true for the error. Default: isTransientAwsError */
  retryIf?: (error: unknown) => boolean;
  /** Label for log messages */
  label?: string;
}

/**
 * Transient AWS errors worth retrying.
 * Covers throttling, service-unavailable, and intermittent network issues.
 */
const TRANSIENT_ERROR_CODES = new Set([
  'ThrottlingException',
  'TooManyRequestsException',
  'ProvisionedThroughputExceededException',
  'RequestLimitExceeded',
  'ServiceUnavailable',
  'InternalFailure',
  'InternalServerError',
  'InternalError',
  'Throttling',
  'AWS.SimpleQueueService.RequestThrottled',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'NetworkingError',
  'TimeoutError',
]);

/** Returns true for errors that are likely transient and safe to retry. */
export function isTransientAwsError(error: unknown): boolean {
  if (error === null || error === undefined) return false;
  if (TRANSIENT_ERROR_CODES.has(errorName(error))) return true;

  const code = errorCode(error);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const status = httpStatusOf(error);
  if (status !== undefined && status >= 500 && status < 600) return true;

  const message = errorMessage(error);
  return message.includes('ECONNRESET') || message.includes('ETIMEDOUT');
}

/**
 * Execute an async function with exponential backoff and jitter.
 *
 * ```ts
 * await retryWithBackoff(() => this.jobQueue.publish(job), {
 *   label: 'EnqueueKeygenJob',
 *   retryIf: isTransientAwsError,
 * });
 * ```
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelayMs = 200,
    maxDelayMs = 5_000,
    jitterFactor = 0.2,
    retryIf = isTransientAwsError,
    label = 'operation',
  } = opts;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (attempt >= maxAttempts || !retryIf(error)) {
        throw error;
      }

      const exponentialDelay = Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
      const jitter = exponentialDelay * jitterFactor * Math.random();
      const delay = Math.round(exponentialDelay + jitter);

      logger.warn(
        `[${label}] Attempt ${attempt}/${maxAttempts} failed (${errorName(error)}). ` +
          `Retrying in ${delay}ms...`,
      );

      await sleep(delay);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
