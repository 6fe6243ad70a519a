/**
 * Worker Lambda Index
 *
 * Each worker is deployed as a separate Lambda function:
 *  - keygen-worker: consumes the request queue and generates key pairs
 *  - dead-letter:   reports jobs that exhausted their deliveries
 */

export { handler as keygenWorkerHandler } from './keygen-worker.handler';
export { handler as deadLetterHandler } from './dead-letter.handler';
