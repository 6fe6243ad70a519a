import { BadRequestException, NotFoundException } from '@nestjs/common';

/** Client input cannot describe a valid key. Surfaces as 400. */
export class JobValidationError extends BadRequestException {
  constructor(message: string) {
    super({ message, code: 'VALIDATION_ERROR' });
  }
}

/** No live record for the request id: never submitted, or expired. Surfaces as 404. */
export class ResultNotFoundError extends NotFoundException {
  constructor(requestId: string) {
    super({ message: `No result found for request ${requestId}`, code: 'NOT_FOUND' });
  }
}

/** Retrying cannot help; the job is recorded as `error` and the message acknowledged. */
export class PermanentProcessingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PermanentProcessingError';
  }
}

/** The queue should redeliver the message; nothing terminal is recorded. */
export class TransientInfrastructureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientInfrastructureError';
  }
}

/** A queue message that does not name a request and so cannot be recorded anywhere. */
export class MalformedJobMessageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedJobMessageError';
  }
}
