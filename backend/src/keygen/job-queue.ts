import { Injectable } from '@nestjs/common';
import { SqsService } from '../common/queue/sqs.service';
import { JobRequest } from './job-spec';

/** Durable, at-least-once channel of key generation jobs. */
export abstract class JobQueue {
  /** Publishes one job; resolves with the queue's message id. */
  abstract publish(job: JobRequest): Promise<string | undefined>;
}

@Injectable()
export class SqsJobQueue extends JobQueue {
  constructor(private readonly sqs: SqsService) {
    super();
  }

  async publish(job: JobRequest): Promise<string | undefined> {
    return this.sqs.sendJson(job, { request_id: job.request_id });
  }
}
