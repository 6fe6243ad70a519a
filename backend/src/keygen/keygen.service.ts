import {
  Injectable,
  InternalServerErrorException,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { CloudWatchMetricsService } from '../common/metrics/cloudwatch-metrics.service';
import { errorMessage } from '../common/utils/errors';
import { retryWithBackoff, isTransientAwsError } from '../common/utils/retry';
import { CreateKeygenRequestDto } from './dto/create-keygen-request.dto';
import { KeygenResultDto, KeygenSubmissionDto, toKeygenResultDto } from './dto/keygen-result.dto';
import { JobQueue } from './job-queue';
import { KeySpec, resolveKeySpec, toJobRequest } from './job-spec';
import { JobStatus } from './job-status';
import { ResultNotFoundError } from './keygen.errors';
import { KeygenSettings, readKeygenSettings } from './keygen.settings';
import { SubmittedRecord, buildSubmittedRecord } from './result-store/result-record';
import { ResultStore } from './result-store/result-store';

/** Fresh ids tried before giving up on a create-if-absent collision. */
const MAX_ID_ATTEMPTS = 3;

/**
 * Submission and Result handlers.
 *
 * Submission writes the `submitted` record, then publishes the job. The two
 * calls are not transactional: when publishing fails the record stays
 * `submitted` until it expires, and the caller is told to submit again.
 */
@Injectable()
export class KeygenService {
  private readonly logger = new Logger(KeygenService.name);
  private readonly settings: KeygenSettings;

  constructor(
    private readonly resultStore: ResultStore,
    private readonly jobQueue: JobQueue,
    private readonly metrics: CloudWatchMetricsService,
    configService: ConfigService,
  ) {
    this.settings = readKeygenSettings(configService);
  }

  async submit(dto: CreateKeygenRequestDto): Promise<KeygenSubmissionDto> {
    const spec = resolveKeySpec(dto);
    const record = await this.createRecord(spec);
    const requestId = record.request_id;

    try {
      const messageId = await retryWithBackoff(() => this.jobQueue.publish(toJobRequest(requestId, spec)), {
        label: 'EnqueueKeygenJob',
        retryIf: isTransientAwsError,
      });
      this.logger.log(`[${requestId}] Queued ${spec.key_type} job (message ${messageId ?? 'unknown'})`);
    } catch (error: unknown) {
      this.logger.error(
        `[${requestId}] Record written but job not queued; left in submitted state: ${errorMessage(error)}`,
      );
      throw new ServiceUnavailableException({
        message: `Request ${requestId} could not be queued; submit the job again`,
        code: 'ENQUEUE_FAILED',
      });
    }

    await this.metrics.recordJobEvent('JobSubmitted', spec.key_type);
    return { request_id: requestId, status: JobStatus.SUBMITTED };
  }

  async getResult(requestId: string): Promise<KeygenResultDto> {
    const record = await this.resultStore.get(requestId);
    if (!record) {
      throw new ResultNotFoundError(requestId);
    }
    return toKeygenResultDto(record);
  }

  private async createRecord(spec: KeySpec): Promise<SubmittedRecord> {
    for (let attempt = 1; attempt <= MAX_ID_ATTEMPTS; attempt++) {
      const record = buildSubmittedRecord(uuidv4(), spec, Date.now(), this.settings.resultTtlSeconds);

      const created = await retryWithBackoff(() => this.resultStore.create(record), {
        label: 'CreateResultRecord',
        retryIf: isTransientAwsError,
      });
      if (created) {
        return record;
      }

      this.logger.warn(`Request id collision on ${record.request_id} (attempt ${attempt}/${MAX_ID_ATTEMPTS})`);
    }

    throw new InternalServerErrorException({
      message: 'Could not allocate a unique request id',
      code: 'INTERNAL_ERROR',
    });
  }
}
