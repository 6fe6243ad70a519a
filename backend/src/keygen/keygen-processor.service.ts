import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { CloudWatchMetricsService } from '../common/metrics/cloudwatch-metrics.service';
import { errorMessage } from '../common/utils/errors';
import { JobMessage, KeySpec, parseJobMessage, resolveKeySpec } from './job-spec';
import { JobStatus } from './job-status';
import { JobValidationError, MalformedJobMessageError, PermanentProcessingError, TransientInfrastructureError } from './keygen.errors';
import { KeygenSettings, readKeygenSettings } from './keygen.settings';
import { KeyMaterialService, classifyGenerationError } from './key-material.service';
import { KeyMaterial } from './result-store/result-record';
import { FailRequest, ResultStore } from './result-store/result-store';

export type ProcessingOutcome = 'completed' | 'failed' | 'duplicate' | 'discarded';

export interface DeliveryInfo {
  messageId: string;
  /** 1 on first delivery. */
  receiveCount: number;
}

function specLabel(spec: KeySpec): string {
  return spec.key_bits === null ? spec.key_type : `${spec.key_type}-${spec.key_bits}`;
}

/**
 * Worker Processor.
 *
 * Runs one queue message through `submitted → pending → complete | error`.
 * Resolves when the message should be acknowledged; rejects with a
 * TransientInfrastructureError when it should be redelivered.
 */
@Injectable()
export class KeygenProcessorService {
  private readonly logger = new Logger(KeygenProcessorService.name);
  private readonly settings: KeygenSettings;

  constructor(
    private readonly resultStore: ResultStore,
    private readonly keyMaterial: KeyMaterialService,
    private readonly metrics: CloudWatchMetricsService,
    configService: ConfigService,
  ) {
    this.settings = readKeygenSettings(configService);
  }

  async process(body: string, delivery: DeliveryInfo): Promise<ProcessingOutcome> {
    let message: JobMessage;
    try {
      message = parseJobMessage(body);
    } catch (error: unknown) {
      if (!(error instanceof MalformedJobMessageError)) throw error;
      this.logger.error(`Discarding message ${delivery.messageId}: ${error.message}`);
      await this.metrics.recordJobEvent('JobDiscarded');
      return 'discarded';
    }

    const requestId = message.request_id;

    let spec: KeySpec;
    try {
      spec = resolveKeySpec(message);
    } catch (error: unknown) {
      if (!(error instanceof JobValidationError)) throw error;
      this.logger.warn(`[${requestId}] Rejected at processing time: ${error.message}`);
      return this.recordFailure({ requestId, errorMessage: error.message, claimToken: null });
    }

    const claimToken = uuidv4();
    const claim = await this.storeCall('claim', requestId, () =>
      this.resultStore.claim({
        requestId,
        claimToken,
        leaseSeconds: this.settings.visibilityTimeoutSeconds,
      }),
    );

    if (!claim.claimed) {
      if (claim.current?.status === JobStatus.PENDING) {
        // SQS may redeliver before the previous delivery's lease lapses
        throw new TransientInfrastructureError(
          `[${requestId}] Lease held until ${claim.current.lease_expires_at} ` +
            `(delivery ${delivery.receiveCount}); returning message to the queue`,
        );
      }
      this.logger.log(
        `[${requestId}] Duplicate delivery ignored (delivery ${delivery.receiveCount}, ` +
          `status ${claim.current?.status ?? 'missing'})`,
      );
      await this.metrics.recordJobEvent('DuplicateDelivery', spec.key_type);
      return 'duplicate';
    }

    this.logger.log(`[${requestId}] Generating ${specLabel(spec)} key pair (delivery ${delivery.receiveCount})`);

    let material: KeyMaterial;
    const startedAt = Date.now();
    try {
      material = await this.keyMaterial.generate(spec);
    } catch (error: unknown) {
      const classified = classifyGenerationError(error);
      if (classified instanceof PermanentProcessingError) {
        this.logger.warn(`[${requestId}] ${classified.message}`);
        return this.recordFailure({ requestId, errorMessage: classified.message, claimToken }, spec);
      }
      await this.releaseClaim(requestId, claimToken);
      throw classified;
    }
    await this.metrics.recordGenerationDuration(spec.key_type, spec.key_bits, Date.now() - startedAt);

    const written = await this.storeCall('complete', requestId, () =>
      this.resultStore.complete({ requestId, claimToken, material }),
    );

    if (!written) {
      this.logger.warn(`[${requestId}] Lease lost before completion; generated keys discarded`);
      await this.metrics.recordJobEvent('DuplicateDelivery', spec.key_type);
      return 'duplicate';
    }

    this.logger.log(`[${requestId}] Completed in ${Date.now() - startedAt}ms`);
    await this.metrics.recordJobEvent('JobCompleted', spec.key_type);
    return 'completed';
  }

  private async recordFailure(request: FailRequest, spec?: KeySpec): Promise<ProcessingOutcome> {
    const written = await this.storeCall('fail', request.requestId, () => this.resultStore.fail(request));

    if (!written) {
      this.logger.log(`[${request.requestId}] Failure not recorded; job already moved on`);
      await this.metrics.recordJobEvent('DuplicateDelivery', spec?.key_type);
      return 'duplicate';
    }

    await this.metrics.recordJobEvent('JobFailed', spec?.key_type);
    return 'failed';
  }

  /** Hands the lease back after a transient failure so the redelivery need not wait it out. */
  private async releaseClaim(requestId: string, claimToken: string): Promise<void> {
    try {
      await this.resultStore.release(requestId, claimToken);
    } catch (error: unknown) {
      this.logger.warn(`[${requestId}] Could not release lease; it lapses on its own: ${errorMessage(error)}`);
    }
  }

  private async storeCall<T>(operation: string, requestId: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      throw new TransientInfrastructureError(
        `[${requestId}] Result store ${operation} failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
