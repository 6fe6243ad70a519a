import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CloudWatchClient,
  PutMetricDataCommand,
  MetricDatum,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import { errorMessage } from '../utils/errors';

export interface MetricDimension {
  Name: string;
  Value: string;
}

export interface MetricOptions {
  metricName: string;
  value: number;
  unit?: StandardUnit;
  dimensions?: MetricDimension[];
  timestamp?: Date;
}

/** Lifecycle events of a key generation job. */
export type JobMetricEvent =
  | 'JobSubmitted'
  | 'JobCompleted'
  | 'JobFailed'
  | 'DuplicateDelivery'
  | 'JobDiscarded'
  | 'JobDeadLettered';

/**
 * CloudWatchMetricsService
 *
 * Emits custom application metrics to CloudWatch under a configurable
 * namespace.
 *
 *  - Emissions never throw into the caller; failures are logged
 *  - Environment is always added as a dimension
 *  - Disabled entirely with CLOUDWATCH_METRICS_ENABLED=false (local dev, tests)
 */
@Injectable()
export class CloudWatchMetricsService {
  private readonly logger = new Logger(CloudWatchMetricsService.name);
  private readonly client: CloudWatchClient | null = null;

  private readonly namespace: string;
  private readonly environment: string;
  private readonly isEnabled: boolean;

  constructor(private readonly configService: ConfigService) {
    const enabled = this.configService.get<boolean | string>('CLOUDWATCH_METRICS_ENABLED', true);
    this.isEnabled = enabled === true || enabled === 'true';

    const projectName = this.configService.get<string>('PROJECT_NAME', 'serverless-demos');
    this.environment = this.configService.get<string>('NODE_ENV', 'dev');
    this.namespace = this.configService.get<string>(
      'CLOUDWATCH_METRICS_NAMESPACE',
      `${projectName}/Keygen`,
    );

    if (this.isEnabled) {
      const region = this.configService.get<string>('AWS_REGION', 'us-east-1');
      this.client = new CloudWatchClient({ region });
      this.logger.log(
        `CloudWatch metrics enabled (namespace: ${this.namespace}, env: ${this.environment})`,
      );
    } else {
      this.logger.log('CloudWatch metrics disabled');
    }
  }

  /** Emits one data point with the Environment dimension added. */
  async putMetric(options: MetricOptions): Promise<void> {
    if (!this.isEnabled || !this.client) {
      return;
    }

    const datum: MetricDatum = {
      MetricName: options.metricName,
      Value: options.value,
      Unit: options.unit ?? StandardUnit.Count,
      Timestamp: options.timestamp ?? new Date(),
      Dimensions: [{ Name: 'Environment', Value: this.environment }, ...(options.dimensions ?? [])],
    };

    try {
      await this.client.send(new PutMetricDataCommand({ Namespace: this.namespace, MetricData: [datum] }));
      this.logger.debug(`Emitted ${options.metricName} to ${this.namespace}`);
    } catch (error: unknown) {
      this.logger.error(`Failed to emit CloudWatch metric ${options.metricName}: ${errorMessage(error)}`);
    }
  }

  // ─── JOB LIFECYCLE ──────────────────────────────────────────────────────

  /** Counts one job lifecycle event, dimensioned by key type when known. */
  async recordJobEvent(event: JobMetricEvent, keyType?: string): Promise<void> {
    await this.putMetric({
      metricName: event,
      value: 1,
      dimensions: keyType ? [{ Name: 'KeyType', Value: keyType }] : [],
    });
  }

  /** Wall-clock time spent inside the key generator. */
  async recordGenerationDuration(keyType: string, keyBits: number | null, durationMs: number): Promise<void> {
    await this.putMetric({
      metricName: 'GenerationDuration',
      value: durationMs,
      unit: StandardUnit.Milliseconds,
      dimensions: [
        { Name: 'KeyType', Value: keyType },
        { Name: 'KeyBits', Value: keyBits === null ? 'fixed' : String(keyBits) },
      ],
    });
  }
}
