import { Controller, Get, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DynamoDBService } from '../dynamodb/dynamodb.service';
import { SqsService } from '../queue/sqs.service';
import { errorMessage, errorName } from '../utils/errors';
import { readKeygenSettings } from '../../keygen/keygen.settings';

export interface CheckResult {
  status: 'pass' | 'fail';
  message: string;
  duration_ms: number;
}

export interface DependencyReport {
  status: 'healthy' | 'degraded';
  timestamp: string;
  checks: Record<string, CheckResult>;
}

@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly dynamoDb: DynamoDBService,
    private readonly sqs: SqsService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Basic liveness check
   */
  @Get()
  basicHealth() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      resultsTable: this.dynamoDb.isConfigured('results') ? this.dynamoDb.getTableName('results') : null,
    };
  }

  /**
   * Dependency diagnostics: Result Store reachability and whether the request
   * queue is configured the way the worker expects.
   *
   * GET /health/dependencies
   */
  @Get('dependencies')
  async dependencies(): Promise<DependencyReport> {
    this.logger.log('Running dependency diagnostics');

    const checks: Record<string, CheckResult> = {
      result_store: await this.checkResultStore(),
      request_queue: await this.checkRequestQueue(),
    };

    const allPassed = Object.values(checks).every((c) => c.status === 'pass');

    return {
      status: allPassed ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      checks,
    };
  }

  private async checkResultStore(): Promise<CheckResult> {
    const start = Date.now();
    try {
      // Point read of a key that never exists; only reachability matters
      await this.dynamoDb.get('results', {
        Key: { request_id: 'HEALTH_CHECK' },
      });
      return {
        status: 'pass',
        message: 'Result Store reachable',
        duration_ms: Date.now() - start,
      };
    } catch (error: unknown) {
      const message =
        errorName(error) === 'ResourceNotFoundException'
          ? `Table not found: ${errorMessage(error)}`
          : `Result Store unreachable: ${errorMessage(error)}`;
      return { status: 'fail', message, duration_ms: Date.now() - start };
    }
  }

  private async checkRequestQueue(): Promise<CheckResult> {
    const start = Date.now();
    const expected = readKeygenSettings(this.configService);

    try {
      const actual = await this.sqs.getQueueSettings();
      const mismatches: string[] = [];

      if (actual.visibilityTimeoutSeconds !== expected.visibilityTimeoutSeconds) {
        mismatches.push(
          `VisibilityTimeout is ${actual.visibilityTimeoutSeconds ?? 'unset'}, expected ${expected.visibilityTimeoutSeconds}`,
        );
      }
      if (actual.maxReceiveCount !== expected.maxReceiveCount) {
        mismatches.push(
          `maxReceiveCount is ${actual.maxReceiveCount ?? 'unset (no redrive policy)'}, expected ${expected.maxReceiveCount}`,
        );
      }

      return {
        status: mismatches.length === 0 ? 'pass' : 'fail',
        message: mismatches.length === 0 ? 'Request queue reachable and configured' : mismatches.join('; '),
        duration_ms: Date.now() - start,
      };
    } catch (error: unknown) {
      return {
        status: 'fail',
        message: `Request queue unreachable: ${errorMessage(error)}`,
        duration_ms: Date.now() - start,
      };
    }
  }
}
