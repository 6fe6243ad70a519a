import { Logger } from '@nestjs/common';
import { SQSEvent } from 'aws-lambda';
import { CloudWatchMetricsService } from '../common/metrics/cloudwatch-metrics.service';
import { errorMessage } from '../common/utils/errors';
import { parseJobMessage } from '../keygen/job-spec';
import { MalformedJobMessageError } from '../keygen/keygen.errors';
import { ResultStore } from '../keygen/result-store/result-store';

const logger = new Logger('DeadLetterReporter');

export interface DeadLetterReport {
  messageId: string;
  requestId: string | null;
  receiveCount: number;
  /** Current record status; `missing` when gone, `unknown` when it could not be read. */
  status: string;
}

function requestIdOf(body: string): string | null {
  try {
    return parseJobMessage(body).request_id;
  } catch (error: unknown) {
    if (error instanceof MalformedJobMessageError) return null;
    throw error;
  }
}

export async function reportDeadLetters(
  event: SQSEvent,
  resultStore: ResultStore,
  metrics: CloudWatchMetricsService,
): Promise<DeadLetterReport[]> {
  const reports: DeadLetterReport[] = [];

  for (const record of event.Records) {
    const requestId = requestIdOf(record.body);
    let status = 'missing';
    let keyType: string | undefined;

    if (requestId) {
      try {
        const current = await resultStore.get(requestId);
        if (current) {
          status = current.status;
          keyType = current.key_type;
        }
      } catch (error: unknown) {
        status = 'unknown';
        logger.warn(`[${requestId}] Could not read result record: ${errorMessage(error)}`);
      }
    }

    const report: DeadLetterReport = {
      messageId: record.messageId,
      requestId,
      receiveCount: Number(record.attributes.ApproximateReceiveCount) || 0,
      status,
    };

    logger.error(JSON.stringify({ metric: 'KeygenJobDeadLettered', ...report }));
    await metrics.recordJobEvent('JobDeadLettered', keyType);
    reports.push(report);
  }

  return reports;
}
