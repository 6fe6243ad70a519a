import { Logger } from '@nestjs/common';
import { SQSBatchItemFailure, SQSBatchResponse, SQSEvent } from 'aws-lambda';
import { KeygenProcessorService } from '../keygen/keygen-processor.service';
import { errorMessage } from '../common/utils/errors';

const logger = new Logger('KeygenWorker');

/**
 * Runs every record of a request-queue batch through the processor and
 * collects the ones that should be redelivered.
 */
export async function processBatch(
  event: SQSEvent,
  processor: KeygenProcessorService,
  maxReceiveCount: number,
): Promise<SQSBatchResponse> {
  const batchItemFailures: SQSBatchItemFailure[] = [];

  await Promise.all(
    event.Records.map(async (record) => {
      const receiveCount = Number(record.attributes.ApproximateReceiveCount) || 1;

      try {
        const outcome = await processor.process(record.body, {
          messageId: record.messageId,
          receiveCount,
        });
        logger.debug(`Message ${record.messageId} acknowledged (${outcome})`);
      } catch (error: unknown) {
        batchItemFailures.push({ itemIdentifier: record.messageId });

        if (receiveCount >= maxReceiveCount) {
          logger.error(
            `Message ${record.messageId} failed on delivery ${receiveCount}/${maxReceiveCount} ` +
              `and will be dead-lettered: ${errorMessage(error)}`,
          );
        } else {
          logger.warn(
            `Message ${record.messageId} failed on delivery ${receiveCount}/${maxReceiveCount}; ` +
              `queued for redelivery: ${errorMessage(error)}`,
          );
        }
      }
    }),
  );

  return { batchItemFailures };
}
