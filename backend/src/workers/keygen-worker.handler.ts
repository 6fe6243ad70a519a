/**
 * Keygen Worker Lambda
 *
 * Triggered by the request queue's event source mapping with
 * ReportBatchItemFailures enabled. Each record runs through the
 * KeygenProcessorService; only records that failed transiently are reported
 * back, so SQS redelivers those after the visibility timeout and dead-letters
 * them once maxReceiveCount is reached.
 */

import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Context, SQSBatchResponse, SQSEvent } from 'aws-lambda';
import { WorkerModule } from '../worker.module';
import { KeygenProcessorService } from '../keygen/keygen-processor.service';
import { readKeygenSettings } from '../keygen/keygen.settings';
import { processBatch } from './keygen-batch';

const logger = new Logger('KeygenWorker');

let cachedApp: INestApplicationContext | undefined;

async function getApp(): Promise<INestApplicationContext> {
  if (!cachedApp) {
    cachedApp = await NestFactory.createApplicationContext(WorkerModule);
  }
  return cachedApp;
}

export const handler = async (event: SQSEvent, context: Context): Promise<SQSBatchResponse> => {
  // Keep SDK connections alive between warm invocations
  context.callbackWaitsForEmptyEventLoop = false;

  logger.log(`Received ${event.Records.length} message(s)`);

  const app = await getApp();
  const settings = readKeygenSettings(app.get(ConfigService));
  const response = await processBatch(event, app.get(KeygenProcessorService), settings.maxReceiveCount);

  logger.log(
    `Batch done: ${event.Records.length - response.batchItemFailures.length} acknowledged, ` +
      `${response.batchItemFailures.length} returned for redelivery`,
  );
  return response;
};
