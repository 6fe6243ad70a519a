/**
 * Dead-Letter Reporter Lambda
 *
 * Drains the request queue's dead-letter queue. Every message that exhausted
 * its deliveries is reported with the current state of its result record
 * (usually still `pending` or `submitted`). Records are never modified here;
 * they expire through TTL unless an operator resubmits the job.
 */

import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Context, SQSEvent } from 'aws-lambda';
import { WorkerModule } from '../worker.module';
import { CloudWatchMetricsService } from '../common/metrics/cloudwatch-metrics.service';
import { ResultStore } from '../keygen/result-store/result-store';
import { reportDeadLetters } from './dead-letter-report';

const logger = new Logger('DeadLetterReporter');

let cachedApp: INestApplicationContext | undefined;

async function getApp(): Promise<INestApplicationContext> {
  if (!cachedApp) {
    cachedApp = await NestFactory.createApplicationContext(WorkerModule);
  }
  return cachedApp;
}

export const handler = async (event: SQSEvent, context: Context): Promise<void> => {
  context.callbackWaitsForEmptyEventLoop = false;

  const app = await getApp();
  const reports = await reportDeadLetters(event, app.get(ResultStore), app.get(CloudWatchMetricsService));
  logger.log(`Reported ${reports.length} dead-lettered job(s)`);
};
