import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnvironment } from './common/config/env.validation';
import { DynamoDBModule } from './common/dynamodb/dynamodb.module';
import { MetricsModule } from './common/metrics/metrics.module';
import { KeygenCoreModule } from './keygen/keygen-core.module';

/** Application context for the queue-triggered Lambdas (no HTTP layer). */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateEnvironment,
    }),
    DynamoDBModule,
    MetricsModule,
    KeygenCoreModule,
  ],
})
export class WorkerModule {}
