import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnvironment } from './common/config/env.validation';
import { DynamoDBModule } from './common/dynamodb/dynamodb.module';
import { QueueModule } from './common/queue/queue.module';
import { MetricsModule } from './common/metrics/metrics.module';
import { HealthModule } from './common/health/health.module';
import { KeygenModule } from './keygen/keygen.module';
import { NotesModule } from './notes/notes.module';

@Module({
  imports: [
    // Load and validate environment variables
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateEnvironment,
    }),

    // CloudWatch custom metrics (global, for operational visibility)
    MetricsModule,

    // DynamoDB connection
    DynamoDBModule,

    // Request queue
    QueueModule,

    // Feature modules
    KeygenModule,
    NotesModule,
    HealthModule,
  ],
})
export class AppModule {}
