import 'reflect-metadata';
import { INestApplication, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import serverlessExpress from '@vendia/serverless-express';
import { Handler } from 'aws-lambda';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { createValidationPipe } from './common/pipes/validation.pipe';
import { errorMessage } from './common/utils/errors';

const logger = new Logger('Bootstrap');

let cachedServer: Handler | undefined;

/** Settings shared by the Lambda and the local server. */
export function configureApp(app: INestApplication): void {
  const origins = app.get(ConfigService).get<string>('CORS_ALLOWED_ORIGINS');
  const allowedOrigins = origins
    ? origins.split(',').map((o) => o.trim())
    : ['http://localhost:5173', 'http://localhost:3000'];

  app.enableCors({
    origin: allowedOrigins,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Owner-Id', 'X-Amz-Date', 'X-Api-Key'],
  });

  // Global validation pipe
  app.useGlobalPipes(createValidationPipe());

  // Global exception filter for consistent error responses
  app.useGlobalFilters(new HttpExceptionFilter());
}

async function bootstrapServer(): Promise<Handler> {
  const app = await NestFactory.create(AppModule);
  configureApp(app);

  await app.init();
  const expressApp = app.getHttpAdapter().getInstance();
  return serverlessExpress({ app: expressApp });
}

// Lambda handler
export const handler: Handler = async (event, context, callback) => {
  if (!cachedServer) {
    cachedServer = await bootstrapServer();
  }
  return cachedServer(event, context, callback);
};

// Local development
async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  configureApp(app);

  const port = app.get(ConfigService).get<number>('PORT', 3001);
  await app.listen(port);
  logger.log(`Application is running on: http://localhost:${port}`);
}

if (require.main === module && !process.env.AWS_LAMBDA_FUNCTION_NAME) {
  bootstrap().catch((error: unknown) => {
    logger.error(`Failed to start: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
}
