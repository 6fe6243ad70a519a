import { plainToInstance, Transform, Type } from 'class-transformer';
import { IsBoolean, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, IsUrl, Max, Min, validateSync } from 'class-validator';

/**
 * Environment contract for the API and worker Lambdas.
 * Defaults apply when a variable is absent.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['dev', 'development', 'local', 'test', 'staging', 'production'])
  NODE_ENV = 'dev';

  @IsString()
  @IsNotEmpty()
  AWS_REGION = 'us-east-1';

  @IsString()
  @IsNotEmpty()
  PROJECT_NAME = 'serverless-demos';

  @IsString()
  @IsNotEmpty()
  RESULTS_TABLE_NAME!: string;

  @IsOptional()
  @IsString()
  NOTES_TABLE_NAME?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  REQUEST_QUEUE_URL?: string;

  /** Lifetime of a result record, applied as the DynamoDB TTL attribute. */
  @Type(() => Number)
  @IsInt()
  @Min(60)
  @Max(60 * 60 * 24 * 30)
  RESULT_TTL_SECONDS = 3600;

  /** Must equal the request queue's VisibilityTimeout. */
  @Type(() => Number)
  @IsInt()
  @Min(10)
  @Max(43_200)
  QUEUE_VISIBILITY_TIMEOUT_SECONDS = 120;

  /** Must equal maxReceiveCount in the request queue's redrive policy. */
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  QUEUE_MAX_RECEIVE_COUNT = 5;

  @Transform(({ obj }) => {
    const raw: unknown = obj.CLOUDWATCH_METRICS_ENABLED;
    return raw === undefined || raw === true || raw === 'true';
  })
  @IsBoolean()
  CLOUDWATCH_METRICS_ENABLED = true;

  @IsOptional()
  @IsString()
  CLOUDWATCH_METRICS_NAMESPACE?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  DYNAMODB_ENDPOINT?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  SQS_ENDPOINT?: string;

  @Type(() => Number)
  @IsInt()
  PORT = 3001;

  @IsOptional()
  @IsString()
  CORS_ALLOWED_ORIGINS?: string;
}

/** Passed to ConfigModule.forRoot({ validate }); startup fails on invalid values. */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
