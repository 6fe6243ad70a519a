import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { DynamoDBService } from '../dynamodb/dynamodb.service';
import { SqsService } from '../queue/sqs.service';
import { HealthController } from './health.controller';

const mockDynamoDb = {
  isConfigured: jest.fn(),
  getTableName: jest.fn(),
  get: jest.fn(),
};

const mockSqs = {
  getQueueSettings: jest.fn(),
};

describe('HealthController', () => {
  let controller: HealthController;

  beforeEach(async () => {
    jest.resetAllMocks();
    mockDynamoDb.isConfigured.mockReturnValue(true);
    mockDynamoDb.getTableName.mockReturnValue('keygen-results-test');
    mockDynamoDb.get.mockResolvedValue({});
    mockSqs.getQueueSettings.mockResolvedValue({ visibilityTimeoutSeconds: 120, maxReceiveCount: 5 });

    const module = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: DynamoDBService, useValue: mockDynamoDb },
        { provide: SqsService, useValue: mockSqs },
        {
          provide: ConfigService,
          useValue: new ConfigService({ QUEUE_VISIBILITY_TIMEOUT_SECONDS: 120, QUEUE_MAX_RECEIVE_COUNT: 5 }),
        },
      ],
    }).compile();
    controller = module.get(HealthController);
  });

  it('GET /health → ok with the results table', () => {
    expect(controller.basicHealth()).toMatchObject({ status: 'ok', resultsTable: 'keygen-results-test' });
  });

  it('GET /health/dependencies → healthy when store and queue check out', async () => {
    const report = await controller.dependencies();

    expect(report.status).toBe('healthy');
    expect(report.checks.result_store.status).toBe('pass');
    expect(report.checks.request_queue).toMatchObject({
      status: 'pass',
      message: 'Request queue reachable and configured',
    });
    expect(mockDynamoDb.get).toHaveBeenCalledWith('results', { Key: { request_id: 'HEALTH_CHECK' } });
  });

  it('flags a queue whose settings drifted from configuration', async () => {
    mockSqs.getQueueSettings.mockResolvedValue({ visibilityTimeoutSeconds: 30 });

    const report = await controller.dependencies();

    expect(report.status).toBe('degraded');
    expect(report.checks.request_queue).toMatchObject({
      status: 'fail',
      message: 'VisibilityTimeout is 30, expected 120; maxReceiveCount is unset (no redrive policy), expected 5',
    });
  });

  it('flags a missing results table', async () => {
    const error = new Error('Requested resource not found');
    error.name = 'ResourceNotFoundException';
    mockDynamoDb.get.mockRejectedValue(error);

    const report = await controller.dependencies();

    expect(report.status).toBe('degraded');
    expect(report.checks.result_store).toMatchObject({
      status: 'fail',
      message: 'Table not found: Requested resource not found',
    });
  });

  it('flags an unreachable queue', async () => {
    mockSqs.getQueueSettings.mockRejectedValue(new Error('REQUEST_QUEUE_URL environment variable is required'));

    const report = await controller.dependencies();

    expect(report.checks.request_queue).toMatchObject({
      status: 'fail',
      message: 'Request queue unreachable: REQUEST_QUEUE_URL environment variable is required',
    });
  });
});
