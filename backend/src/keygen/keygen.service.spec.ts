import { InternalServerErrorException, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { CloudWatchMetricsService } from '../common/metrics/cloudwatch-metrics.service';
import { InMemoryJobQueue } from './__tests__/support/in-memory-job-queue';
import { InMemoryResultStore } from './__tests__/support/in-memory-result-store';
import { silentMetrics, testConfig } from './__tests__/support/test-config';
import { JobQueue } from './job-queue';
import { JobStatus } from './job-status';
import { JobValidationError, ResultNotFoundError } from './keygen.errors';
import { KeygenService } from './keygen.service';
import { ResultStore } from './result-store/result-store';
import { buildSubmittedRecord } from './result-store/result-record';

const NOW_MS = 1_700_000_000_000;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('KeygenService', () => {
  let service: KeygenService;
  let store: InMemoryResultStore;
  let queue: InMemoryJobQueue;
  let metrics: CloudWatchMetricsService;

  beforeEach(async () => {
    jest.spyOn(Date, 'now').mockReturnValue(NOW_MS);
    store = new InMemoryResultStore();
    queue = new InMemoryJobQueue();
    metrics = silentMetrics();

    const module = await Test.createTestingModule({
      providers: [
        KeygenService,
        { provide: ResultStore, useValue: store },
        { provide: JobQueue, useValue: queue },
        { provide: CloudWatchMetricsService, useValue: metrics },
        { provide: ConfigService, useValue: testConfig() },
      ],
    }).compile();
    service = module.get(KeygenService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('submit', () => {
    it('records the job as submitted and queues it', async () => {
      const recordEvent = jest.spyOn(metrics, 'recordJobEvent');

      const response = await service.submit({ key_type: 'rsa', key_bits: 4096 });

      expect(response.status).toBe(JobStatus.SUBMITTED);
      expect(response.request_id).toMatch(UUID_PATTERN);

      expect(store.items.get(response.request_id)).toEqual(
        buildSubmittedRecord(response.request_id, { key_type: 'rsa', key_bits: 4096 }, NOW_MS, 3600),
      );
      expect(queue.messages).toHaveLength(1);
      expect(JSON.parse(queue.messages[0].body)).toEqual({
        request_id: response.request_id,
        key_type: 'rsa',
        key_bits: 4096,
      });
      expect(recordEvent).toHaveBeenCalledWith('JobSubmitted', 'rsa');
    });

    it('applies rsa-2048 defaults to an empty body', async () => {
      const { request_id } = await service.submit({});

      expect(store.items.get(request_id)).toMatchObject({ key_type: 'rsa', key_bits: 2048 });
    });

    it('treats a null rsa key size as the default', async () => {
      const { request_id } = await service.submit({ key_type: 'rsa', key_bits: null });

      expect(store.items.get(request_id)).toMatchObject({ key_type: 'rsa', key_bits: 2048 });
    });

    it('stores ed25519 jobs with null key_bits', async () => {
      const { request_id } = await service.submit({ key_type: 'ed25519', key_bits: 2048 });

      expect(store.items.get(request_id)).toMatchObject({ key_type: 'ed25519', key_bits: null });
      expect(JSON.parse(queue.messages[0].body)).toEqual({ request_id, key_type: 'ed25519', key_bits: null });
    });

    it('sets expires_at from the configured TTL', async () => {
      const { request_id } = await service.submit({});
      expect(store.items.get(request_id)?.expires_at).toBe(1_700_000_000 + 3600);
    });

    it('rejects an unsupported key size without writing anything', async () => {
      await expect(service.submit({ key_type: 'rsa', key_bits: 3072 })).rejects.toThrow(JobValidationError);

      expect(store.items.size).toBe(0);
      expect(queue.messages).toHaveLength(0);
    });

    it('issues a distinct id per submission', async () => {
      const first = await service.submit({});
      const second = await service.submit({});
      expect(first.request_id).not.toBe(second.request_id);
    });

    it('retries with a fresh id on collision', async () => {
      const create = jest.spyOn(store, 'create').mockResolvedValueOnce(false);

      const { request_id } = await service.submit({});

      expect(create).toHaveBeenCalledTimes(2);
      expect(store.items.size).toBe(1);
      expect(store.items.has(request_id)).toBe(true);
    });

    it('gives up after repeated collisions', async () => {
      jest.spyOn(store, 'create').mockResolvedValue(false);

      await expect(service.submit({})).rejects.toThrow(InternalServerErrorException);
      expect(queue.messages).toHaveLength(0);
    });

    it('returns 503 ENQUEUE_FAILED and leaves the record submitted when publishing fails', async () => {
      jest.spyOn(queue, 'publish').mockRejectedValue(new Error('queue unavailable'));

      const error: unknown = await service.submit({}).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServiceUnavailableException);
      if (error instanceof ServiceUnavailableException) {
        const [requestId] = [...store.items.keys()];
        expect(error.getResponse()).toEqual({
          message: `Request ${requestId} could not be queued; submit the job again`,
          code: 'ENQUEUE_FAILED',
        });
        expect(store.items.get(requestId)?.status).toBe(JobStatus.SUBMITTED);
      }
    });
  });

  describe('getResult', () => {
    it('returns status only while the job is in flight', async () => {
      const { request_id } = await service.submit({});

      await expect(service.getResult(request_id)).resolves.toEqual({ request_id, status: 'submitted' });
    });

    it('returns key material once complete', async () => {
      const { request_id } = await service.submit({ key_type: 'ed25519' });
      await store.claim({ requestId: request_id, claimToken: 'token-1', leaseSeconds: 120 });
      await store.complete({
        requestId: request_id,
        claimToken: 'token-1',
        material: { public_key: 'cHVi', private_key: 'cHJpdg==', public_key_openssh: 'ssh-ed25519 AAAA' },
      });

      await expect(service.getResult(request_id)).resolves.toEqual({
        request_id,
        status: 'complete',
        key_type: 'ed25519',
        key_bits: null,
        public_key_b64: 'cHVi',
        private_key_b64: 'cHJpdg==',
        public_key_openssh: 'ssh-ed25519 AAAA',
      });
    });

    it('returns the error message for failed jobs', async () => {
      const { request_id } = await service.submit({});
      await store.fail({ requestId: request_id, errorMessage: 'bad parameters', claimToken: null });

      await expect(service.getResult(request_id)).resolves.toEqual({
        request_id,
        status: 'error',
        error_message: 'bad parameters',
      });
    });

    it('throws ResultNotFoundError for unknown ids', async () => {
      await expect(service.getResult('no-such-id')).rejects.toThrow(ResultNotFoundError);
      await expect(service.getResult('no-such-id')).rejects.toThrow('No result found for request no-such-id');
    });

    it('treats expired records as not found', async () => {
      const { request_id } = await service.submit({});
      jest.spyOn(Date, 'now').mockReturnValue(NOW_MS + 3600 * 1000);

      await expect(service.getResult(request_id)).rejects.toThrow(ResultNotFoundError);
    });
  });
});
