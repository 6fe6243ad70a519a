import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { CloudWatchMetricsService } from '../common/metrics/cloudwatch-metrics.service';
import { InMemoryResultStore } from './__tests__/support/in-memory-result-store';
import { silentMetrics, testConfig } from './__tests__/support/test-config';
import { KeySpec } from './job-spec';
import { JobStatus } from './job-status';
import { KeyMaterialService } from './key-material.service';
import { KeygenProcessorService } from './keygen-processor.service';
import { TransientInfrastructureError } from './keygen.errors';
import { buildSubmittedRecord } from './result-store/result-record';
import { ResultStore } from './result-store/result-store';

const NOW_MS = 1_700_000_000_000;
const NOW_SEC = 1_700_000_000;

const material = {
  public_key: 'cHVibGlj',
  private_key: 'cHJpdmF0ZQ==',
  public_key_openssh: 'ssh-ed25519 AAAAC3NzaC1lZDI1NTE5',
};

describe('KeygenProcessorService', () => {
  let processor: KeygenProcessorService;
  let store: InMemoryResultStore;
  let keyMaterial: KeyMaterialService;
  let metrics: CloudWatchMetricsService;

  async function submit(requestId: string, spec: KeySpec): Promise<string> {
    await store.create(buildSubmittedRecord(requestId, spec, NOW_MS, 3600));
    return JSON.stringify({ request_id: requestId, ...spec });
  }

  const delivery = (receiveCount = 1) => ({ messageId: `msg-${receiveCount}`, receiveCount });

  beforeEach(async () => {
    jest.spyOn(Date, 'now').mockReturnValue(NOW_MS);
    store = new InMemoryResultStore();
    keyMaterial = new KeyMaterialService();
    metrics = silentMetrics();

    const module = await Test.createTestingModule({
      providers: [
        KeygenProcessorService,
        { provide: ResultStore, useValue: store },
        { provide: KeyMaterialService, useValue: keyMaterial },
        { provide: CloudWatchMetricsService, useValue: metrics },
        { provide: ConfigService, useValue: testConfig() },
      ],
    }).compile();
    processor = module.get(KeygenProcessorService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('takes a submitted job through pending to complete', async () => {
    const recordEvent = jest.spyOn(metrics, 'recordJobEvent');
    const body = await submit('req-1', { key_type: 'ed25519', key_bits: null });

    await expect(processor.process(body, delivery())).resolves.toBe('completed');

    const record = await store.get('req-1');
    expect(record?.status).toBe(JobStatus.COMPLETE);
    if (record?.status === JobStatus.COMPLETE) {
      expect(record.public_key_openssh.startsWith('ssh-ed25519 ')).toBe(true);
      expect(record.completed_at).toBe(new Date(NOW_MS).toISOString());
    }
    expect(store.history.get('req-1')).toEqual([JobStatus.SUBMITTED, JobStatus.PENDING, JobStatus.COMPLETE]);
    expect(recordEvent).toHaveBeenCalledWith('JobCompleted', 'ed25519');
  });

  it('ignores a redelivery of a completed job', async () => {
    const generate = jest.spyOn(keyMaterial, 'generate').mockResolvedValue(material);
    const body = await submit('req-1', { key_type: 'rsa', key_bits: 2048 });

    await processor.process(body, delivery(1));
    const completed = await store.get('req-1');

    await expect(processor.process(body, delivery(2))).resolves.toBe('duplicate');
    expect(generate).toHaveBeenCalledTimes(1);
    expect(await store.get('req-1')).toEqual(completed);
  });

  it('returns the message to the queue while another delivery holds the lease', async () => {
    const generate = jest.spyOn(keyMaterial, 'generate');
    const body = await submit('req-1', { key_type: 'rsa', key_bits: 2048 });
    await store.claim({ requestId: 'req-1', claimToken: 'other-worker', leaseSeconds: 120 });

    await expect(processor.process(body, delivery(2))).rejects.toThrow(
      `[req-1] Lease held until ${NOW_SEC + 120} (delivery 2); returning message to the queue`,
    );
    expect(generate).not.toHaveBeenCalled();
    expect((await store.get('req-1'))?.status).toBe(JobStatus.PENDING);
  });

  it('takes over a pending job whose lease lapsed', async () => {
    jest.spyOn(keyMaterial, 'generate').mockResolvedValue(material);
    const body = await submit('req-1', { key_type: 'rsa', key_bits: 2048 });
    await store.claim({ requestId: 'req-1', claimToken: 'crashed-worker', leaseSeconds: 120 });

    jest.spyOn(Date, 'now').mockReturnValue(NOW_MS + 121_000);

    await expect(processor.process(body, delivery(2))).resolves.toBe('completed');
    expect((await store.get('req-1'))?.status).toBe(JobStatus.COMPLETE);
  });

  it('discards messages without a request id', async () => {
    const recordEvent = jest.spyOn(metrics, 'recordJobEvent');

    await expect(processor.process('{"key_type":"rsa"}', delivery())).resolves.toBe('discarded');
    expect(recordEvent).toHaveBeenCalledWith('JobDiscarded');
  });

  it('records error when the queued spec fails re-validation', async () => {
    await store.create(buildSubmittedRecord('req-1', { key_type: 'rsa', key_bits: 2048 }, NOW_MS, 3600));
    const body = JSON.stringify({ request_id: 'req-1', key_type: 'rsa', key_bits: 1024 });

    await expect(processor.process(body, delivery())).resolves.toBe('failed');

    const record = await store.get('req-1');
    expect(record).toMatchObject({
      status: JobStatus.ERROR,
      error_message: 'key_bits must be one of 2048, 4096 for rsa (got 1024)',
    });
    expect(store.history.get('req-1')).toEqual([JobStatus.SUBMITTED, JobStatus.ERROR]);
  });

  it('records error when the generator rejects its parameters', async () => {
    jest
      .spyOn(keyMaterial, 'generate')
      .mockRejectedValue(Object.assign(new Error('invalid modulus'), { code: 'ERR_INVALID_ARG_VALUE' }));
    const body = await submit('req-1', { key_type: 'rsa', key_bits: 4096 });

    await expect(processor.process(body, delivery())).resolves.toBe('failed');
    expect(await store.get('req-1')).toMatchObject({
      status: JobStatus.ERROR,
      error_message: 'Key generation rejected parameters: invalid modulus',
    });
  });

  it('rethrows transient generator failures and hands the lease back', async () => {
    jest.spyOn(keyMaterial, 'generate').mockRejectedValueOnce(new Error('entropy source busy'));
    const body = await submit('req-1', { key_type: 'rsa', key_bits: 2048 });

    await expect(processor.process(body, delivery(1))).rejects.toThrow(TransientInfrastructureError);

    const record = await store.get('req-1');
    expect(record).toMatchObject({ status: JobStatus.PENDING, lease_expires_at: NOW_SEC });

    jest.spyOn(keyMaterial, 'generate').mockResolvedValue(material);
    await expect(processor.process(body, delivery(2))).resolves.toBe('completed');
  });

  it('surfaces store outages as transient', async () => {
    jest.spyOn(store, 'claim').mockRejectedValue(new Error('throttled'));
    const body = await submit('req-1', { key_type: 'rsa', key_bits: 2048 });

    await expect(processor.process(body, delivery())).rejects.toThrow(
      '[req-1] Result store claim failed: throttled',
    );
  });

  it('acknowledges jobs whose record has expired', async () => {
    const generate = jest.spyOn(keyMaterial, 'generate');
    const body = await submit('req-1', { key_type: 'rsa', key_bits: 2048 });
    jest.spyOn(Date, 'now').mockReturnValue(NOW_MS + 3600 * 1000);

    await expect(processor.process(body, delivery())).resolves.toBe('duplicate');
    expect(generate).not.toHaveBeenCalled();
  });

  it('drops generated keys when the lease was lost before completion', async () => {
    jest.spyOn(keyMaterial, 'generate').mockResolvedValue(material);
    jest.spyOn(store, 'complete').mockResolvedValueOnce(false);
    const body = await submit('req-1', { key_type: 'rsa', key_bits: 2048 });

    await expect(processor.process(body, delivery())).resolves.toBe('duplicate');
    expect((await store.get('req-1'))?.status).toBe(JobStatus.PENDING);
  });
});
