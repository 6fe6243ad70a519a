import { InMemoryResultStore } from '../keygen/__tests__/support/in-memory-result-store';
import { sqsEvent, sqsRecord } from '../keygen/__tests__/support/sqs-event';
import { silentMetrics } from '../keygen/__tests__/support/test-config';
import { JobStatus } from '../keygen/job-status';
import { buildSubmittedRecord } from '../keygen/result-store/result-record';
import { reportDeadLetters } from './dead-letter-report';

const NOW_MS = 1_700_000_000_000;

describe('reportDeadLetters', () => {
  let store: InMemoryResultStore;

  beforeEach(() => {
    jest.spyOn(Date, 'now').mockReturnValue(NOW_MS);
    store = new InMemoryResultStore();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reports the current status of the dead-lettered job', async () => {
    const metrics = silentMetrics();
    const recordEvent = jest.spyOn(metrics, 'recordJobEvent');
    store.items.set('req-1', buildSubmittedRecord('req-1', { key_type: 'ed25519', key_bits: null }, NOW_MS, 3600));

    const reports = await reportDeadLetters(
      sqsEvent(sqsRecord('{"request_id":"req-1","key_type":"ed25519","key_bits":null}', 'm-1', 5)),
      store,
      metrics,
    );

    expect(reports).toEqual([{ messageId: 'm-1', requestId: 'req-1', receiveCount: 5, status: JobStatus.SUBMITTED }]);
    expect(recordEvent).toHaveBeenCalledWith('JobDeadLettered', 'ed25519');
  });

  it('reports messages whose record is gone as missing', async () => {
    const reports = await reportDeadLetters(
      sqsEvent(sqsRecord('{"request_id":"req-gone"}', 'm-2', 5)),
      store,
      silentMetrics(),
    );

    expect(reports[0]).toEqual({ messageId: 'm-2', requestId: 'req-gone', receiveCount: 5, status: 'missing' });
  });

  it('reports malformed messages without a request id', async () => {
    const reports = await reportDeadLetters(sqsEvent(sqsRecord('not json', 'm-3', 5)), store, silentMetrics());

    expect(reports[0]).toEqual({ messageId: 'm-3', requestId: null, receiveCount: 5, status: 'missing' });
  });

  it('still reports when the store cannot be read', async () => {
    jest.spyOn(store, 'get').mockRejectedValue(new Error('throttled'));

    const reports = await reportDeadLetters(
      sqsEvent(sqsRecord('{"request_id":"req-1"}', 'm-4', 5)),
      store,
      silentMetrics(),
    );

    expect(reports[0].status).toBe('unknown');
  });
});
