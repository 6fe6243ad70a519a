import { KeyMaterial, PendingRecord, ResultRecord, SubmittedRecord } from './result-record';

export interface ClaimRequest {
  requestId: string;
  claimToken: string;
  leaseSeconds: number;
}

export type ClaimOutcome =
  | { claimed: true; record: PendingRecord }
  | { claimed: false; current: ResultRecord | null };

export interface CompleteRequest {
  requestId: string;
  claimToken: string;
  material: KeyMaterial;
}

export interface FailRequest {
  requestId: string;
  errorMessage: string;
  /** Holder of the pending lease, or null to fail straight from `submitted`. */
  claimToken: string | null;
}

/**
 * Keyed store of job results. Every mutation is conditional on the item's
 * current state; a `false` / unclaimed outcome means the precondition did
 * not hold and nothing was written.
 */
export abstract class ResultStore {
  /** Create-if-absent. Returns false when the request id is already taken. */
  abstract create(record: SubmittedRecord): Promise<boolean>;

  /** Returns null for unknown and expired records. */
  abstract get(requestId: string): Promise<ResultRecord | null>;

  /**
   * `submitted → pending`, or takes over a `pending` record whose lease has
   * lapsed. The record must not be expired.
   */
  abstract claim(request: ClaimRequest): Promise<ClaimOutcome>;

  /** `pending → complete`, only for the current lease holder. */
  abstract complete(request: CompleteRequest): Promise<boolean>;

  /** `pending → error` for the lease holder, or `submitted → error` when claimToken is null. */
  abstract fail(request: FailRequest): Promise<boolean>;

  /** Ends the lease early so a redelivery can claim the job at once. */
  abstract release(requestId: string, claimToken: string): Promise<boolean>;
}
