import { JobStatus, isJobStatus } from '../job-status';
import { KeySpec, KeyType, RsaKeyBits, isKeyType, isRsaKeyBits } from '../job-spec';

interface RecordBase {
  request_id: string;
  key_type: KeyType;
  key_bits: RsaKeyBits | null;
  /** ISO-8601, set on the first write and never changed. */
  created_at: string;
  updated_at: string;
  /** Epoch seconds; the table's TTL attribute. */
  expires_at: number;
}

export interface SubmittedRecord extends RecordBase {
  status: JobStatus.SUBMITTED;
}

export interface PendingRecord extends RecordBase {
  status: JobStatus.PENDING;
  /** Identifies the delivery currently allowed to write the terminal state. */
  claim_token: string;
  /** Epoch seconds after which another delivery may take the job over. */
  lease_expires_at: number;
}

export interface CompleteRecord extends RecordBase {
  status: JobStatus.COMPLETE;
  /** Base64 of the SPKI PEM text. */
  public_key: string;
  /** Base64 of the PKCS#8 PEM text. */
  private_key: string;
  public_key_openssh: string;
  completed_at: string;
}

export interface ErrorRecord extends RecordBase {
  status: JobStatus.ERROR;
  error_message: string;
  completed_at: string;
}

export type ResultRecord = SubmittedRecord | PendingRecord | CompleteRecord | ErrorRecord;

export interface KeyMaterial {
  public_key: string;
  private_key: string;
  public_key_openssh: string;
}

export function buildSubmittedRecord(
  requestId: string,
  spec: KeySpec,
  nowMs: number,
  ttlSeconds: number,
): SubmittedRecord {
  const now = new Date(nowMs).toISOString();
  return {
    request_id: requestId,
    status: JobStatus.SUBMITTED,
    key_type: spec.key_type,
    key_bits: spec.key_bits,
    created_at: now,
    updated_at: now,
    expires_at: Math.floor(nowMs / 1000) + ttlSeconds,
  };
}

export function isExpired(record: ResultRecord, nowMs: number): boolean {
  return record.expires_at <= Math.floor(nowMs / 1000);
}

export class InvalidResultItemError extends Error {
  constructor(requestId: unknown, detail: string) {
    super(`Result item ${String(requestId)} is malformed: ${detail}`);
    this.name = 'InvalidResultItemError';
  }
}

/** Parses a raw store item into a ResultRecord, rejecting items that break the record invariants. */
export function parseResultRecord(item: Record<string, unknown>): ResultRecord {
  const str = (key: string): string => {
    const value = item[key];
    if (typeof value !== 'string') throw new InvalidResultItemError(item.request_id, `${key} is not a string`);
    return value;
  };
  const num = (key: string): number => {
    const value = item[key];
    if (typeof value !== 'number') throw new InvalidResultItemError(item.request_id, `${key} is not a number`);
    return value;
  };

  const status = item.status;
  const keyType = item.key_type;
  const rawBits = item.key_bits ?? null;

  if (!isJobStatus(status)) throw new InvalidResultItemError(item.request_id, `unknown status ${String(status)}`);
  if (!isKeyType(keyType)) throw new InvalidResultItemError(item.request_id, `unknown key_type ${String(keyType)}`);

  let keyBits: RsaKeyBits | null = null;
  if (rawBits !== null) {
    if (!isRsaKeyBits(rawBits)) {
      throw new InvalidResultItemError(item.request_id, `unsupported key_bits ${String(rawBits)}`);
    }
    keyBits = rawBits;
  }

  const base: RecordBase = {
    request_id: str('request_id'),
    key_type: keyType,
    key_bits: keyBits,
    created_at: str('created_at'),
    updated_at: str('updated_at'),
    expires_at: num('expires_at'),
  };

  switch (status) {
    case JobStatus.SUBMITTED:
      return { ...base, status };
    case JobStatus.PENDING:
      return { ...base, status, claim_token: str('claim_token'), lease_expires_at: num('lease_expires_at') };
    case JobStatus.COMPLETE:
      return {
        ...base,
        status,
        public_key: str('public_key'),
        private_key: str('private_key'),
        public_key_openssh: str('public_key_openssh'),
        completed_at: str('completed_at'),
      };
    case JobStatus.ERROR:
      return { ...base, status, error_message: str('error_message'), completed_at: str('completed_at') };
  }
}
