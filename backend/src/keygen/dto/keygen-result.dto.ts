import { JobStatus } from '../job-status';
import { KeyType, RsaKeyBits } from '../job-spec';
import { ResultRecord } from '../result-store/result-record';

export class KeygenSubmissionDto {
  request_id!: string;
  status!: JobStatus.SUBMITTED;
}

export interface InProgressResultDto {
  request_id: string;
  status: JobStatus.SUBMITTED | JobStatus.PENDING;
}

export interface FailedResultDto {
  request_id: string;
  status: JobStatus.ERROR;
  error_message: string;
}

export interface CompletedResultDto {
  request_id: string;
  status: JobStatus.COMPLETE;
  key_type: KeyType;
  key_bits: RsaKeyBits | null;
  public_key_b64: string;
  private_key_b64: string;
  public_key_openssh: string;
}

/** Body of GET /result/:requestId. Key material appears only once complete. */
export type KeygenResultDto = InProgressResultDto | FailedResultDto | CompletedResultDto;

export function toKeygenResultDto(record: ResultRecord): KeygenResultDto {
  switch (record.status) {
    case JobStatus.SUBMITTED:
    case JobStatus.PENDING:
      return { request_id: record.request_id, status: record.status };
    case JobStatus.ERROR:
      return { request_id: record.request_id, status: record.status, error_message: record.error_message };
    case JobStatus.COMPLETE:
      return {
        request_id: record.request_id,
        status: record.status,
        key_type: record.key_type,
        key_bits: record.key_bits,
        public_key_b64: record.public_key,
        private_key_b64: record.private_key,
        public_key_openssh: record.public_key_openssh,
      };
  }
}
