/**
 * Lifecycle of a key generation job. Status only moves forward:
 *
 *   submitted ──▶ pending ──▶ complete
 *       │            └──────▶ error
 *       └────────────────────▶ error   (re-validation failed in the worker)
 */
export enum JobStatus {
  SUBMITTED = 'submitted',
  PENDING = 'pending',
  COMPLETE = 'complete',
  ERROR = 'error',
}

/** Every legal status change, as a type. */
export type StatusTransition =
  | { from: JobStatus.SUBMITTED; to: JobStatus.PENDING }
  | { from: JobStatus.SUBMITTED; to: JobStatus.ERROR }
  | { from: JobStatus.PENDING; to: JobStatus.COMPLETE }
  | { from: JobStatus.PENDING; to: JobStatus.ERROR };

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  [JobStatus.SUBMITTED]: [JobStatus.PENDING, JobStatus.ERROR],
  [JobStatus.PENDING]: [JobStatus.COMPLETE, JobStatus.ERROR],
  [JobStatus.COMPLETE]: [],
  [JobStatus.ERROR]: [],
};

const ORDER: Record<JobStatus, number> = {
  [JobStatus.SUBMITTED]: 0,
  [JobStatus.PENDING]: 1,
  [JobStatus.COMPLETE]: 2,
  [JobStatus.ERROR]: 2,
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: JobStatus,
    readonly to: JobStatus,
  ) {
    super(`Illegal job status transition ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function isJobStatus(value: unknown): value is JobStatus {
  return typeof value === 'string' && Object.values<string>(JobStatus).includes(value);
}

export function isTerminal(status: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/** Narrows a runtime pair to a legal transition or throws. */
export function assertTransition(from: JobStatus, to: JobStatus): StatusTransition {
  if (from === JobStatus.SUBMITTED && to === JobStatus.PENDING) return { from, to };
  if (from === JobStatus.SUBMITTED && to === JobStatus.ERROR) return { from, to };
  if (from === JobStatus.PENDING && to === JobStatus.COMPLETE) return { from, to };
  if (from === JobStatus.PENDING && to === JobStatus.ERROR) return { from, to };
  throw new IllegalTransitionError(from, to);
}

/** Position in the forward ordering; complete and error share the last rank. */
export function statusRank(status: JobStatus): number {
  return ORDER[status];
}
