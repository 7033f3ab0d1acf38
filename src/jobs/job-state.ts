/**
 * Job lifecycle: pending → running → success | failed.
 * Terminal states are final; any update to a terminal job is rejected.
 */

import type { JobStatus } from '../types/job.types.js';

const NEXT: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running'],
  running: ['running', 'success', 'failed'],
  success: [],
  failed: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly to: JobStatus,
  ) {
    super(`Job ${jobId}: illegal transition ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function isTerminal(status: JobStatus): boolean {
  return status === 'success' || status === 'failed';
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return NEXT[from].includes(to);
}

export function assertTransition(jobId: string, from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError(jobId, from, to);
  }
}
