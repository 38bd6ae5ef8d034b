import { InvalidTransitionError } from '../errors.js';
import type { JobStatus } from '../types/job.js';

export const JOB_STATUSES = ['pending', 'running', 'completed', 'failed'] as const satisfies readonly JobStatus[];

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed'];

// pending -> running -> {completed | failed}; nothing else, nothing backwards.
const NEXT: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return NEXT[from].includes(to);
}

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function assertTransition(from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}
