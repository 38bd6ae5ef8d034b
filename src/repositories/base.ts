import type { ClaimedJob, CreateJobData, Job, JobPage, JobQuery, JobStats } from '../types/job.js';

export interface JobRepository {
  createPending(data: CreateJobData): Promise<Job>;
  get(id: string): Promise<Job | null>;

  /**
   * Atomically take the oldest pending job and mark it running.
   * Concurrent callers never receive the same job; resolves null when
   * nothing is pending.
   */
  claimNext(): Promise<ClaimedJob | null>;

  /** running -> completed. Resolves false (and changes nothing) when the job is not running. */
  complete(id: string, outputText: string): Promise<boolean>;

  /** running -> failed. Resolves false (and changes nothing) when the job is not running. */
  fail(id: string, errorText: string): Promise<boolean>;

  find(query: JobQuery): Promise<JobPage>;
  getStats(): Promise<JobStats>;
}

export const DEFAULT_PAGE_LIMIT = 50;

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isJobId(value: string): boolean {
  return UUID_RE.test(value);
}
