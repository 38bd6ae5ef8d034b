import { randomUUID } from 'node:crypto';
import { assertTransition } from '../lifecycle/job-state.js';
import type { ClaimedJob, CreateJobData, Job, JobPage, JobQuery, JobStats, JobStatus } from '../types/job.js';
import { DEFAULT_PAGE_LIMIT, type JobRepository } from './base.js';

interface StoredJob {
  seq: number;
  job: Job;
}

/**
 * Process-local store. Every mutation runs to completion without awaiting,
 * so a claim's select-and-flip cannot interleave with another caller's.
 */
export class InMemoryJobRepository implements JobRepository {
  private jobs = new Map<string, StoredJob>();
  private seq = 0;
  private lastCreatedAt = 0;

  async createPending(data: CreateJobData): Promise<Job> {
    // createdAt never decreases, even if the wall clock does
    const createdMs = Math.max(Date.now(), this.lastCreatedAt);
    this.lastCreatedAt = createdMs;

    const job: Job = {
      id: randomUUID(),
      skillId: data.skillId,
      requestedBy: data.requestedBy,
      inputText: data.inputText ?? '',
      status: 'pending',
      outputText: '',
      errorText: '',
      createdAt: new Date(createdMs),
      updatedAt: new Date(createdMs),
    };

    this.jobs.set(job.id, { seq: this.seq++, job });
    return { ...job };
  }

  async get(id: string): Promise<Job | null> {
    const stored = this.jobs.get(id);
    return stored ? { ...stored.job } : null;
  }

  async claimNext(): Promise<ClaimedJob | null> {
    let oldest: StoredJob | undefined;
    for (const stored of this.jobs.values()) {
      if (stored.job.status !== 'pending') continue;
      if (!oldest || compareFifo(stored, oldest) < 0) {
        oldest = stored;
      }
    }

    if (!oldest) return null;

    const claimed = this.transition(oldest, 'running', {});
    return {
      id: claimed.id,
      skillId: claimed.skillId,
      inputText: claimed.inputText,
    };
  }

  async complete(id: string, outputText: string): Promise<boolean> {
    return this.resolve(id, 'completed', { outputText });
  }

  async fail(id: string, errorText: string): Promise<boolean> {
    return this.resolve(id, 'failed', { errorText });
  }

  async find(query: JobQuery): Promise<JobPage> {
    let entries = Array.from(this.jobs.values());

    if (query.requestedBy) {
      entries = entries.filter(({ job }) => job.requestedBy === query.requestedBy);
    }
    if (query.skillId) {
      entries = entries.filter(({ job }) => job.skillId === query.skillId);
    }
    if (query.status) {
      entries = entries.filter(({ job }) => job.status === query.status);
    }

    // Newest first
    entries.sort((a, b) => compareFifo(b, a));

    if (query.cursor) {
      // An unknown cursor yields an empty page
      const cursorIndex = entries.findIndex(({ job }) => job.id === query.cursor);
      entries = cursorIndex >= 0 ? entries.slice(cursorIndex + 1) : [];
    }

    const limit = query.limit ?? DEFAULT_PAGE_LIMIT;
    const hasMore = entries.length > limit;
    const jobs = entries.slice(0, limit).map(({ job }) => ({ ...job }));

    return {
      jobs,
      nextCursor: hasMore ? jobs[jobs.length - 1]?.id : undefined,
    };
  }

  async getStats(): Promise<JobStats> {
    const stats: JobStats = { pending: 0, running: 0, completed: 0, failed: 0 };
    for (const { job } of this.jobs.values()) {
      stats[job.status]++;
    }
    return stats;
  }

  private resolve(id: string, to: JobStatus, fields: Partial<Pick<Job, 'outputText' | 'errorText'>>): boolean {
    const stored = this.jobs.get(id);
    // Matched by id and current status; anything else is already resolved
    if (!stored || stored.job.status !== 'running') return false;

    this.transition(stored, to, fields);
    return true;
  }

  private transition(stored: StoredJob, to: JobStatus, fields: Partial<Pick<Job, 'outputText' | 'errorText'>>): Job {
    assertTransition(stored.job.status, to);
    stored.job = {
      ...stored.job,
      ...fields,
      status: to,
      updatedAt: new Date(),
    };
    return stored.job;
  }
}

function compareFifo(a: StoredJob, b: StoredJob): number {
  const byTime = a.job.createdAt.getTime() - b.job.createdAt.getTime();
  return byTime !== 0 ? byTime : a.seq - b.seq;
}
