import { InMemoryJobRepository } from '../repositories/memory.js';
import type { ClaimedJob, CreateJobData, Job, JobStatus } from '../types/job.js';

/** In-memory store that records every status each job is observed in. */
export class RecordingJobRepository extends InMemoryJobRepository {
  readonly history = new Map<string, JobStatus[]>();

  override async createPending(data: CreateJobData): Promise<Job> {
    const job = await super.createPending(data);
    this.history.set(job.id, [job.status]);
    return job;
  }

  override async claimNext(): Promise<ClaimedJob | null> {
    const claimed = await super.claimNext();
    if (claimed) await this.record(claimed.id);
    return claimed;
  }

  override async complete(id: string, outputText: string): Promise<boolean> {
    const applied = await super.complete(id, outputText);
    if (applied) await this.record(id);
    return applied;
  }

  override async fail(id: string, errorText: string): Promise<boolean> {
    const applied = await super.fail(id, errorText);
    if (applied) await this.record(id);
    return applied;
  }

  // Read back before returning so callers only see a recorded state
  private async record(id: string): Promise<void> {
    const job = await this.get(id);
    if (job) this.history.get(id)?.push(job.status);
  }
}
