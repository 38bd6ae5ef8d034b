import type { BaseLogger } from 'pino';
import type { JobRepository } from '../repositories/base.js';
import type { Executor } from '../executors/base.js';
import type { ClaimedJob } from '../types/job.js';
import { describeFault, ExecutorTimeoutError } from '../errors.js';

export interface WorkerConfig {
  /** Back-off after a poll that found nothing. */
  pollIntervalMs: number;
  /** 0 leaves executor calls unbounded. */
  executorTimeoutMs: number;
  /** How long stop() waits for the in-flight job. */
  stopGraceMs: number;
}

export const DEFAULT_WORKER_CONFIG: WorkerConfig = {
  pollIntervalMs: 1500,
  executorTimeoutMs: 0,
  stopGraceMs: 5000,
};

export interface WorkerStats {
  running: number;
  processed: number;
  failed: number;
  claimErrors: number;
  writeErrors: number;
}

export type WorkerLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

type Outcome =
  | { ok: true; output: string }
  | { ok: false; error: string };

/**
 * Polls the store, runs one claimed job at a time and records its terminal
 * state. Any number of workers may share a store; the claim keeps them apart.
 */
export class JobWorker {
  private isRunning = false;
  /** Bumped by start(); only the current generation's chain reschedules. */
  private generation = 0;
  private pollTimer?: NodeJS.Timeout;
  private cycle?: Promise<void>;
  private config: WorkerConfig;
  private stats: WorkerStats = {
    running: 0,
    processed: 0,
    failed: 0,
    claimErrors: 0,
    writeErrors: 0,
  };

  constructor(
    private repo: JobRepository,
    private executor: Executor,
    config: Partial<WorkerConfig>,
    private log: WorkerLogger
  ) {
    this.config = { ...DEFAULT_WORKER_CONFIG, ...config };
  }

  async start(): Promise<void> {
    if (this.isRunning) return;

    this.isRunning = true;
    const generation = ++this.generation;
    this.log.info({ pollIntervalMs: this.config.pollIntervalMs }, 'worker started');

    // A cycle that outlived the last stop() must settle first; one loop per worker
    if (this.cycle) {
      await this.cycle;
    }
    this.scheduleNextPoll(0, generation);
  }

  async stop(): Promise<void> {
    if (!this.isRunning) return;

    this.isRunning = false;
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = undefined;
    }

    // In-flight executor calls are not cancelled; wait for the write-back
    if (this.cycle) {
      let graceTimer: NodeJS.Timeout | undefined;
      const grace = new Promise<void>((resolve) => {
        graceTimer = setTimeout(resolve, this.config.stopGraceMs);
      });
      await Promise.race([this.cycle, grace]);
      clearTimeout(graceTimer);
    }

    this.log.info({ ...this.stats }, 'worker stopped');
  }

  getStats(): WorkerStats {
    return { ...this.stats };
  }

  /**
   * One claim/execute/resolve cycle. Resolves true when a job was claimed,
   * false when there was nothing to do or the store could not be reached.
   */
  async runOnce(): Promise<boolean> {
    let job: ClaimedJob | null;
    try {
      job = await this.repo.claimNext();
    } catch (err) {
      this.stats.claimErrors++;
      this.log.warn({ err }, 'claim failed; treating as empty poll');
      return false;
    }

    if (!job) return false;

    this.log.debug({ jobId: job.id, skillId: job.skillId }, 'job claimed');
    this.stats.running++;
    try {
      const outcome = await this.execute(job);
      await this.resolve(job, outcome);
    } finally {
      this.stats.running--;
    }
    return true;
  }

  private scheduleNextPoll(delayMs: number, generation: number): void {
    if (!this.isRunning || generation !== this.generation) return;

    this.pollTimer = setTimeout(() => {
      this.cycle = this.runOnce().then(
        // Straight back to the store after work; back off only when idle
        (claimed) => this.scheduleNextPoll(claimed ? 0 : this.config.pollIntervalMs, generation),
        (err: unknown) => {
          this.log.error({ err }, 'worker cycle crashed');
          this.scheduleNextPoll(this.config.pollIntervalMs, generation);
        }
      );
    }, delayMs);
  }

  private async execute(job: ClaimedJob): Promise<Outcome> {
    const controller = new AbortController();
    const timeoutMs = this.config.executorTimeoutMs;
    let timeoutHandle: NodeJS.Timeout | undefined;

    try {
      const run = this.executor.run(job.skillId, job.inputText, controller.signal);
      if (timeoutMs <= 0) {
        return { ok: true, output: await run };
      }

      const timeout = new Promise<never>((_, reject) => {
        timeoutHandle = setTimeout(() => {
          controller.abort();
          reject(new ExecutorTimeoutError(timeoutMs));
        }, timeoutMs);
      });
      // The executor may settle after the timeout; that late result is dropped
      void run.catch(() => undefined);
      return { ok: true, output: await Promise.race([run, timeout]) };
    } catch (err) {
      return { ok: false, error: describeFault(err) };
    } finally {
      clearTimeout(timeoutHandle);
    }
  }

  private async resolve(job: ClaimedJob, outcome: Outcome): Promise<void> {
    try {
      const applied = outcome.ok
        ? await this.repo.complete(job.id, outcome.output)
        : await this.repo.fail(job.id, outcome.error);

      if (!applied) {
        this.log.warn({ jobId: job.id }, 'job was no longer running; result dropped');
      } else if (outcome.ok) {
        this.stats.processed++;
        this.log.info({ jobId: job.id }, 'job completed');
      } else {
        this.stats.failed++;
        this.log.info({ jobId: job.id, error: outcome.error }, 'job failed');
      }
    } catch (err) {
      // The job stays running; reconciliation is outside the worker
      this.stats.writeErrors++;
      this.log.error({ err, jobId: job.id }, 'terminal write failed; job left running');
    }
  }
}
