import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { ClaimRowSchema, fromJobRow, JobRowSchema, JobStatusSchema } from '../schemas/job.js';
import { JOB_STATUSES } from '../lifecycle/job-state.js';
import type { ClaimedJob, CreateJobData, Job, JobPage, JobQuery, JobStats } from '../types/job.js';
import { DEFAULT_PAGE_LIMIT, isJobId, type JobRepository } from './base.js';
import type { SqlClient } from './sql.js';

// Text casts keep rows uniform when the platform schema stores ids as
// integers and status as an enum
const JOB_COLUMNS = [
  'id::text AS id',
  'skill_id::text AS skill_id',
  'requested_by::text AS requested_by',
  'input_text',
  'status::text AS status',
  'output_text',
  'error_text',
  'created_at',
  'updated_at',
].join(', ');

export const MIGRATION_SQL = `
CREATE TABLE IF NOT EXISTS run_jobs (
  id UUID PRIMARY KEY,
  skill_id TEXT NOT NULL,
  requested_by TEXT NOT NULL,
  input_text TEXT NOT NULL DEFAULT '',
  status TEXT NOT NULL DEFAULT 'pending'
    CHECK (status IN (${JOB_STATUSES.map((s) => `'${s}'`).join(', ')})),
  output_text TEXT NOT NULL DEFAULT '',
  error_text TEXT NOT NULL DEFAULT '',
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);
CREATE INDEX IF NOT EXISTS run_jobs_status_created_idx ON run_jobs (status, created_at);
CREATE INDEX IF NOT EXISTS run_jobs_requester_idx ON run_jobs (requested_by, created_at DESC);
`;

// One statement: the row lock is skipped (not waited on) by concurrent
// claimants, and the update re-checks the status it selected on.
export const CLAIM_SQL = `
WITH candidate AS (
  SELECT id
  FROM run_jobs
  WHERE status = 'pending'
  ORDER BY created_at ASC, id ASC
  LIMIT 1
  FOR UPDATE SKIP LOCKED
)
UPDATE run_jobs j
SET status = 'running', updated_at = now()
FROM candidate
WHERE j.id = candidate.id AND j.status = 'pending'
RETURNING j.id::text AS id, j.skill_id::text AS skill_id, j.input_text
`;

export const COMPLETE_SQL = `
UPDATE run_jobs
SET status = 'completed', output_text = $2, updated_at = now()
WHERE id = $1 AND status = 'running'
`;

export const FAIL_SQL = `
UPDATE run_jobs
SET status = 'failed', error_text = $2, updated_at = now()
WHERE id = $1 AND status = 'running'
`;

const StatsRowSchema = z.object({
  status: JobStatusSchema,
  count: z.coerce.number().int(),
});

export class PostgresJobRepository implements JobRepository {
  constructor(private db: SqlClient) {}

  async migrate(): Promise<void> {
    await this.db.query(MIGRATION_SQL);
  }

  async createPending(data: CreateJobData): Promise<Job> {
    const { rows } = await this.db.query(
      `INSERT INTO run_jobs (id, skill_id, requested_by, input_text, status)
       VALUES ($1, $2, $3, $4, 'pending')
       RETURNING ${JOB_COLUMNS}`,
      [randomUUID(), data.skillId, data.requestedBy, data.inputText ?? '']
    );
    return fromJobRow(JobRowSchema.parse(rows[0]));
  }

  async get(id: string): Promise<Job | null> {
    if (!isJobId(id)) return null;

    const { rows } = await this.db.query(`SELECT ${JOB_COLUMNS} FROM run_jobs WHERE id = $1`, [id]);
    return rows.length > 0 ? fromJobRow(JobRowSchema.parse(rows[0])) : null;
  }

  async claimNext(): Promise<ClaimedJob | null> {
    const { rows } = await this.db.query(CLAIM_SQL);
    if (rows.length === 0) return null;

    const row = ClaimRowSchema.parse(rows[0]);
    return { id: row.id, skillId: row.skill_id, inputText: row.input_text };
  }

  async complete(id: string, outputText: string): Promise<boolean> {
    if (!isJobId(id)) return false;
    const { rowCount } = await this.db.query(COMPLETE_SQL, [id, outputText]);
    return rowCount === 1;
  }

  async fail(id: string, errorText: string): Promise<boolean> {
    if (!isJobId(id)) return false;
    const { rowCount } = await this.db.query(FAIL_SQL, [id, errorText]);
    return rowCount === 1;
  }

  async find(query: JobQuery): Promise<JobPage> {
    const where: string[] = [];
    const values: unknown[] = [];
    const param = (value: unknown): string => {
      values.push(value);
      return `$${values.length}`;
    };

    if (query.requestedBy) where.push(`requested_by = ${param(query.requestedBy)}`);
    if (query.skillId) where.push(`skill_id = ${param(query.skillId)}`);
    if (query.status) where.push(`status = ${param(query.status)}`);
    if (query.cursor) {
      if (!isJobId(query.cursor)) return { jobs: [] };
      const cursor = param(query.cursor);
      where.push(`(created_at, id) < (SELECT c.created_at, c.id FROM run_jobs c WHERE c.id = ${cursor})`);
    }

    const limit = query.limit ?? DEFAULT_PAGE_LIMIT;
    const sql = `SELECT ${JOB_COLUMNS} FROM run_jobs`
      + (where.length > 0 ? ` WHERE ${where.join(' AND ')}` : '')
      + ` ORDER BY created_at DESC, id DESC LIMIT ${param(limit + 1)}`;

    const { rows } = await this.db.query(sql, values);
    const jobs = rows.map((row) => fromJobRow(JobRowSchema.parse(row)));
    const hasMore = jobs.length > limit;
    const page = hasMore ? jobs.slice(0, limit) : jobs;

    return {
      jobs: page,
      nextCursor: hasMore ? page[page.length - 1]?.id : undefined,
    };
  }

  async getStats(): Promise<JobStats> {
    const { rows } = await this.db.query(
      'SELECT status::text AS status, count(*)::int AS count FROM run_jobs GROUP BY status'
    );

    const stats: JobStats = { pending: 0, running: 0, completed: 0, failed: 0 };
    for (const row of rows) {
      const parsed = StatsRowSchema.parse(row);
      stats[parsed.status] = parsed.count;
    }
    return stats;
  }
}
