import { describe, it, expect, beforeEach } from 'vitest';
import { CLAIM_SQL, COMPLETE_SQL, FAIL_SQL, PostgresJobRepository } from './postgres.js';
import type { SqlClient } from './sql.js';

interface RecordedQuery {
  text: string;
  values?: unknown[];
}

class FakeSqlClient implements SqlClient {
  queries: RecordedQuery[] = [];
  responses: { rows: unknown[]; rowCount: number | null }[] = [];

  async query(text: string, values?: unknown[]) {
    this.queries.push({ text, values });
    return this.responses.shift() ?? { rows: [], rowCount: 0 };
  }
}

const JOB_ID = '0b8f5c3e-6a1d-4c8e-9f2a-3b4c5d6e7f80';

function jobRow(overrides: Record<string, unknown> = {}) {
  return {
    id: JOB_ID,
    skill_id: '42',
    requested_by: '7',
    input_text: 'hello',
    status: 'pending',
    output_text: '',
    error_text: '',
    created_at: new Date('2024-05-01T10:00:00.000Z'),
    updated_at: new Date('2024-05-01T10:00:00.000Z'),
    ...overrides,
  };
}

describe('PostgresJobRepository', () => {
  let db: FakeSqlClient;
  let repo: PostgresJobRepository;

  beforeEach(() => {
    db = new FakeSqlClient();
    repo = new PostgresJobRepository(db);
  });

  describe('claimNext', () => {
    it('should claim with a single skip-locked statement', async () => {
      db.responses.push({ rows: [{ id: JOB_ID, skill_id: '42', input_text: 'hello' }], rowCount: 1 });

      const claimed = await repo.claimNext();

      expect(claimed).toEqual({ id: JOB_ID, skillId: '42', inputText: 'hello' });
      expect(db.queries).toHaveLength(1);
      expect(db.queries[0].text).toBe(CLAIM_SQL);
      expect(CLAIM_SQL).toContain('FOR UPDATE SKIP LOCKED');
      expect(CLAIM_SQL).toContain("WHERE j.id = candidate.id AND j.status = 'pending'");
      expect(CLAIM_SQL).toContain('ORDER BY created_at ASC');
    });

    it('should claim a job whose skill id is an integer', async () => {
      db.responses.push({ rows: [{ id: JOB_ID, skill_id: 42, input_text: 'hello' }], rowCount: 1 });

      const claimed = await repo.claimNext();

      expect(claimed).toEqual({ id: JOB_ID, skillId: '42', inputText: 'hello' });
      expect(CLAIM_SQL).toContain('j.skill_id::text AS skill_id');
    });

    it('should return null when no row was updated', async () => {
      db.responses.push({ rows: [], rowCount: 0 });

      expect(await repo.claimNext()).toBeNull();
    });
  });

  describe('complete and fail', () => {
    it('should update only a running job and report the match', async () => {
      db.responses.push({ rows: [], rowCount: 1 });

      expect(await repo.complete(JOB_ID, 'echo: hello')).toBe(true);
      expect(db.queries[0]).toEqual({ text: COMPLETE_SQL, values: [JOB_ID, 'echo: hello'] });
      expect(COMPLETE_SQL).toContain("WHERE id = $1 AND status = 'running'");
    });

    it('should tolerate a no-match as already resolved', async () => {
      db.responses.push({ rows: [], rowCount: 0 });

      expect(await repo.fail(JOB_ID, 'content not found')).toBe(false);
      expect(db.queries[0]).toEqual({ text: FAIL_SQL, values: [JOB_ID, 'content not found'] });
    });

    it('should not query for ids that are not UUIDs', async () => {
      expect(await repo.complete('not-a-uuid', 'x')).toBe(false);
      expect(await repo.fail('not-a-uuid', 'x')).toBe(false);
      expect(db.queries).toHaveLength(0);
    });
  });

  describe('createPending', () => {
    it('should insert a pending row and map it', async () => {
      db.responses.push({ rows: [jobRow()], rowCount: 1 });

      const job = await repo.createPending({ skillId: '42', requestedBy: '7', inputText: 'hello' });

      expect(job).toEqual({
        id: JOB_ID,
        skillId: '42',
        requestedBy: '7',
        inputText: 'hello',
        status: 'pending',
        outputText: '',
        errorText: '',
        createdAt: new Date('2024-05-01T10:00:00.000Z'),
        updatedAt: new Date('2024-05-01T10:00:00.000Z'),
      });
      const values = db.queries[0].values ?? [];
      expect(values.slice(1)).toEqual(['42', '7', 'hello']);
      expect(String(values[0])).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should default input text to empty', async () => {
      db.responses.push({ rows: [jobRow({ input_text: '' })], rowCount: 1 });

      await repo.createPending({ skillId: '42', requestedBy: '7' });

      expect(db.queries[0].values?.[3]).toBe('');
    });
  });

  describe('get', () => {
    it('should return null without querying for a malformed id', async () => {
      expect(await repo.get('123')).toBeNull();
      expect(db.queries).toHaveLength(0);
    });

    it('should return null when the row is missing', async () => {
      db.responses.push({ rows: [], rowCount: 0 });
      expect(await repo.get(JOB_ID)).toBeNull();
    });

    it('should parse timestamps delivered as strings', async () => {
      db.responses.push({
        rows: [jobRow({ status: 'completed', output_text: 'done', updated_at: '2024-05-01T10:00:05.000Z' })],
        rowCount: 1,
      });

      const job = await repo.get(JOB_ID);

      expect(job!.status).toBe('completed');
      expect(job!.outputText).toBe('done');
      expect(job!.updatedAt).toEqual(new Date('2024-05-01T10:00:05.000Z'));
    });

    it('should read rows whose ids are stored as integers', async () => {
      db.responses.push({ rows: [jobRow({ skill_id: 42, requested_by: 7 })], rowCount: 1 });

      const job = await repo.get(JOB_ID);

      expect(job?.skillId).toBe('42');
      expect(job?.requestedBy).toBe('7');
      expect(db.queries[0].text).toContain('skill_id::text AS skill_id');
      expect(db.queries[0].text).toContain('requested_by::text AS requested_by');
      expect(db.queries[0].text).toContain('status::text AS status');
    });

    it('should reject a row with an unknown status', async () => {
      db.responses.push({ rows: [jobRow({ status: 'queued' })], rowCount: 1 });

      await expect(repo.get(JOB_ID)).rejects.toThrow();
    });
  });

  describe('find', () => {
    it('should build filters and fetch one extra row for the cursor', async () => {
      db.responses.push({ rows: [jobRow()], rowCount: 1 });

      const page = await repo.find({ requestedBy: '7', status: 'pending', limit: 10 });

      expect(page.jobs).toHaveLength(1);
      expect(page.nextCursor).toBeUndefined();
      expect(db.queries[0].text).toContain('WHERE requested_by = $1 AND status = $2');
      expect(db.queries[0].text).toContain('ORDER BY created_at DESC, id DESC LIMIT $3');
      expect(db.queries[0].values).toEqual(['7', 'pending', 11]);
    });

    it('should return a next cursor when more rows exist', async () => {
      const second = 'aa8f5c3e-6a1d-4c8e-9f2a-3b4c5d6e7f81';
      db.responses.push({ rows: [jobRow(), jobRow({ id: second })], rowCount: 2 });

      const page = await repo.find({ limit: 1 });

      expect(page.jobs.map(job => job.id)).toEqual([JOB_ID]);
      expect(page.nextCursor).toBe(JOB_ID);
    });

    it('should return an empty page for a malformed cursor', async () => {
      expect(await repo.find({ cursor: 'nope' })).toEqual({ jobs: [] });
      expect(db.queries).toHaveLength(0);
    });
  });

  describe('getStats', () => {
    it('should fill missing statuses with zero', async () => {
      db.responses.push({ rows: [{ status: 'pending', count: 3 }, { status: 'failed', count: '2' }], rowCount: 2 });

      expect(await repo.getStats()).toEqual({ pending: 3, running: 0, completed: 0, failed: 2 });
    });
  });

  it('should create the table on migrate', async () => {
    await repo.migrate();

    expect(db.queries[0].text).toContain('CREATE TABLE IF NOT EXISTS run_jobs');
    expect(db.queries[0].text).toContain("CHECK (status IN ('pending', 'running', 'completed', 'failed'))");
  });
});
