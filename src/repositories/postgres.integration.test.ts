import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import type { Pool } from 'pg';
import { PostgresJobRepository } from './postgres.js';
import { createPool, poolClient } from './sql.js';

const databaseUrl = process.env.DATABASE_URL;

describe.skipIf(!databaseUrl)('PostgresJobRepository Integration', () => {
  let pool: Pool;
  let repo: PostgresJobRepository;

  beforeAll(async () => {
    pool = createPool(databaseUrl ?? '');
    repo = new PostgresJobRepository(poolClient(pool));
    await repo.migrate();
  });

  beforeEach(async () => {
    await pool.query('TRUNCATE run_jobs');
  });

  afterAll(async () => {
    await pool?.end();
  });

  it('should create and retrieve a job', async () => {
    const created = await repo.createPending({ skillId: '1', requestedBy: '2', inputText: 'hello' });
    const retrieved = await repo.get(created.id);

    expect(retrieved).toEqual(created);
  });

  it('should hand one pending job to exactly one of many concurrent claimants', async () => {
    const created = await repo.createPending({ skillId: '1', requestedBy: '2' });

    const results = await Promise.all(Array.from({ length: 8 }, () => repo.claimNext()));
    const winners = results.filter(r => r !== null);

    expect(winners).toHaveLength(1);
    expect(winners[0]!.id).toBe(created.id);
  });

  it('should claim every job exactly once under contention', async () => {
    for (let i = 0; i < 12; i++) {
      await repo.createPending({ skillId: '1', requestedBy: '2', inputText: String(i) });
    }

    const results = await Promise.all(Array.from({ length: 20 }, () => repo.claimNext()));
    const ids = results.flatMap(r => (r ? [r.id] : []));

    expect(ids).toHaveLength(12);
    expect(new Set(ids).size).toBe(12);
  });

  it('should ignore terminal writes on jobs that are not running', async () => {
    const created = await repo.createPending({ skillId: '1', requestedBy: '2' });

    expect(await repo.complete(created.id, 'early')).toBe(false);
    expect(await repo.get(created.id)).toEqual(created);

    await repo.claimNext();
    expect(await repo.fail(created.id, 'boom')).toBe(true);
    expect(await repo.complete(created.id, 'late')).toBe(false);

    const stored = await repo.get(created.id);
    expect(stored!.status).toBe('failed');
    expect(stored!.errorText).toBe('boom');
    expect(stored!.outputText).toBe('');
  });
});
