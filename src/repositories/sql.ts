import pg from 'pg';
import type { Pool } from 'pg';

/** The slice of a pg pool the stores use; tests substitute a recording fake. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export function createPool(connectionString: string): Pool {
  return new pg.Pool({ connectionString });
}

export function poolClient(pool: Pool): SqlClient {
  return {
    query: (text, values) => pool.query(text, values),
  };
}
