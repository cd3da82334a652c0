import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;

/** The slice of the pg pool the repositories use; lets tests pass a fake. */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
}

let _pool: pg.Pool | null = null;

/** Lazily created; the connection string only applies to the first call. */
export function getPool(connectionString: string | undefined = process.env['DATABASE_URL']): pg.Pool {
  if (!_pool) {
    _pool = new Pool({
      connectionString,
      max: 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: 'fleet-ledger-api',
    });
    _pool.on('error', (err) => {
      console.error('[pg-pool] unexpected error on idle client', err);
    });
  }
  return _pool;
}

export async function closePool(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
  }
}
