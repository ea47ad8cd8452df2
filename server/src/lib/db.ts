import { Pool } from 'pg';

let pool: Pool | null = null;

/**
 * Shared database connection pool, created on first use
 */
export function getPool(connectionString: string): Pool {
  if (!pool) {
    pool = new Pool({ connectionString });
    pool.on('error', (err) => {
      console.error('[Postgres] Idle client error:', err.message);
    });
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
