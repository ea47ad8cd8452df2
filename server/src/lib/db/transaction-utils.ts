/**
 * Transaction utility functions shared by the repositories and create services
 */

import { QueryResult, QueryResultRow } from 'pg';

/**
 * Anything that can run a query: a pg Pool, a PoolClient, or a test fake
 */
export interface QueryExecutor {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface TransactionClient extends QueryExecutor {
  release(): void;
}

export interface ConnectionPool extends QueryExecutor {
  connect(): Promise<TransactionClient>;
}

/**
 * Execute a callback within a transaction
 *
 * Commits when the callback resolves and rolls back when it throws. The
 * original error is rethrown even if the rollback itself fails.
 *
 * @example
 * const id = await withTransaction(pool, async (client) => {
 *   const result = await client.query('INSERT INTO ... RETURNING id');
 *   return result.rows[0].id;
 * });
 */
export async function withTransaction<T>(
  pool: ConnectionPool,
  callback: (client: TransactionClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      console.error('Failed to rollback transaction:', rollbackError);
    }
    throw error;
  } finally {
    client.release();
  }
}
