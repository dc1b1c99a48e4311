/**
 * Transaction helper
 * Runs a callback on a dedicated client between BEGIN and COMMIT,
 * rolling back on any thrown error.
 */

import { Pool, PoolClient } from 'pg';

export interface TransactionOptions {
  /** Transaction-local statement timeout in milliseconds */
  statementTimeoutMs?: number;
}

/**
 * Execute a callback within a transaction.
 *
 * @param pool - PostgreSQL connection pool
 * @param fn - Callback receiving the client within the transaction
 * @param options - Optional transaction-local settings
 */
export async function withTransaction<T>(
  pool: Pool,
  fn: (client: PoolClient) => Promise<T>,
  options: TransactionOptions = {},
): Promise<T> {
  const client = await pool.connect();
  // A client whose ROLLBACK failed is destroyed instead of returned to the pool
  let broken: Error | undefined;
  try {
    await client.query('BEGIN');

    if (options.statementTimeoutMs !== undefined) {
      // set_config(..., true) is LOCAL to the transaction
      await client.query(`SELECT set_config('statement_timeout', $1, true)`, [
        String(options.statementTimeoutMs),
      ]);
    }

    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      broken =
        rollbackError instanceof Error
          ? rollbackError
          : new Error('ROLLBACK failed');
    }
    throw error;
  } finally {
    client.release(broken);
  }
}
