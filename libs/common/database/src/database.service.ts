/**
 * Portal Database Service
 * PostgreSQL connection pooling and query utilities
 */

import {
  Injectable,
  Logger,
  OnModuleInit,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import retry from 'async-retry';
import { withTransaction, TransactionOptions } from './with-transaction';

/** Anything that can run a parameterised query: the pool or a transaction client */
export type Queryable = Pick<PoolClient, 'query'>;

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool | null = null;

  // Retries suit single idempotent statements; multi-statement writes use transaction()
  private readonly RETRIES = 3;

  constructor(private configService: ConfigService) {}

  async onModuleInit() {
    const databaseUrl = this.configService.get<string>('databaseUrl');
    if (!databaseUrl) {
      throw new Error('databaseUrl is required');
    }

    this.pool = new Pool({
      connectionString: databaseUrl,
      min: 2,
      max: 20,
      connectionTimeoutMillis: 10000,
      idleTimeoutMillis: 30000,
    });

    this.pool.on('error', (error) => {
      this.logger.error(`Unexpected pool error: ${error.message}`, error.stack);
    });

    this.logger.log('Database pool initialized');
  }

  async onModuleDestroy() {
    await this.pool?.end();
  }

  /**
   * Get the connection pool
   */
  getPool(): Pool {
    if (!this.pool) {
      throw new Error('Database pool is not initialized');
    }
    return this.pool;
  }

  /**
   * Execute query with retry logic
   */
  async query<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params: unknown[] = [],
  ): Promise<QueryResult<T>> {
    const pool = this.getPool();
    return retry(
      async () => {
        return pool.query<T>(sql, params);
      },
      {
        retries: this.RETRIES,
        minTimeout: 200,
        maxTimeout: 2000,
        onRetry: (error: unknown, attempt: number) => {
          this.logger.warn(
            `Query retry attempt ${attempt}/${this.RETRIES}: ${
              error instanceof Error ? error.message : String(error)
            }`,
          );
        },
      },
    );
  }

  /**
   * Execute query and return single row
   */
  async queryOne<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params: unknown[] = [],
  ): Promise<T | null> {
    const result = await this.query<T>(sql, params);
    return result.rows[0] ?? null;
  }

  /**
   * Execute query and return all rows
   */
  async queryMany<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params: unknown[] = [],
  ): Promise<T[]> {
    const result = await this.query<T>(sql, params);
    return result.rows;
  }

  /**
   * Run a callback inside a single transaction
   */
  async transaction<T>(
    fn: (client: Queryable) => Promise<T>,
    options?: TransactionOptions,
  ): Promise<T> {
    return withTransaction(this.getPool(), fn, options);
  }

  /**
   * Liveness probe for the health endpoint
   */
  async ping(): Promise<boolean> {
    try {
      await this.getPool().query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.warn(
        `Database ping failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }
}
