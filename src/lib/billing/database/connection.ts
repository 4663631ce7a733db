// src/lib/billing/database/connection.ts
import { Pool, PoolClient, PoolConfig, QueryResult, QueryResultRow } from 'pg';
import { BillingLogger } from '../utils/logger';
import { DatabaseError, getErrorMessage } from '../utils/error';

/** Anything that can run a parameterized statement: the pool or a client in a transaction. */
export interface Queryable {
  query<R extends QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>>;
}

export interface Database extends Queryable {
  withTransaction<T>(work: (client: Queryable) => Promise<T>): Promise<T>;
}

export class DatabaseConnection implements Database {
  private static instance: DatabaseConnection | undefined;
  private pool: Pool;
  private logger: BillingLogger;

  private constructor(config: PoolConfig) {
    this.logger = new BillingLogger(undefined, 'DatabaseConnection');
    this.pool = new Pool(config);

    // Set up error handling for the pool
    this.pool.on('error', err => {
      this.logger.error('Unexpected database pool error', { error: err });
    });

    this.logger.info('Database connection pool initialized');
  }

  static getInstance(config?: PoolConfig): DatabaseConnection {
    if (!DatabaseConnection.instance) {
      DatabaseConnection.instance = new DatabaseConnection(
        config ?? {
          host: process.env.DB_HOST || 'localhost',
          port: parseInt(process.env.DB_PORT || '5432', 10),
          database: process.env.DB_NAME || 'billing',
          user: process.env.DB_USER || 'postgres',
          password: process.env.DB_PASSWORD || '',
          max: parseInt(process.env.DB_POOL_SIZE || '10', 10),
          idleTimeoutMillis: 30000
        }
      );
    }

    return DatabaseConnection.instance;
  }

  async query<R extends QueryResultRow>(text: string, params: unknown[] = []): Promise<QueryResult<R>> {
    const start = Date.now();

    try {
      const result = await this.pool.query<R>(text, params);

      this.logger.debug('Executed query', {
        duration: Date.now() - start,
        rowCount: result.rowCount
      });

      return result;
    } catch (error) {
      this.logger.error('Query error', {
        error,
        duration: Date.now() - start,
        query: text
      });

      throw error;
    }
  }

  /**
   * Runs `work` inside BEGIN/COMMIT on a dedicated client, rolling back on any
   * error. The client is always released.
   */
  async withTransaction<T>(work: (client: Queryable) => Promise<T>): Promise<T> {
    const client: PoolClient = await this.pool.connect();
    const queryable: Queryable = {
      query: <R extends QueryResultRow>(text: string, params: unknown[] = []) => client.query<R>(text, params)
    };

    try {
      await client.query('BEGIN');
      const result = await work(queryable);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.logger.error('Rollback failed', { error: rollbackError });
      }

      this.logger.error('Transaction failed', { error: getErrorMessage(error) });
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    DatabaseConnection.instance = undefined;
    this.logger.info('Database connection pool closed');
  }
}

/** Wraps driver failures so stores surface a single error type. */
export function wrapDatabaseError(error: unknown, message: string, context?: Record<string, unknown>): DatabaseError {
  return error instanceof DatabaseError ? error : new DatabaseError(message, error, context);
}

/** Postgres SQLSTATE for unique_violation. */
export function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}
