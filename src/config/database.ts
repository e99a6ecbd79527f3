import { Pool, QueryResult, QueryResultRow } from 'pg';
import { config } from './config';
import { logger, logQuery, logTransaction } from '../utils/logger';
import { handleDatabaseError, isRetryableDatabaseError, translateDatabaseError } from '../utils/errors';
import { IsolationLevel } from '../types/config.types';

/**
 * Anything that runs parameterized SQL: the pool or a checked-out client
 */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<QueryResult<QueryResultRow>>;
}

export interface TransactionClient extends Queryable {
  release(error?: Error): void;
}

export interface TransactionRunOptions {
  isolationLevel: IsolationLevel;
  retries: number;
}

/**
 * Fill in transaction settings the caller left out.
 * Serialization failures only arise above READ COMMITTED, so a stricter level
 * opts in to `ledger.transactionRetries` retries; an explicit count wins.
 */
export function resolveTransactionOptions(
  options: Partial<TransactionRunOptions> = {}
): TransactionRunOptions {
  const isolationLevel = options.isolationLevel ?? config.ledger.isolationLevel;
  const defaultRetries = isolationLevel === 'read committed' ? 0 : config.ledger.transactionRetries;
  return { isolationLevel, retries: options.retries ?? defaultRetries };
}

/**
 * Run `work` inside BEGIN/COMMIT on a freshly acquired client.
 * Rolls back on any error and reruns the whole scope on serialization
 * failures and deadlocks while retries remain.
 */
export async function runInTransaction<T>(
  acquire: () => Promise<TransactionClient>,
  work: (client: Queryable) => Promise<T>,
  options: TransactionRunOptions
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    const start = Date.now();
    const client = await acquire();
    let released = false;

    try {
      await client.query(`BEGIN ISOLATION LEVEL ${options.isolationLevel.toUpperCase()}`);
      const result = await work(client);
      await client.query('COMMIT');
      logTransaction('commit', attempt, Date.now() - start);
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        // The connection is unusable; hand it back to be destroyed
        logger.error('Rollback failed:', {
          error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
        });
        client.release(rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError)));
        released = true;
      }

      if (isRetryableDatabaseError(error) && attempt <= options.retries) {
        logTransaction('retry', attempt, Date.now() - start);
        continue;
      }

      logTransaction('rollback', attempt, Date.now() - start);
      throw translateDatabaseError(error);
    } finally {
      if (!released) {
        client.release();
      }
    }
  }
}

/**
 * PostgreSQL connection pool
 * Manages database connections efficiently
 */
export class Database implements Queryable {
  private pool: Pool;
  private isConnected: boolean = false;

  constructor() {
    this.pool = new Pool({
      connectionString: config.database.connectionString,
      host: config.database.host,
      port: config.database.port,
      database: config.database.database,
      user: config.database.user,
      password: config.database.password,
      ssl: config.database.ssl
        ? {
            rejectUnauthorized: false, // For managed hosts with self-signed chains
          }
        : false,
      max: config.database.max,
      idleTimeoutMillis: config.database.idleTimeoutMillis,
      connectionTimeoutMillis: config.database.connectionTimeoutMillis,
    });

    // Handle pool errors
    this.pool.on('error', (err) => {
      logger.error('Unexpected database pool error:', err);
    });

    // Handle successful connection
    this.pool.on('connect', () => {
      if (!this.isConnected) {
        logger.info('Database pool connected successfully');
        this.isConnected = true;
      }
    });
  }

  /**
   * Execute a query with parameters
   */
  async query(text: string, params?: unknown[]): Promise<QueryResult<QueryResultRow>> {
    const start = Date.now();

    try {
      const result = await this.pool.query<QueryResultRow>(text, params);
      logQuery(text, Date.now() - start, result.rowCount);
      return result;
    } catch (error) {
      logger.debug('Database query failed:', { query: text.substring(0, 100) });
      handleDatabaseError(error);
    }
  }

  /**
   * Get a client from the pool for transactions
   */
  async getClient(): Promise<TransactionClient> {
    try {
      const client = await this.pool.connect();
      logger.debug('Client acquired from pool');
      return {
        query: async (text: string, params?: unknown[]) => {
          const start = Date.now();
          const result = await client.query<QueryResultRow>(text, params);
          logQuery(text, Date.now() - start, result.rowCount);
          return result;
        },
        release: (error?: Error) => client.release(error),
      };
    } catch (error) {
      logger.error('Failed to acquire database client:', error);
      throw error;
    }
  }

  /**
   * Run a scoped transaction on one pooled client
   */
  async withTransaction<T>(
    work: (client: Queryable) => Promise<T>,
    options: Partial<TransactionRunOptions> = {}
  ): Promise<T> {
    return runInTransaction(() => this.getClient(), work, resolveTransactionOptions(options));
  }

  /**
   * Test database connection
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await this.query('SELECT NOW() as now');
      logger.info('Database connection test successful:', {
        timestamp: result.rows[0].now,
      });
      return true;
    } catch (error) {
      logger.error('Database connection test failed:', error);
      return false;
    }
  }

  /**
   * Close all connections in the pool
   */
  async close(): Promise<void> {
    try {
      await this.pool.end();
      this.isConnected = false;
      logger.info('Database pool closed');
    } catch (error) {
      logger.error('Error closing database pool:', error);
      throw error;
    }
  }
}

// Export singleton instance
export const db = new Database();
