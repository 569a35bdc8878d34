/**
 * Database Client Factory
 * Provides a narrow query interface for the Postgres repositories
 */

import pg from 'pg';
import type { Pool } from 'pg';

import { createLogger } from './logger/index.js';

/**
 * Database query result type
 */
export interface QueryResult<T> {
  rows: T[];
  rowCount: number | null;
}

/**
 * Database client interface
 * Satisfied by the pool wrapper below and by in-process fakes in tests
 */
export interface DatabaseClient {
  query<T>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
}

/**
 * Database pool interface for connection management
 */
export interface DatabasePool extends DatabaseClient {
  end(): Promise<void>;
}

export interface DatabaseConfig {
  connectionString: string;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

/**
 * PostgreSQL pool wrapper
 */
class PostgresPool implements DatabasePool {
  private readonly pool: Pool;
  private readonly logger = createLogger({ name: 'database' });

  constructor(config: DatabaseConfig) {
    const isProduction = process.env.NODE_ENV === 'production';

    this.pool = new pg.Pool({
      connectionString: config.connectionString,
      max: config.maxConnections ?? 10,
      idleTimeoutMillis: config.idleTimeoutMs ?? 30000,
      connectionTimeoutMillis: config.connectionTimeoutMs ?? 5000,
      ssl: isProduction ? { rejectUnauthorized: true } : undefined,
    });

    this.pool.on('error', (error) => {
      this.logger.error({ err: error }, 'Idle database client error');
    });
  }

  async query<T>(sql: string, params?: unknown[]): Promise<QueryResult<T>> {
    const result = await this.pool.query(sql, params);
    const rows: T[] = result.rows;
    return { rows, rowCount: result.rowCount };
  }

  async end(): Promise<void> {
    await this.pool.end();
    this.logger.info('Database pool closed');
  }
}

/**
 * Create a database pool
 *
 * @example
 * ```typescript
 * const db = createDatabasePool({ connectionString: process.env.DATABASE_URL });
 * const result = await db.query<ConversationRow>('SELECT * FROM conversations WHERE id = $1', [id]);
 * ```
 */
export function createDatabasePool(config: DatabaseConfig): DatabasePool {
  return new PostgresPool(config);
}
