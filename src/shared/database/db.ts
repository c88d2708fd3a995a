/**
 * =============================================================================
 * DATABASE SERVICE - PostgreSQL connection pool
 * =============================================================================
 *
 * One lazily created pg Pool per process.
 *
 * Every request works through a scoped client:
 *   withClient(fn)       - borrow a client, always released
 *   withTransaction(fn)  - borrow a client, BEGIN / COMMIT, ROLLBACK on error
 *
 * Nothing outside this file calls pool.connect() or client.release().
 * =============================================================================
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { Pool, PoolClient } from 'pg';
import { config } from '../../config/environment';
import { logger } from '../services/logger.service';

/**
 * Anything that can run a parameterised query (Pool or PoolClient)
 */
export type Queryable = Pick<PoolClient, 'query'>;

export type IsolationLevel = 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

export interface TransactionOptions {
  isolationLevel?: IsolationLevel;
  readOnly?: boolean;
}

/**
 * Runs `work` against a repository bound to one transaction.
 * Services depend on this signature so tests can hand in an in-memory repository.
 */
export type UnitOfWork<R> = <T>(
  work: (repository: R) => Promise<T>,
  options?: TransactionOptions
) => Promise<T>;

// <root>/sql/schema.sql; src/shared/database and dist/shared/database sit at the same depth
const SCHEMA_FILE = path.resolve(__dirname, '../../../sql/schema.sql');

let pool: Pool | null = null;

/**
 * Get (or create) the shared pool
 */
export function getPool(): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: config.database.url,
      max: config.database.poolMax,
      ssl: config.database.ssl ? { rejectUnauthorized: false } : undefined,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000
    });

    // Idle client errors would otherwise crash the process
    pool.on('error', (error) => {
      logger.error('Idle database client error', { error: error.message });
    });
  }

  return pool;
}

/**
 * Borrow a client for the duration of `work`; released even if `work` throws
 */
export async function withClient<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    return await work(client);
  } finally {
    client.release();
  }
}

/**
 * Run `work` inside BEGIN / COMMIT on a single client.
 * Any error rolls the transaction back and is rethrown.
 */
export function withTransaction<T>(
  work: (client: Queryable) => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> {
  return withClient(async (client) => {
    await client.query(buildBeginStatement(options));
    try {
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        logger.error('Transaction rollback failed', {
          error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError)
        });
      }
      throw error;
    }
  });
}

/**
 * Bind a repository factory to withTransaction
 */
export function createUnitOfWork<R>(createRepository: (client: Queryable) => R): UnitOfWork<R> {
  return (work, options) => withTransaction((client) => work(createRepository(client)), options);
}

/**
 * BEGIN statement for the requested isolation / access mode
 */
export function buildBeginStatement(options: TransactionOptions = {}): string {
  const parts = ['BEGIN'];
  if (options.isolationLevel) {
    parts.push(`ISOLATION LEVEL ${options.isolationLevel}`);
  }
  if (options.readOnly) {
    parts.push('READ ONLY');
  }
  return parts.join(' ');
}

/**
 * Create missing tables from sql/schema.sql (idempotent)
 */
export async function ensureSchema(): Promise<void> {
  const ddl = await readFile(SCHEMA_FILE, 'utf8');
  await getPool().query(ddl);
  logger.info('Database schema ensured', { file: SCHEMA_FILE });
}

/**
 * Round-trip check used by the readiness probe
 */
export async function pingDatabase(): Promise<boolean> {
  try {
    await getPool().query('SELECT 1');
    return true;
  } catch (error) {
    logger.warn('Database ping failed', { error: error instanceof Error ? error.message : String(error) });
    return false;
  }
}

/**
 * Drain and close the pool (graceful shutdown)
 */
export async function closePool(): Promise<void> {
  if (!pool) return;
  const closing = pool;
  pool = null;
  await closing.end();
  logger.info('Database pool closed');
}
