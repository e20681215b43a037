/**
 * PostgreSQL Database Connection
 */

import pg from 'pg';
import type { Pool as PgPool, QueryResultRow } from 'pg';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { SCHEMA } from './schema.js';

const { Pool } = pg;

let pool: PgPool | null = null;

/**
 * Get the initialized pool
 */
export function getPool(): PgPool {
  if (!pool) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return pool;
}

/**
 * Initialize database connection pool and schema
 */
export async function initDatabase(connectionString: string | undefined = config.database.url): Promise<void> {
  if (pool) {
    logger.debug('Database pool already initialized');
    return;
  }

  if (!connectionString) {
    throw new Error('DATABASE_URL is not set.');
  }

  const candidate = new Pool({
    connectionString,
    max: 5,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  candidate.on('error', (error) => {
    logger.error({ error }, 'Idle database client error');
  });

  // Test connection
  try {
    const client = await candidate.connect();
    logger.info('Database connection established');
    client.release();
  } catch (error) {
    logger.fatal({ error }, 'Failed to connect to database');
    await candidate.end();
    throw error;
  }

  pool = candidate;

  await initSchema();
}

/**
 * Initialize database schema
 */
async function initSchema(): Promise<void> {
  try {
    await getPool().query(SCHEMA);
    logger.info('Database schema initialized');
  } catch (error) {
    logger.error({ error }, 'Failed to initialize schema');
    throw error;
  }
}

/**
 * Execute a query and return rows
 */
export async function query<T extends QueryResultRow = Record<string, unknown>>(
  text: string,
  params?: unknown[]
): Promise<T[]> {
  const result = await getPool().query<T>(text, params);
  return result.rows;
}

/**
 * Execute a query and return first row or null
 */
export async function queryOne<T extends QueryResultRow = Record<string, unknown>>(
  text: string,
  params?: unknown[]
): Promise<T | null> {
  const result = await getPool().query<T>(text, params);
  return result.rows[0] ?? null;
}

/**
 * Check that the database answers
 */
export async function pingDatabase(): Promise<boolean> {
  try {
    await getPool().query('SELECT 1');
    return true;
  } catch (error) {
    logger.warn({ error }, 'Database ping failed');
    return false;
  }
}

/**
 * Close database connection pool
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('Database connection pool closed');
  }
}
