import pg from 'pg';
import type { Pool as PgPool } from 'pg';
import { logger } from '../logger.js';

const { Pool } = pg;

/**
 * Create the connection pool. Nothing connects until the first query,
 * so building the pool never fails on its own.
 */
export function createPool(connectionString: string): PgPool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database error', err);
  });

  return pool;
}
