/**
 * PostgreSQL database connection pool
 * Manages database connections with proper configuration and error handling
 */

import pg from 'pg';
import { createLogger } from '../utils/logger.js';
import '../config/env.js';

const { Pool } = pg;

const logger = createLogger({ module: 'db' });

/**
 * Database configuration from environment variables
 */
const dbConfig: pg.PoolConfig = {
  // Support both individual config vars and DATABASE_URL
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  database: process.env.DB_NAME || 'threadline',
  user: process.env.DB_USER || 'postgres',
  password: process.env.DB_PASSWORD,
  connectionString: process.env.DATABASE_URL,

  // SSL configuration for hosted databases
  ssl: process.env.DATABASE_URL && process.env.DB_SSL !== 'false'
    ? { rejectUnauthorized: false }
    : undefined,

  // Connection pool configuration
  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
};

/**
 * Create a connection pool. The pool is created lazily by the server so
 * that the in-memory record store never opens a connection.
 */
export function createPool(): pg.Pool {
  const pool = new Pool(dbConfig);

  // Errors on idle clients are typically network errors or database restarts
  pool.on('error', (err: Error) => {
    logger.error({ error: err }, 'Unexpected error on idle database client');
  });

  return pool;
}

/**
 * Test database connection
 * Useful for startup checks and health endpoints
 */
export async function testConnection(pool: pg.Pool): Promise<boolean> {
  try {
    const result = await pool.query<{ now: Date }>('SELECT NOW() AS now');
    logger.info({ at: result.rows[0]?.now }, 'Database connected');
    return true;
  } catch (error) {
    logger.error({ error }, 'Database connection failed');
    return false;
  }
}

// Export types for convenience
export type { Pool, PoolClient, QueryResult } from 'pg';
