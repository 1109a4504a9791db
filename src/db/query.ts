/**
 * Query helpers shared by the PostgreSQL repositories
 */

import type { Pool, QueryResult, QueryResultRow } from 'pg';
import { StoreError } from '../types/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ module: 'db-query' });

/** Queries slower than this are logged */
const SLOW_QUERY_MS = 100;

export type PgQueryable = Pick<Pool, 'query'>;

export type PgTransactional = Pick<Pool, 'query' | 'connect'>;

/**
 * Execute a query, logging slow statements and wrapping driver errors in
 * a StoreError tagged with the operation name.
 */
export async function runQuery<T extends QueryResultRow = QueryResultRow>(
  pool: PgQueryable,
  operation: string,
  text: string,
  params: unknown[] = []
): Promise<QueryResult<T>> {
  const start = Date.now();
  try {
    const result = await pool.query<T>(text, params);
    const duration = Date.now() - start;

    if (duration > SLOW_QUERY_MS) {
      logger.warn({ operation, duration, rows: result.rowCount }, 'Slow query detected');
    }

    return result;
  } catch (error) {
    logger.error({ operation, error: error instanceof Error ? error.message : String(error) }, 'Query error');
    throw StoreError.wrap(operation, error);
  }
}
