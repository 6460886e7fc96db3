/**
 * PostgreSQL Connection Pool
 *
 * Raw `pg` pool, no ORM. The repository only needs `query`, so it takes the
 * narrow `Queryable` shape and tests can hand it a plain function.
 */

import { Pool, type QueryResult, type QueryResultRow } from "pg";
import { createLogger, type Logger } from "@urlkit/logger";

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>;
}

export interface PoolOptions {
  connectionString: string;
  /** Maximum connections (default: 20) */
  max?: number;
  /** Connection acquisition timeout in ms (default: 2000) */
  connectionTimeoutMillis?: number;
  /** Idle connection lifetime in ms (default: 30000) */
  idleTimeoutMillis?: number;
  logger?: Logger;
}

/**
 * Create a connection pool. Connections open lazily on first query.
 */
export function createPool(options: PoolOptions): Pool {
  const logger = options.logger ?? createLogger("db");

  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.max ?? 20,
    idleTimeoutMillis: options.idleTimeoutMillis ?? 30000,
    connectionTimeoutMillis: options.connectionTimeoutMillis ?? 2000,
  });

  // An idle client losing its connection emits here; unhandled it would crash the process
  pool.on("error", (err) => {
    logger.error({ err }, "Idle PostgreSQL client error");
  });

  return pool;
}

export function asQueryable(pool: Pool): Queryable {
  return {
    query: (text, values) => pool.query<QueryResultRow>(text, values),
  };
}
