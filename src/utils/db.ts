/**
 * PostgreSQL connection pool for the account directory.
 *
 * The server opens the pool once at startup from {@link DatabaseConfig};
 * queries made before that fail instead of connecting with defaults.
 * Errors raised by idle clients are logged rather than crashing the
 * process.
 *
 * @module utils/db
 */

import pg from 'pg';
import type { DatabaseConfig } from '../config/appConfig.js';
import type { Logger } from '../logging/logger.js';

const { Pool } = pg;

export function createPool(config: DatabaseConfig, logger: Logger): pg.Pool {
  const dbLogger = logger.child({ component: 'db' });
  const pool = new Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeoutMs,
    connectionTimeoutMillis: config.connectTimeoutMs,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
  });
  pool.on('error', (err) => {
    dbLogger.error('Idle database client failed', err);
  });
  return pool;
}

let pool: pg.Pool | null = null;

/** Open the shared pool. Later calls return the pool already open. */
export function openPool(config: DatabaseConfig, logger: Logger): pg.Pool {
  if (!pool) {
    pool = createPool(config, logger);
  }
  return pool;
}

export function getPool(): pg.Pool {
  if (!pool) {
    throw new Error('Database pool is not open');
  }
  return pool;
}

/** Run a parameterised query on the shared pool. */
export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<pg.QueryResult<T>> {
  return getPool().query<T>(text, params);
}

export async function closePool(): Promise<void> {
  if (pool) {
    const open = pool;
    pool = null;
    await open.end();
  }
}
