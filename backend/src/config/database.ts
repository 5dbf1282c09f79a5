/**
 * config/database.ts — PostgreSQL connection via Drizzle ORM
 *
 * Uses node-postgres Pool for connection management.
 * One process-wide pool, created lazily, read-only use.
 */
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { env } from './env.ts';
import { childLogger } from '../shared/logger.ts';
import * as schema from '../db/schema.ts';

const { Pool } = pg;
const log = childLogger({ module: 'db' });

let pool: pg.Pool | null = null;
let db: NodePgDatabase<typeof schema> | null = null;

function createPool(): pg.Pool {
  const created = new Pool({
    user: env.DB_USER,
    password: env.DB_PASSWORD,
    host: env.DB_HOST,
    port: env.DB_PORT,
    database: env.DB_NAME,
    min: env.DB_POOL_MIN,
    max: env.DB_POOL_MAX,
    ssl: env.DB_SSL ? { rejectUnauthorized: false } : false,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
    query_timeout: env.DB_QUERY_TIMEOUT_MS,
  });

  created.on('error', (err) => {
    log.error({ err }, 'Unexpected pool error');
  });

  return created;
}

/**
 * Get the raw pg Pool (for health checks).
 */
export function getPool(): pg.Pool {
  if (!pool) pool = createPool();
  return pool;
}

/**
 * Get or create the Drizzle client. Safe to call multiple times.
 */
export function getDb(): NodePgDatabase<typeof schema> {
  if (db) return db;
  db = drizzle(getPool(), { schema });
  return db;
}

/**
 * Check database connectivity. Returns latency in ms or throws.
 */
export async function pingDb(): Promise<number> {
  const start = Date.now();
  const client = await getPool().connect();
  try {
    await client.query('SELECT 1');
    return Date.now() - start;
  } finally {
    client.release();
  }
}

/**
 * Gracefully close the pool. Call on shutdown.
 */
export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
    log.info('Connection pool closed');
  }
}

export type Database = NodePgDatabase<typeof schema>;
