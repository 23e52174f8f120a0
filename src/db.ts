import pg from 'pg';
import { config } from './config.js';
import { createLogger } from './logger.js';

const { Pool } = pg;
const log = createLogger('db');

// Build SSL config based on DB_SSL and DB_SSL_MODE
function buildSslConfig(): false | pg.PoolConfig['ssl'] {
  if (!config.db.ssl) return false;

  // 'verify' = require valid cert chain (production default)
  // 'no-verify' = allow self-signed/private CA (for internal/dev environments)
  return {
    rejectUnauthorized: config.db.sslMode !== 'no-verify',
  };
}

// Creating the pool opens no connection; the first query does.
export const pool = new Pool({
  host: config.db.host,
  port: config.db.port,
  database: config.db.database,
  user: config.db.user,
  password: config.db.password,
  ssl: buildSslConfig(),
  connectionTimeoutMillis: config.db.poolConnectionTimeoutMs,
  idleTimeoutMillis: config.db.poolIdleTimeoutMs,
  max: config.db.poolMax,
});

// Handle unexpected errors on idle clients to prevent process crash
pool.on('error', (err) => {
  log.error({ err }, 'Unexpected error on idle database client');
});

export async function verifyDbConnection(): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query('SELECT 1');
  } finally {
    client.release();
  }
}
