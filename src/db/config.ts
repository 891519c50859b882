// src/db/config.ts

//======================= IMPORTS =======================//
/**
 * POSTGRESQL CLIENT IMPORTS
 * Pool: Manages database connections
 * PoolConfig: Type for pool configuration
 * PoolClient: Individual database connection
 */
import { Pool, PoolConfig, PoolClient } from 'pg';

import { config } from '@/config';
import logger from '@/utils/logger';

/**
 * DATABASE-SPECIFIC LOGGER
 * Groups all database-related logs under one module name.
 */
const dbLogger = logger.child({ module: 'database' });

//======================= POOL CONFIGURATION =======================//
/**
 * DATABASE POOL CONFIGURATION
 * DATABASE_URL takes precedence over the individual DB_* settings.
 */
const poolConfig: PoolConfig = {
  ...(config.db.url
    ? { connectionString: config.db.url }
    : {
        host: config.db.host,
        port: config.db.port,
        user: config.db.user,
        password: config.db.password,
        database: config.db.name,
      }),

  // Pool settings
  max: 20,

  // Timeout settings
  idleTimeoutMillis: 30000,      // Idle clients are closed after 30 seconds
  connectionTimeoutMillis: 2000, // Fail fast when the server is unreachable

  // Identifies this service in pg_stat_activity
  application_name: 'product_catalog_api',

  // Query timeouts
  statement_timeout: 10000,
  query_timeout: 10000,

  // Managed databases in production usually terminate TLS with their own CA
  ssl: config.isProduction
    ? { rejectUnauthorized: false }
    : undefined,
};

//======================= CONNECTION POOL =======================//
/**
 * CREATE CONNECTION POOL
 * No connection is opened until the first query.
 */
const pool = new Pool(poolConfig);

//======================= EVENT HANDLERS =======================//
pool.on('connect', (client) => {
  dbLogger.debug('New client connected to database');

  client.on('error', (err) => {
    dbLogger.error({ err }, 'Database client error');
  });
});

/**
 * POOL ERROR HANDLER
 * Fires for errors on idle clients. Without a listener pg would crash the process.
 */
pool.on('error', (err) => {
  dbLogger.error({ err }, 'Unexpected error on idle client');
});

pool.on('remove', () => {
  dbLogger.debug('Client removed from pool');
});

//======================= UTILITY FUNCTIONS =======================//
/**
 * TEST DATABASE CONNECTION
 * Used at start-up before the server accepts traffic.
 *
 * Throws: If connection fails
 */
export async function testConnection(): Promise<boolean> {
  let client: PoolClient | undefined;
  try {
    client = await pool.connect();

    const result = await client.query<{ version: string; now: Date }>('SELECT version(), NOW() as now');

    dbLogger.info({
      version: result.rows[0]?.version,
      timestamp: result.rows[0]?.now
    }, 'Database connection test successful');

    return true;
  } catch (error) {
    dbLogger.error({ error }, 'Database connection test failed');
    throw error;
  } finally {
    // Always release the client back to the pool
    if (client) {
      client.release();
    }
  }
}

/**
 * TRANSACTION HELPER
 *
 * How to use:
 * await withTransaction(async (client) => {
 *   await client.query('DELETE FROM products');
 *   await client.query('INSERT INTO products ...');
 * });
 */
export async function withTransaction<T>(
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * CLOSE POOL
 * Called on shutdown so in-flight queries can finish.
 */
export async function closePool(): Promise<void> {
  await pool.end();
  dbLogger.info('Database pool closed');
}

export default pool;
