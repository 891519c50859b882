// src/db/init.ts

//======================= IMPORTS =======================//
import { readFile } from 'fs/promises';
import { join } from 'path';

import { closePool, withTransaction } from './config';
import logger from '@/utils/logger';

const initLogger = logger.child({ module: 'db-init' });

//======================= DATABASE INITIALIZATION =======================//
/**
 * DATABASE INITIALIZER
 * Applies schema.sql in one transaction, so a failing statement
 * leaves no half-created tables behind.
 */
export async function initializeDatabase(): Promise<void> {
  const schemaPath = join(__dirname, 'schema.sql');
  const schemaSQL = await readFile(schemaPath, 'utf8');

  await withTransaction(async (client) => {
    await client.query(schemaSQL);
  });

  initLogger.info({ schemaPath }, '✅ Database schema created successfully');
}

//======================= EXECUTION =======================//
/**
 * Run directly with `npm run db:init`.
 */
if (require.main === module) {
  initLogger.info('Starting database initialization...');
  initializeDatabase()
    .then(() => closePool())
    .catch((error: unknown) => {
      initLogger.error({ error }, '❌ Error initializing database');
      process.exit(1);
    });
}
