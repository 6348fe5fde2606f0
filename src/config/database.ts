import pg from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { config } from '@/config/config';
import { logger } from '@/utils/logger';
import * as schema from '@/db/schema';

export type Database = NodePgDatabase<typeof schema>;

export const pool = new pg.Pool({ connectionString: config.databaseUrl });

pool.on('error', (error) => {
  logger.error(`Idle database client error: ${error.message}`);
});

export const db: Database = drizzle(pool, {
  schema,
  logger: config.nodeEnv === 'development'
    ? { logQuery: (query) => logger.debug(query) }
    : false
});

export const disconnect = async (): Promise<void> => {
  await pool.end();
};

export default db;
