import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { pool, disconnect } from '@/config/database';
import { logger } from '@/utils/logger';

const schemaPath = fileURLToPath(new URL('./schema.sql', import.meta.url));

async function migrate() {
  try {
    logger.info('🔧 Applying database schema...');

    const ddl = await readFile(schemaPath, 'utf8');
    await pool.query(ddl);

    logger.info('✅ Database schema is up to date');
  } catch (error) {
    logger.error(`❌ Migration failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  } finally {
    await disconnect();
  }
}

void migrate();
