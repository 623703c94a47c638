import { promises as fs } from 'fs';
import { join } from 'path';
import dotenv from 'dotenv';
import { Pool } from 'pg';
import { closePool, createPool } from './client';
import { loadConfig } from '../utils/config';
import { logger } from '../utils/logger';

async function runMigrations(pool: Pool): Promise<string[]> {
     const migrationsDir = join(__dirname, 'migrations');

     const files = await fs.readdir(migrationsDir);
     const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort();

     logger.info({ count: sqlFiles.length }, 'Running database migrations');

     for (const file of sqlFiles) {
          const sql = await fs.readFile(join(migrationsDir, file), 'utf-8');

          logger.info({ file }, 'Executing migration');
          await pool.query(sql);
          logger.info({ file }, 'Migration completed');
     }

     logger.info('All migrations completed successfully');
     return sqlFiles;
}

async function main(): Promise<void> {
     dotenv.config();
     const pool = createPool(loadConfig().database);
     try {
          await runMigrations(pool);
     } finally {
          await closePool(pool);
     }
}

// Run if executed directly
if (require.main === module) {
     main().catch((err) => {
          logger.error({ err }, 'Migration failed');
          process.exit(1);
     });
}

export { runMigrations };
