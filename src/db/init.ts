import { DatabaseService } from '../config/database';
import { loadConfig, loadDotEnv } from '../config/environment';
import { logger } from '../utils/logger';
import { ensureSchema } from './schema';

/**
 * Creates the raw tables without running an ingestion
 */
const initDb = async (db: DatabaseService): Promise<void> => {
  await db.connect();
  try {
    await ensureSchema(db);
    console.log('✅ Database schema is ready.');
  } finally {
    await db.close();
  }
};

// Execute if this file is called directly
if (require.main === module) {
  loadDotEnv();
  Promise.resolve()
    .then(() => initDb(new DatabaseService(loadConfig().database)))
    .then(() => {
      process.exitCode = 0;
    })
    .catch((error) => {
      logger.error('schema_init_failed', { error });
      console.error('❌ Error initializing database schema.');
      process.exitCode = 1;
    });
}

export { initDb };
