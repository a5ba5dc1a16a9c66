import { Pool } from 'pg';
import { createLogger, errorMessage } from '@bookwell/shared';
import { applyMigrations } from './migrator';

const logger = createLogger({ name: 'db:migrate' });

async function migrate() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const pool = new Pool({ connectionString: databaseUrl });
  const client = await pool.connect();

  try {
    const applied = await applyMigrations(client);
    for (const name of applied) {
      logger.info({ migration: name }, 'Applied migration');
    }
    logger.info({ count: applied.length }, 'All migrations applied');
  } finally {
    client.release();
    await pool.end();
  }
}

migrate().catch((err) => {
  logger.fatal({ err: errorMessage(err) }, 'Migration failed');
  process.exit(1);
});
