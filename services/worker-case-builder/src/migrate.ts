/**
 * Database Migration Runner
 *
 * Runs SQL migration files on startup.
 */

import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { config, logger } from '@tenantcase/shared';

const pool = new Pool({
  connectionString: config.databaseUrl,
});

function resolveMigrationsDir(): string {
  const candidates = [
    // Running from sources
    path.join(__dirname, 'migrations'),
    // Running from dist/ (SQL files are not copied by tsc)
    path.join(process.cwd(), 'services/worker-case-builder/src/migrations'),
  ];
  const found = candidates.find((dir) => fs.existsSync(dir));
  if (!found) {
    throw new Error(`Migrations directory not found (tried ${candidates.join(', ')})`);
  }
  return found;
}

async function runMigrations(): Promise<void> {
  const client = await pool.connect();

  try {
    logger.info('Running database migrations');

    const migrationsDir = resolveMigrationsDir();
    const migrationFiles = fs
      .readdirSync(migrationsDir)
      .filter((f) => f.endsWith('.sql'))
      .sort();

    for (const file of migrationFiles) {
      logger.info('Running migration', { file });

      const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
      await client.query(sql);

      logger.info('Migration complete', { file });
    }

    logger.info('All migrations complete');
  } catch (error) {
    logger.error('Migration failed', error);
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

runMigrations()
  .then(() => process.exit(0))
  .catch(() => process.exit(1));
