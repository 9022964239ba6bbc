import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { Knex } from 'knex';
import { config, validateConfig } from '../../config';
import { logger } from '../../utils/logger';
import { createDb } from '../postgres';

const MIGRATIONS_DIR = __dirname;

export function pendingMigrationFiles(applied: Set<string>, files: string[]): string[] {
  return files
    .filter(file => /^\d{3}_[a-z0-9_]+\.sql$/.test(file))
    .sort()
    .filter(file => !applied.has(file.replace(/\.sql$/, '')));
}

/**
 * Applies every numbered .sql file beside this module that is not yet recorded in
 * schema_migrations, each in its own transaction.
 */
export async function runMigrations(db: Knex): Promise<string[]> {
  await db.raw(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version VARCHAR(128) PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const rows: Array<{ version: string }> = await db('schema_migrations').select('version');
  const pending = pendingMigrationFiles(new Set(rows.map(row => row.version)), readdirSync(MIGRATIONS_DIR));

  if (pending.length === 0) {
    logger.info('Schema is up to date');
    return [];
  }

  for (const file of pending) {
    const version = file.replace(/\.sql$/, '');
    const sql = readFileSync(join(MIGRATIONS_DIR, file), 'utf8');

    logger.info(`Running migration ${version}`);
    await db.transaction(async trx => {
      await trx.raw(sql);
      await trx('schema_migrations').insert({ version });
    });
    logger.info(`Migration ${version} completed successfully`);
  }
  return pending.map(file => file.replace(/\.sql$/, ''));
}

// Run if called directly
if (require.main === module) {
  validateConfig(config);
  const db = createDb(config);

  runMigrations(db)
    .then(() => db.destroy())
    .then(() => process.exit(0))
    .catch(error => {
      logger.error('Migration failed', { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    });
}
