import knex, { Knex } from 'knex';
import { Config } from '../config';
import { errorMessage } from '../types/errors';
import { logger } from '../utils/logger';

export type PostgresSettings = Pick<
  Config,
  'POSTGRES_HOST' | 'POSTGRES_PORT' | 'POSTGRES_USER' | 'POSTGRES_PASSWORD' | 'POSTGRES_DB' | 'DB_POOL_MAX'
>;

export function createDb(settings: PostgresSettings): Knex {
  return knex({
    client: 'pg',
    connection: {
      host: settings.POSTGRES_HOST,
      port: settings.POSTGRES_PORT,
      user: settings.POSTGRES_USER,
      password: settings.POSTGRES_PASSWORD,
      database: settings.POSTGRES_DB
    },
    pool: {
      min: 1,
      max: settings.DB_POOL_MAX,
      acquireTimeoutMillis: 60000, // 60 seconds
      createTimeoutMillis: 30000,
      idleTimeoutMillis: 30000,
      createRetryIntervalMillis: 100
    },
    log: {
      warn(message: unknown) {
        logger.warn('Database warning', { message: errorMessage(message) });
      },
      error(message: unknown) {
        logger.error('Database error', { message: errorMessage(message) });
      },
      deprecate(message: unknown) {
        logger.warn('Database deprecation', { message: errorMessage(message) });
      },
      debug(message: unknown) {
        logger.debug('Database debug', { message: errorMessage(message) });
      }
    }
  });
}

export async function testConnection(db: Knex): Promise<boolean> {
  try {
    await db.raw('SELECT 1');
    logger.info('PostgreSQL connection successful');
    return true;
  } catch (error) {
    logger.error('PostgreSQL connection failed', { error: errorMessage(error) });
    return false;
  }
}
