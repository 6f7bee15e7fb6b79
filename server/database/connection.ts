import knex, { Knex } from 'knex';
import pg from 'pg';
import { getEnv } from '../config/env';
import { dbLogger } from '../lib/logger';
import { buildKnexConfig } from './knexfile';
import { seedDemoData } from './seeds/demo-data';

// DATE columns come back as 'YYYY-MM-DD' strings instead of local-midnight Date objects
const PG_DATE_OID = 1082;
pg.types.setTypeParser(PG_DATE_OID, (value: string) => value);

let db: Knex | null = null;

export function getDb(): Knex {
  if (!db) {
    db = knex(buildKnexConfig());
  }
  return db;
}

export async function initializeDb(): Promise<void> {
  const env = getEnv();
  const database = getDb();

  try {
    await database.raw('SELECT 1');
    dbLogger.info({ client: env.DB_CLIENT }, 'Connected to database');
  } catch (error) {
    dbLogger.error({ err: error }, 'Failed to connect to database');
    throw error;
  }

  if (env.DB_MIGRATE_ON_START) {
    const [batch, applied] = await database.migrate.latest();
    dbLogger.info({ batch, applied }, 'Migrations up to date');
  }

  if (env.DB_SEED_DEMO_DATA) {
    const seeded = await seedDemoData(database);
    if (seeded) dbLogger.info('Demo data seeded');
  }
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
    dbLogger.info('Connection closed');
  }
}
