import type { Knex } from 'knex';
import path from 'path';
import { getEnv, type Env } from '../config/env';
import { migrationSource } from './migrations';

interface SqliteConnection {
  pragma(source: string): unknown;
}

export function buildKnexConfig(env: Env = getEnv()): Knex.Config {
  const migrations: Knex.MigratorConfig = {
    migrationSource,
    tableName: 'knex_migrations',
  };

  if (env.DB_CLIENT === 'better-sqlite3') {
    return {
      client: 'better-sqlite3',
      connection: {
        filename: env.DB_FILENAME === ':memory:' ? ':memory:' : path.resolve(env.DB_FILENAME),
      },
      useNullAsDefault: true,
      // A single connection: SQLite serialises writers anyway, and an
      // in-memory database only exists on the connection that created it.
      pool: {
        min: 1,
        max: 1,
        afterCreate: (conn: SqliteConnection, done: (err: Error | null, conn: SqliteConnection) => void) => {
          conn.pragma('foreign_keys = ON');
          done(null, conn);
        },
      },
      migrations,
    };
  }

  return {
    client: 'pg',
    connection: {
      host: env.DB_HOST,
      port: env.DB_PORT,
      database: env.DB_NAME,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
    },
    pool: {
      min: env.DB_POOL_MIN,
      max: env.DB_POOL_MAX,
    },
    migrations,
  };
}

export default buildKnexConfig;
