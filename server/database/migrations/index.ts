import type { Knex } from 'knex';
import * as referenceTables from './001_reference_tables';
import * as inventory from './002_inventory';
import * as salesPurchases from './003_sales_purchases';

// Migrations are imported statically instead of being discovered on disk:
// Knex's directory loader cannot require .ts files under vitest or from dist/.
const migrations: Record<string, Knex.Migration> = {
  '001_reference_tables': referenceTables,
  '002_inventory': inventory,
  '003_sales_purchases': salesPurchases,
};

export const migrationSource: Knex.MigrationSource<string> = {
  async getMigrations() {
    return Object.keys(migrations).sort();
  },
  getMigrationName(name) {
    return name;
  },
  async getMigration(name) {
    const migration = migrations[name];
    if (!migration) {
      throw new Error(`Unknown migration: ${name}`);
    }
    return migration;
  },
};
