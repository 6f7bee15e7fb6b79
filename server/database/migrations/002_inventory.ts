// =============================================================
// File: server/database/migrations/002_inventory.ts
// Description: One inventory row per product (same lifecycle
//              as the product). current_stock is only ever
//              changed by the ledger's conditional update; the
//              CHECK constraint is the last line behind it.
// =============================================================

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('inventory', (t) => {
    t.string('product_code', 20).primary().references('product_code').inTable('products');
    t.integer('current_stock').notNullable().defaultTo(0);
    t.timestamp('last_updated', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    t.check('?? >= 0', ['current_stock'], 'chk_inventory_current_stock');
    t.index(['current_stock'], 'ix_inventory_current_stock');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('inventory');
}
