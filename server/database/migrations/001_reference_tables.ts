// =============================================================
// File: server/database/migrations/001_reference_tables.ts
// Description: Reference tables owned by the CRUD screens:
//              customers, employees, suppliers, products.
//              The posting core only reads them.
// =============================================================

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('customers', (t) => {
    t.string('customer_id', 10).primary();
    t.string('customer_name', 100).notNullable();
    t.string('phone', 20);
    t.string('email', 100);
    t.string('city', 50);
    t.date('registration_date').notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('employees', (t) => {
    t.string('employee_id', 10).primary();
    t.string('employee_name', 100).notNullable();
    t.string('position', 50);
    t.date('hire_date').notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('suppliers', (t) => {
    t.string('supplier_id', 10).primary();
    t.string('supplier_name', 100).notNullable();
    t.string('contact_person', 100);
    t.string('phone', 20);
    t.string('email', 100);
    t.string('city', 50);
  });

  await knex.schema.createTable('products', (t) => {
    t.string('product_code', 20).primary();
    t.string('subcategory_id', 10).notNullable();
    t.string('product_name', 100).notNullable();
    t.string('brand', 50);
    t.decimal('cost_price', 10, 2).notNullable();
    t.decimal('retail_price', 10, 2).notNullable();
    t.integer('min_stock_level').notNullable().defaultTo(5);
    t.date('date_added').notNullable().defaultTo(knex.fn.now());

    t.check('?? >= 0', ['cost_price'], 'chk_products_cost_price');
    t.check('?? >= 0', ['retail_price'], 'chk_products_retail_price');
    t.check('?? >= 0', ['min_stock_level'], 'chk_products_min_stock');
    t.index(['subcategory_id'], 'ix_products_subcategory');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('products');
  await knex.schema.dropTableIfExists('suppliers');
  await knex.schema.dropTableIfExists('employees');
  await knex.schema.dropTableIfExists('customers');
}
