// =============================================================
// File: server/database/migrations/003_sales_purchases.ts
// Description: Sale and purchase headers + line items, and the
//              document_sequences table behind invoice /
//              purchase numbering.
// =============================================================

import { Knex } from 'knex';
import { DOCUMENT_NUMBERING, PURCHASE_STATUS } from '../../../shared/constants';

export async function up(knex: Knex): Promise<void> {
  // ── Sales ──
  await knex.schema.createTable('sale_orders', (t) => {
    t.string('invoice_no', 20).primary();
    t.string('customer_id', 10).notNullable().references('customer_id').inTable('customers');
    t.string('employee_id', 10).notNullable().references('employee_id').inTable('employees');
    t.date('sale_date').notNullable();
    t.time('sale_time').notNullable();
    t.decimal('total_amount', 12, 2).notNullable().defaultTo(0);
    t.decimal('discount', 12, 2).notNullable().defaultTo(0);
    t.decimal('net_amount', 12, 2).notNullable().defaultTo(0);

    t.check('?? >= 0', ['total_amount'], 'chk_sale_total');
    t.check('?? >= 0', ['discount'], 'chk_sale_discount');
    t.check('?? >= 0', ['net_amount'], 'chk_sale_net');
    t.index(['sale_date'], 'ix_sale_orders_date');
    t.index(['customer_id'], 'ix_sale_orders_customer');
    t.index(['employee_id'], 'ix_sale_orders_employee');
  });

  await knex.schema.createTable('sale_line_items', (t) => {
    t.string('invoice_no', 20).notNullable().references('invoice_no').inTable('sale_orders');
    t.string('product_code', 20).notNullable().references('product_code').inTable('products');
    t.integer('line_number').notNullable();
    t.integer('quantity').notNullable();
    t.decimal('unit_price', 10, 2).notNullable();
    t.decimal('line_total', 12, 2).notNullable();

    t.primary(['invoice_no', 'product_code']);
    t.check('?? > 0', ['quantity'], 'chk_sale_line_quantity');
    t.check('?? >= 0', ['unit_price'], 'chk_sale_line_price');
    t.check('?? >= 0', ['line_total'], 'chk_sale_line_total');
  });

  // ── Purchases ──
  await knex.schema.createTable('purchase_orders', (t) => {
    t.string('purchase_no', 20).primary();
    t.string('supplier_id', 10).notNullable().references('supplier_id').inTable('suppliers');
    t.date('purchase_date').notNullable();
    t.decimal('total_amount', 12, 2).notNullable().defaultTo(0);
    t.string('payment_status', 20).notNullable().defaultTo(PURCHASE_STATUS.PENDING);
    t.string('notes', 500);

    t.check('?? >= 0', ['total_amount'], 'chk_purchase_total');
    t.check(
      `payment_status IN ('${PURCHASE_STATUS.PENDING}', '${PURCHASE_STATUS.RECEIVED}', '${PURCHASE_STATUS.CANCELLED}')`,
      [],
      'chk_purchase_status'
    );
    t.index(['supplier_id'], 'ix_purchase_orders_supplier');
    t.index(['purchase_date'], 'ix_purchase_orders_date');
  });

  await knex.schema.createTable('purchase_line_items', (t) => {
    t.string('purchase_no', 20).notNullable().references('purchase_no').inTable('purchase_orders');
    t.string('product_code', 20).notNullable().references('product_code').inTable('products');
    t.integer('line_number').notNullable();
    t.integer('quantity').notNullable();
    t.decimal('unit_price', 10, 2).notNullable();
    t.decimal('line_total', 12, 2).notNullable();

    t.primary(['purchase_no', 'product_code']);
    t.check('?? >= 0', ['quantity'], 'chk_purchase_line_quantity');
    t.check('?? >= 0', ['unit_price'], 'chk_purchase_line_price');
    t.check('?? >= 0', ['line_total'], 'chk_purchase_line_total');
  });

  // ── Document numbering ──
  await knex.schema.createTable('document_sequences', (t) => {
    t.string('document_type', 30).primary();
    t.string('prefix', 10).notNullable();
    t.integer('last_number').notNullable().defaultTo(0);
    t.integer('padding').notNullable().defaultTo(3);
  });

  await knex('document_sequences').insert(
    Object.entries(DOCUMENT_NUMBERING).map(([documentType, numbering]) => ({
      document_type: documentType,
      prefix: numbering.prefix,
      last_number: 0,
      padding: numbering.padding,
    }))
  );
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('document_sequences');
  await knex.schema.dropTableIfExists('purchase_line_items');
  await knex.schema.dropTableIfExists('purchase_orders');
  await knex.schema.dropTableIfExists('sale_line_items');
  await knex.schema.dropTableIfExists('sale_orders');
}
