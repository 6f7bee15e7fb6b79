import { Knex } from 'knex';

/**
 * Small demo catalogue for a fresh development database.
 * Runs only when the products table is empty; returns whether it inserted anything.
 */
export async function seedDemoData(knex: Knex): Promise<boolean> {
  const existing = await knex('products').count<{ count: number | string }[]>('product_code as count');
  if (parseInt(String(existing[0]?.count ?? '0'), 10) > 0) {
    return false;
  }

  await knex.transaction(async (trx) => {
    await trx('suppliers').insert([
      { supplier_id: 'SUP001', supplier_name: 'Harbor Wholesale', contact_person: 'A. Reyes', city: 'Springfield' },
      { supplier_id: 'SUP002', supplier_name: 'Northline Parts', contact_person: 'M. Okafor', city: 'Riverton' },
    ]);

    await trx('customers').insert([
      { customer_id: 'CUS001', customer_name: 'Walk-in Customer' },
      { customer_id: 'CUS002', customer_name: 'Dana Whitfield', city: 'Springfield' },
    ]);

    await trx('employees').insert([
      { employee_id: 'EMP001', employee_name: 'Store Manager', position: 'Manager' },
      { employee_id: 'EMP002', employee_name: 'Counter Staff', position: 'Cashier' },
    ]);

    const products = [
      { product_code: 'PRD001', subcategory_id: 'SUB001', product_name: 'Silicone Case', brand: 'Generic', cost_price: 4.5, retail_price: 12.99, min_stock_level: 5, stock: 40 },
      { product_code: 'PRD002', subcategory_id: 'SUB003', product_name: 'USB-C Wall Charger 20W', brand: 'Generic', cost_price: 7.25, retail_price: 19.99, min_stock_level: 5, stock: 25 },
      { product_code: 'PRD003', subcategory_id: 'SUB005', product_name: 'USB-C Cable 1m', brand: 'Generic', cost_price: 1.8, retail_price: 6.49, min_stock_level: 10, stock: 60 },
      { product_code: 'PRD004', subcategory_id: 'SUB007', product_name: 'Tempered Glass Protector', brand: 'Generic', cost_price: 1.2, retail_price: 8.99, min_stock_level: 10, stock: 8 },
    ];

    await trx('products').insert(products.map(({ stock, ...product }) => product));
    await trx('inventory').insert(
      products.map((p) => ({ product_code: p.product_code, current_stock: p.stock }))
    );
  });

  return true;
}
