/**
 * Concurrent postings against the same stock. Stock may never be
 * observed below zero and no more units may leave than existed.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { saleService } from '../server/services/sale.service';
import { purchaseService } from '../server/services/purchase.service';
import { cleanAllData, getTestDb } from './setup';
import { createCustomer, createEmployee, createProduct, createSupplier, resetCounters } from './helpers/factory';
import { assertNoNegativeStock, assertStockBalance, expectOk } from './helpers/assertions';
import { parseNum } from '../server/services/posting-calculations';

describe('Concurrency', () => {
  let customerId: string;
  let employeeId: string;

  beforeEach(async () => {
    await cleanAllData();
    resetCounters();
    customerId = await createCustomer();
    employeeId = await createEmployee();
  });

  it('never oversells when many sales race for the same product', async () => {
    await createProduct({ product_code: 'CC-HOT', stock: 10 });

    const attempts = Array.from({ length: 8 }, () =>
      saleService.createSale({
        customer_id: customerId,
        employee_id: employeeId,
        lines: [{ product_code: 'CC-HOT', quantity: 3, unit_price: 10 }],
      })
    );
    const settled = await Promise.allSettled(attempts);

    const results = settled.map((s) => {
      if (s.status !== 'fulfilled') throw s.reason;
      return s.value;
    });
    const posted = results.filter((r) => r.ok);
    const refused = results.filter((r) => !r.ok);

    expect(posted).toHaveLength(3);
    expect(refused).toHaveLength(5);
    for (const r of refused) {
      expect(r.ok ? null : r.error.code).toBe('INSUFFICIENT_STOCK');
    }

    await assertStockBalance('CC-HOT', 1);
    await assertNoNegativeStock();

    const sold: { total: number | string | null } | undefined = await getTestDb()('sale_line_items')
      .where('product_code', 'CC-HOT')
      .sum<{ total: number | string | null }[]>('quantity as total')
      .first();
    expect(parseNum(sold?.total ?? 0)).toBe(9);

    const invoiceNumbers = posted.map((r) => (r.ok ? r.value : ''));
    expect(new Set(invoiceNumbers).size).toBe(3);
  });

  it('keeps each product consistent when sales share some products', async () => {
    await createProduct({ product_code: 'CC-X', stock: 5 });
    await createProduct({ product_code: 'CC-Y', stock: 5 });

    const settled = await Promise.allSettled([
      saleService.createSale({
        customer_id: customerId,
        employee_id: employeeId,
        lines: [
          { product_code: 'CC-X', quantity: 3, unit_price: 1 },
          { product_code: 'CC-Y', quantity: 1, unit_price: 1 },
        ],
      }),
      saleService.createSale({
        customer_id: customerId,
        employee_id: employeeId,
        lines: [
          { product_code: 'CC-Y', quantity: 1, unit_price: 1 },
          { product_code: 'CC-X', quantity: 3, unit_price: 1 },
        ],
      }),
    ]);

    const okCount = settled.filter((s) => s.status === 'fulfilled' && s.value.ok).length;
    expect(okCount).toBe(1);
    // Only the winning sale moved stock, on both products
    await assertStockBalance('CC-X', 2);
    await assertStockBalance('CC-Y', 4);
    await assertNoNegativeStock();
  });

  it('lets only one of two simultaneous receipts add stock', async () => {
    const supplierId = await createSupplier();
    await createProduct({ product_code: 'CC-IN', stock: 0 });
    const purchaseNo = expectOk(
      await purchaseService.createPurchase({
        supplier_id: supplierId,
        lines: [{ product_code: 'CC-IN', quantity: 7, unit_price: 2 }],
      })
    );

    const [a, b] = await Promise.all([
      purchaseService.markReceived(purchaseNo),
      purchaseService.markReceived(purchaseNo),
    ]);

    const codes = [a, b].map((r) => (r.ok ? 'OK' : r.error.code)).sort();
    expect(codes).toEqual(['ALREADY_RECEIVED', 'OK']);
    await assertStockBalance('CC-IN', 7);
  });
});
