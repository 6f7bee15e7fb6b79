import { describe, it, expect, beforeEach } from 'vitest';
import { referenceService } from '../server/services/reference.service';
import { cleanAllData } from './setup';
import { createCustomer, createEmployee, createProduct, createSupplier, resetCounters } from './helpers/factory';

describe('Reference validator', () => {
  beforeEach(async () => {
    await cleanAllData();
    resetCounters();
  });

  it('checks customers, employees and suppliers by id', async () => {
    const customerId = await createCustomer();
    const employeeId = await createEmployee();
    const supplierId = await createSupplier();

    expect(await referenceService.customerExists(customerId)).toBe(true);
    expect(await referenceService.customerExists('NOBODY')).toBe(false);
    expect(await referenceService.employeeExists(employeeId)).toBe(true);
    expect(await referenceService.employeeExists(customerId)).toBe(false);
    expect(await referenceService.supplierExists(supplierId)).toBe(true);
    expect(await referenceService.supplierExists('NOBODY')).toBe(false);
  });

  it('lists missing product codes in the order given', async () => {
    await createProduct({ product_code: 'RV-A' });
    await createProduct({ product_code: 'RV-B', withInventory: false });

    expect(await referenceService.findMissingProducts(['RV-Z', 'RV-A', 'RV-B', 'RV-Y'])).toEqual(['RV-Z', 'RV-Y']);
    expect(await referenceService.findMissingProducts([])).toEqual([]);
  });
});
