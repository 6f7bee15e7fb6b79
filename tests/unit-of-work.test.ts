import { describe, it, expect, beforeEach } from 'vitest';
import { err, ok } from '../shared/types';
import {
  driverErrorCode,
  isTransientStorageError,
  runUnitOfWork,
} from '../server/services/unit-of-work';
import { cleanAllData } from './setup';
import { countRows, expectErr, expectOk } from './helpers/assertions';

function driverError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('Transaction coordinator', () => {
  beforeEach(async () => {
    await cleanAllData();
  });

  it('commits when the work returns ok', async () => {
    const result = await runUnitOfWork(async (trx) => {
      await trx('customers').insert({ customer_id: 'UOW001', customer_name: 'Committed' });
      return ok('done');
    });

    expect(expectOk(result)).toBe('done');
    expect(await countRows('customers', { customer_id: 'UOW001' })).toBe(1);
  });

  it('rolls back every write and returns the error unchanged', async () => {
    const result = await runUnitOfWork(async (trx) => {
      await trx('customers').insert({ customer_id: 'UOW002', customer_name: 'Rolled back' });
      await trx('suppliers').insert({ supplier_id: 'UOW002', supplier_name: 'Rolled back' });
      return err({ code: 'EMPTY_CART' as const, message: 'nothing to sell' });
    });

    expect(expectErr(result)).toEqual({ code: 'EMPTY_CART', message: 'nothing to sell' });
    expect(await countRows('customers', { customer_id: 'UOW002' })).toBe(0);
    expect(await countRows('suppliers', { supplier_id: 'UOW002' })).toBe(0);
  });

  it('does not retry business failures', async () => {
    let attempts = 0;
    const result = await runUnitOfWork(async () => {
      attempts++;
      return err({ code: 'EMPTY_CART' as const, message: 'nothing to sell' });
    });

    expect(result.ok).toBe(false);
    expect(attempts).toBe(1);
  });

  it('retries transient storage errors and then succeeds', async () => {
    let attempts = 0;
    const result = await runUnitOfWork(
      async (trx) => {
        attempts++;
        await trx('customers').insert({ customer_id: `UOWR${attempts}`, customer_name: 'Retry' });
        if (attempts === 1) throw driverError('database is locked', 'SQLITE_BUSY');
        return ok(attempts);
      },
      { maxRetries: 3, retryDelayMs: 1 }
    );

    expect(expectOk(result)).toBe(2);
    // The first attempt's insert was rolled back
    expect(await countRows('customers', { customer_id: 'UOWR1' })).toBe(0);
    expect(await countRows('customers', { customer_id: 'UOWR2' })).toBe(1);
  });

  it('gives up after the retry budget with a retryable storage failure', async () => {
    let attempts = 0;
    const result = await runUnitOfWork(
      async () => {
        attempts++;
        throw driverError('deadlock detected', '40P01');
      },
      { maxRetries: 2, retryDelayMs: 1 }
    );

    expect(attempts).toBe(3);
    expect(expectErr(result)).toEqual({
      code: 'STORAGE_FAILURE',
      message: 'deadlock detected',
      retryable: true,
      driver_code: '40P01',
    });
  });

  it('turns other thrown errors into a non-retryable storage failure at once', async () => {
    let attempts = 0;
    const result = await runUnitOfWork(
      async () => {
        attempts++;
        throw new Error('boom');
      },
      { maxRetries: 3, retryDelayMs: 1 }
    );

    expect(attempts).toBe(1);
    expect(expectErr(result)).toEqual({
      code: 'STORAGE_FAILURE',
      message: 'boom',
      retryable: false,
      driver_code: null,
    });
  });

  it('reports constraint violations from the store as storage failures', async () => {
    const result = await runUnitOfWork<boolean, never>(async (trx) => {
      await trx('inventory').insert({ product_code: 'NO-SUCH-PRODUCT', current_stock: 1 });
      return ok(true);
    });

    const error = expectErr(result);
    expect(error.code).toBe('STORAGE_FAILURE');
    expect(error.retryable).toBe(false);
    expect(await countRows('inventory')).toBe(0);
  });

  describe('error classification', () => {
    it('recognises deadlock, serialization, lock timeout and busy codes', () => {
      for (const code of ['40P01', '40001', '55P03', 'SQLITE_BUSY', 'SQLITE_LOCKED']) {
        expect(isTransientStorageError(driverError('x', code))).toBe(true);
      }
    });

    it('treats everything else as permanent', () => {
      expect(isTransientStorageError(driverError('duplicate key', '23505'))).toBe(false);
      expect(isTransientStorageError(new Error('no code'))).toBe(false);
      expect(isTransientStorageError('string error')).toBe(false);
    });

    it('extracts string driver codes only', () => {
      expect(driverErrorCode({ code: 'SQLITE_BUSY' })).toBe('SQLITE_BUSY');
      expect(driverErrorCode({ code: 42 })).toBeNull();
      expect(driverErrorCode(null)).toBeNull();
    });
  });
});
