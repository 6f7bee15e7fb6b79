import { describe, it, expect } from 'vitest';
import { httpStatusFor } from '../server/lib/error-reply';
import { ERROR_CODES } from '../shared/constants';
import type { DomainError } from '../shared/types';

describe('httpStatusFor', () => {
  it('maps validation, not-found and conflict codes', () => {
    const cases: Array<[DomainError, number]> = [
      [{ code: ERROR_CODES.EMPTY_CART, message: 'empty' }, 400],
      [{ code: ERROR_CODES.INVALID_DISCOUNT, message: 'bad', discount: -1 }, 400],
      [{ code: ERROR_CODES.INVALID_ADJUSTMENT, message: 'bad', delta: 0 }, 400],
      [{ code: ERROR_CODES.CUSTOMER_NOT_FOUND, message: 'missing', customer_id: 'C1' }, 404],
      [{ code: ERROR_CODES.PURCHASE_NOT_FOUND, message: 'missing', purchase_no: 'PUR001' }, 404],
      [{ code: ERROR_CODES.PRODUCT_NOT_FOUND, message: 'missing', product_code: 'P1' }, 404],
      [
        {
          code: ERROR_CODES.INSUFFICIENT_STOCK,
          message: 'short',
          product_code: 'P1',
          requested: 2,
          available: 1,
          shortages: [{ product_code: 'P1', requested: 2, available: 1 }],
        },
        409,
      ],
      [{ code: ERROR_CODES.ALREADY_RECEIVED, message: 'done', purchase_no: 'PUR001' }, 409],
      [{ code: ERROR_CODES.CANNOT_CANCEL_RECEIVED, message: 'done', purchase_no: 'PUR001' }, 409],
    ];

    for (const [error, status] of cases) {
      expect(httpStatusFor(error)).toBe(status);
    }
  });

  it('answers 503 only for a retryable storage failure', () => {
    const failure = { code: ERROR_CODES.STORAGE_FAILURE, message: 'busy', driver_code: 'SQLITE_BUSY' };

    expect(httpStatusFor({ ...failure, retryable: true })).toBe(503);
    expect(httpStatusFor({ ...failure, retryable: false })).toBe(500);
  });
});
