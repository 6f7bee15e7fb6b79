import { describe, it, expect } from 'vitest';
import {
  computeLines,
  computeSaleTotals,
  findInvalidLine,
  formatLocalDate,
  formatLocalTime,
  parseNum,
  round2,
  sumLineTotals,
} from '../server/services/posting-calculations';

describe('posting calculations', () => {
  describe('round2 / parseNum', () => {
    it('rounds to cents', () => {
      expect(round2(10.126)).toBe(10.13);
      expect(round2(3 * 19.99)).toBe(59.97);
    });

    it('rounds half a cent up', () => {
      expect(round2(1.005)).toBe(1.01);
      expect(round2(0.125)).toBe(0.13);
    });

    it('parses driver values', () => {
      expect(parseNum('12.50')).toBe(12.5);
      expect(parseNum(7)).toBe(7);
      expect(parseNum(null)).toBe(0);
      expect(parseNum('abc')).toBe(0);
    });
  });

  describe('findInvalidLine', () => {
    const sale = { allowZeroQuantity: false };
    const purchase = { allowZeroQuantity: true };

    it('accepts a well-formed cart', () => {
      const lines = [
        { product_code: 'A', quantity: 2, unit_price: 25 },
        { product_code: 'B', quantity: 1, unit_price: 0 },
      ];
      expect(findInvalidLine(lines, sale)).toBeNull();
    });

    it('rejects a zero quantity on a sale but not on a purchase', () => {
      const lines = [{ product_code: 'A', quantity: 0, unit_price: 5 }];
      expect(findInvalidLine(lines, sale)).toEqual({
        code: 'INVALID_LINE_ITEM',
        message: 'Line 1: quantity must be > 0',
        line_number: 1,
        product_code: 'A',
      });
      expect(findInvalidLine(lines, purchase)).toBeNull();
    });

    it('rejects negative purchase quantities', () => {
      const error = findInvalidLine([{ product_code: 'A', quantity: -1, unit_price: 5 }], purchase);
      expect(error?.message).toBe('Line 1: quantity must be >= 0');
    });

    it('rejects fractional quantities', () => {
      const error = findInvalidLine(
        [
          { product_code: 'A', quantity: 1, unit_price: 5 },
          { product_code: 'B', quantity: 2.5, unit_price: 5 },
        ],
        sale
      );
      expect(error?.line_number).toBe(2);
      expect(error?.message).toBe('Line 2: quantity must be a whole number');
    });

    it('rejects negative and non-finite prices', () => {
      expect(findInvalidLine([{ product_code: 'A', quantity: 1, unit_price: -1 }], sale)?.message).toBe(
        'Line 1: unit_price must be >= 0'
      );
      expect(findInvalidLine([{ product_code: 'A', quantity: 1, unit_price: NaN }], sale)?.message).toBe(
        'Line 1: unit_price must be >= 0'
      );
    });

    it('rejects a blank product code', () => {
      expect(findInvalidLine([{ product_code: '  ', quantity: 1, unit_price: 1 }], sale)?.message).toBe(
        'Line 1: product_code is required'
      );
    });

    it('rejects the second occurrence of a product', () => {
      const error = findInvalidLine(
        [
          { product_code: 'A', quantity: 1, unit_price: 5 },
          { product_code: 'A', quantity: 2, unit_price: 5 },
        ],
        sale
      );
      expect(error).toEqual({
        code: 'INVALID_LINE_ITEM',
        message: 'Line 2: product A appears more than once',
        line_number: 2,
        product_code: 'A',
      });
    });
  });

  describe('totals', () => {
    const lines = computeLines([
      { product_code: 'A', quantity: 2, unit_price: 25 },
      { product_code: 'B', quantity: 1, unit_price: 50 },
    ]);

    it('numbers lines in submission order and computes line totals', () => {
      expect(lines).toEqual([
        { line_number: 1, product_code: 'A', quantity: 2, unit_price: 25, line_total: 50 },
        { line_number: 2, product_code: 'B', quantity: 1, unit_price: 50, line_total: 50 },
      ]);
      expect(sumLineTotals(lines)).toBe(100);
    });

    it('subtracts the discount from the total', () => {
      expect(computeSaleTotals(lines, 30)).toEqual({ total_amount: 100, discount: 30, net_amount: 70 });
    });

    it('clamps the net amount at zero when the discount exceeds the total', () => {
      expect(computeSaleTotals(lines, 150)).toEqual({ total_amount: 100, discount: 150, net_amount: 0 });
    });

    it('sums cent amounts without drift', () => {
      const cents = computeLines([
        { product_code: 'A', quantity: 3, unit_price: 19.99 },
        { product_code: 'B', quantity: 1, unit_price: 0.01 },
      ]);
      expect(cents.map((l) => l.line_total)).toEqual([59.97, 0.01]);
      expect(sumLineTotals(cents)).toBe(59.98);
    });

    it('prices a line from the cent-rounded unit price', () => {
      expect(computeLines([{ product_code: 'A', quantity: 4, unit_price: 0.125 }])).toEqual([
        { line_number: 1, product_code: 'A', quantity: 4, unit_price: 0.13, line_total: 0.52 },
      ]);
    });
  });

  describe('date formatting', () => {
    it('formats local date and time with zero padding', () => {
      const date = new Date(2026, 0, 5, 7, 3, 9);
      expect(formatLocalDate(date)).toBe('2026-01-05');
      expect(formatLocalTime(date)).toBe('07:03:09');
    });
  });
});
