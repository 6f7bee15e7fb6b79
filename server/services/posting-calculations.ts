/**
 * Pure calculation and validation helpers for the posting engines.
 * No database access; everything here is unit-tested directly.
 */

import type { InvalidLineItemError, LineItem, LineItemInput } from '../../shared/types';

/** Half-up to cents, the way DECIMAL(x,2) columns store it (1.005 → 1.01) */
export function round2(n: number): number {
  return Math.round((n + Number.EPSILON) * 100) / 100;
}

/** pg hands DECIMAL columns back as strings, SQLite as numbers */
export function parseNum(val: unknown): number {
  if (typeof val === 'number') return val;
  return parseFloat(String(val)) || 0;
}

export interface LineValidationRules {
  /** Sales need quantity > 0; purchase lines may carry 0 */
  allowZeroQuantity: boolean;
}

/**
 * Checks a cart as a whole before anything touches the store.
 * Returns the first malformed line, or null when every line is usable.
 */
export function findInvalidLine(
  lines: LineItemInput[],
  rules: LineValidationRules
): InvalidLineItemError | null {
  const seen = new Set<string>();

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const lineNumber = i + 1;
    const invalid = (reason: string): InvalidLineItemError => ({
      code: 'INVALID_LINE_ITEM',
      message: `Line ${lineNumber}: ${reason}`,
      line_number: lineNumber,
      product_code: line.product_code,
    });

    if (typeof line.product_code !== 'string' || line.product_code.trim() === '') {
      return invalid('product_code is required');
    }
    if (!Number.isInteger(line.quantity)) {
      return invalid('quantity must be a whole number');
    }
    if (rules.allowZeroQuantity ? line.quantity < 0 : line.quantity <= 0) {
      return invalid(rules.allowZeroQuantity ? 'quantity must be >= 0' : 'quantity must be > 0');
    }
    if (!Number.isFinite(line.unit_price) || line.unit_price < 0) {
      return invalid('unit_price must be >= 0');
    }
    if (seen.has(line.product_code)) {
      return invalid(`product ${line.product_code} appears more than once`);
    }
    seen.add(line.product_code);
  }

  return null;
}

/**
 * line_total = quantity × unit_price, numbered in submission order.
 * The price is rounded to cents first so the stored line multiplies out.
 */
export function computeLines(lines: LineItemInput[]): LineItem[] {
  return lines.map((line, idx) => {
    const unitPrice = round2(line.unit_price);
    return {
      line_number: idx + 1,
      product_code: line.product_code,
      quantity: line.quantity,
      unit_price: unitPrice,
      line_total: round2(line.quantity * unitPrice),
    };
  });
}

export function sumLineTotals(lines: LineItem[]): number {
  return round2(lines.reduce((sum, line) => sum + line.line_total, 0));
}

/**
 * Sale header totals. A discount larger than the total clamps the net
 * amount to zero; the sale is not rejected.
 */
export function computeSaleTotals(
  lines: LineItem[],
  discount: number
): { total_amount: number; discount: number; net_amount: number } {
  const totalAmount = sumLineTotals(lines);
  const roundedDiscount = round2(discount);
  return {
    total_amount: totalAmount,
    discount: roundedDiscount,
    net_amount: round2(Math.max(totalAmount - roundedDiscount, 0)),
  };
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local calendar date, YYYY-MM-DD */
export function formatLocalDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

/** Local wall-clock time, HH:MM:SS */
export function formatLocalTime(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}
