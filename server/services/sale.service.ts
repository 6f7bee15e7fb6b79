// =============================================================
// File: server/services/sale.service.ts
// Module: Sale Posting Engine
// Description: Posts a POS sale. Cheap checks run first and
//              outside any transaction; the header, lines and
//              stock deductions then commit together or not at
//              all.
// =============================================================

import { Knex } from 'knex';
import { salesLogger } from '../lib/logger';
import type { SaleLineItemRow, SaleOrderRow } from '../database/rows';
import {
  CreateSaleInput,
  err,
  LineItem,
  ok,
  Paginated,
  Result,
  SaleError,
  SaleLineItem,
  SaleOrder,
  SaleWithLines,
  StockShortage,
} from '../../shared/types';
import { BaseService, ListOptions } from './base.service';
import { documentSequenceService, NextIdGenerator } from './document-sequence.service';
import { inventoryService, InventoryService } from './inventory.service';
import {
  computeLines,
  computeSaleTotals,
  findInvalidLine,
  formatLocalDate,
  formatLocalTime,
  parseNum,
} from './posting-calculations';
import { referenceService } from './reference.service';
import { runUnitOfWork, toStorageFailure } from './unit-of-work';

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface SaleListOptions extends ListOptions {
  customer_id?: string;
  employee_id?: string;
  from_date?: string;
  to_date?: string;
}

export interface SaleServiceOptions {
  ids?: NextIdGenerator;
  ledger?: InventoryService;
  /** Source of sale_date / sale_time */
  clock?: () => Date;
}

// ────────────────────────────────────────────────────────────
// Helpers
// ────────────────────────────────────────────────────────────

function toSaleOrder(row: SaleOrderRow): SaleOrder {
  return {
    invoice_no: row.invoice_no,
    customer_id: row.customer_id,
    employee_id: row.employee_id,
    sale_date: row.sale_date,
    sale_time: row.sale_time,
    total_amount: parseNum(row.total_amount),
    discount: parseNum(row.discount),
    net_amount: parseNum(row.net_amount),
  };
}

function toSaleLine(row: SaleLineItemRow): SaleLineItem {
  return {
    invoice_no: row.invoice_no,
    line_number: parseNum(row.line_number),
    product_code: row.product_code,
    quantity: parseNum(row.quantity),
    unit_price: parseNum(row.unit_price),
    line_total: parseNum(row.line_total),
  };
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

export class SaleService extends BaseService {
  private readonly ids: NextIdGenerator;
  private readonly ledger: InventoryService;
  private readonly clock: () => Date;

  constructor(options: SaleServiceOptions = {}) {
    super('sale_orders');
    this.ids = options.ids ?? documentSequenceService;
    this.ledger = options.ledger ?? inventoryService;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Returns the new invoice number */
  async createSale(input: CreateSaleInput): Promise<Result<string, SaleError>> {
    const discount = input.discount ?? 0;

    let rejection: SaleError | null;
    try {
      rejection = await this.checkPreconditions(input, discount);
    } catch (error) {
      salesLogger.error({ err: error }, 'Sale pre-checks failed');
      return err(toStorageFailure(error));
    }
    if (rejection) {
      salesLogger.warn({ code: rejection.code, customer_id: input.customer_id }, 'Sale rejected');
      return err(rejection);
    }

    const lines = computeLines(input.lines);
    const totals = computeSaleTotals(lines, discount);
    const now = this.clock();

    const result = await runUnitOfWork<string, SaleError>(
      async (trx) => {
        const invoiceNo = await this.ids.nextId('invoice', trx);

        await trx(this.tableName).insert({
          invoice_no: invoiceNo,
          customer_id: input.customer_id,
          employee_id: input.employee_id,
          sale_date: formatLocalDate(now),
          sale_time: formatLocalTime(now),
          ...totals,
        });
        await this.insertLines(trx, invoiceNo, lines);

        for (const line of lines) {
          const adjusted = await this.ledger.adjust(line.product_code, -line.quantity, trx);
          if (!adjusted.ok) return err(adjusted.error);
        }

        return ok(invoiceNo);
      },
      { label: 'sale.create' }
    );

    if (result.ok) {
      salesLogger.info(
        { invoice_no: result.value, lines: lines.length, net_amount: totals.net_amount },
        'Sale posted'
      );
    } else {
      salesLogger.warn({ code: result.error.code, customer_id: input.customer_id }, 'Sale rolled back');
    }
    return result;
  }

  /**
   * First failing check wins, in this order: cart, lines, discount,
   * customer, employee, stock snapshot.
   */
  private async checkPreconditions(input: CreateSaleInput, discount: number): Promise<SaleError | null> {
    if (input.lines.length === 0) {
      return { code: 'EMPTY_CART', message: 'A sale needs at least one line item' };
    }

    const invalidLine = findInvalidLine(input.lines, { allowZeroQuantity: false });
    if (invalidLine) return invalidLine;

    if (!Number.isFinite(discount) || discount < 0) {
      return { code: 'INVALID_DISCOUNT', message: 'Discount must be a number >= 0', discount };
    }

    if (!(await referenceService.customerExists(input.customer_id))) {
      return {
        code: 'CUSTOMER_NOT_FOUND',
        message: `Customer ${input.customer_id} not found`,
        customer_id: input.customer_id,
      };
    }
    if (!(await referenceService.employeeExists(input.employee_id))) {
      return {
        code: 'EMPLOYEE_NOT_FOUND',
        message: `Employee ${input.employee_id} not found`,
        employee_id: input.employee_id,
      };
    }

    // Snapshot only; the ledger re-checks atomically when it deducts
    const levels = await this.ledger.getStockLevels(input.lines.map((l) => l.product_code));

    const missing = input.lines.find((line) => !levels.has(line.product_code));
    if (missing) {
      return {
        code: 'PRODUCT_NOT_FOUND',
        message: `Product ${missing.product_code} not found`,
        product_code: missing.product_code,
      };
    }

    const shortages: StockShortage[] = [];
    for (const line of input.lines) {
      const available = levels.get(line.product_code) ?? 0;
      if (line.quantity > available) {
        shortages.push({ product_code: line.product_code, requested: line.quantity, available });
      }
    }
    if (shortages.length > 0) {
      const [first] = shortages;
      return {
        code: 'INSUFFICIENT_STOCK',
        message: `Insufficient stock for ${first.product_code}: requested ${first.requested}, available ${first.available}`,
        ...first,
        shortages,
      };
    }

    return null;
  }

  private async insertLines(trx: Knex.Transaction, invoiceNo: string, lines: LineItem[]): Promise<void> {
    await trx('sale_line_items').insert(
      lines.map((line) => ({
        invoice_no: invoiceNo,
        line_number: line.line_number,
        product_code: line.product_code,
        quantity: line.quantity,
        unit_price: line.unit_price,
        line_total: line.line_total,
      }))
    );
  }

  // ──────────────────────────────────────────────────────────
  // Lookups
  // ──────────────────────────────────────────────────────────

  async getSale(invoiceNo: string): Promise<SaleWithLines | null> {
    const header: SaleOrderRow | undefined = await this.db(this.tableName)
      .where('invoice_no', invoiceNo)
      .first();
    if (!header) return null;

    const lines: SaleLineItemRow[] = await this.db('sale_line_items')
      .where('invoice_no', invoiceNo)
      .orderBy('line_number', 'asc');

    return { ...toSaleOrder(header), lines: lines.map(toSaleLine) };
  }

  async listSales(options: SaleListOptions = {}): Promise<Paginated<SaleOrder>> {
    const { customer_id, employee_id, from_date, to_date } = options;

    let query = this.db(this.tableName);
    if (customer_id) query = query.where('customer_id', customer_id);
    if (employee_id) query = query.where('employee_id', employee_id);
    if (from_date) query = query.where('sale_date', '>=', from_date);
    if (to_date) query = query.where('sale_date', '<=', to_date);

    return this.paginate<SaleOrderRow, SaleOrder>(query, {
      page: options.page,
      limit: options.limit,
      columns: ['*'],
      countColumn: 'invoice_no',
      orderBy: [
        { column: 'sale_date', order: 'desc' },
        { column: 'sale_time', order: 'desc' },
        { column: 'invoice_no', order: 'desc' },
      ],
      map: toSaleOrder,
    });
  }
}

export const saleService = new SaleService();
