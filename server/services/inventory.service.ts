// =============================================================
// File: server/services/inventory.service.ts
// Module: Inventory Ledger
// Description: The only writer of inventory.current_stock.
//   - adjust()        → one conditional UPDATE; never lets stock
//                       go below zero, even under concurrency
//   - adjustStock()   → manual stock-count correction
//   - getStockLevels()→ read-only snapshot for fail-fast checks
//   - listInventory() / getLowStockProducts() /
//     getInventorySummary() → stock screens and reports
//
// Sales and purchase receipts call adjust() with their own
// transaction so stock moves commit or roll back with them.
// =============================================================

import { Knex } from 'knex';
import { inventoryLogger } from '../lib/logger';
import type { InventoryListRow, InventoryRow, InventorySummaryRow } from '../database/rows';
import { toTimestampString } from '../database/rows';
import {
  AdjustmentError,
  err,
  InventoryListEntry,
  InventoryRecord,
  InventorySummary,
  LedgerError,
  ok,
  Paginated,
  Result,
  StorageFailure,
} from '../../shared/types';
import { BaseService, ListOptions } from './base.service';
import { parseNum, round2 } from './posting-calculations';
import { runUnitOfWork } from './unit-of-work';

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface InventoryListOptions extends ListOptions {
  search?: string;
  low_stock_only?: boolean;
}

// ────────────────────────────────────────────────────────────
// Mapping
// ────────────────────────────────────────────────────────────

function toInventoryRecord(row: InventoryRow): InventoryRecord {
  return {
    product_code: row.product_code,
    current_stock: parseNum(row.current_stock),
    last_updated: toTimestampString(row.last_updated),
  };
}

function toListEntry(row: InventoryListRow): InventoryListEntry {
  const currentStock = parseNum(row.current_stock);
  const minStockLevel = parseNum(row.min_stock_level);
  return {
    ...toInventoryRecord(row),
    product_name: row.product_name,
    brand: row.brand,
    min_stock_level: minStockLevel,
    cost_price: parseNum(row.cost_price),
    retail_price: parseNum(row.retail_price),
    is_low_stock: currentStock <= minStockLevel,
  };
}

const LIST_COLUMNS = [
  'i.product_code',
  'i.current_stock',
  'i.last_updated',
  'p.product_name',
  'p.brand',
  'p.min_stock_level',
  'p.cost_price',
  'p.retail_price',
];

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

export class InventoryService extends BaseService {
  constructor() {
    super('inventory');
  }

  // ──────────────────────────────────────────────────────────
  // CORE: apply a signed delta to one product's stock.
  //
  // With a transaction the statement joins it and the caller owns
  // commit/rollback. Without one it runs in its own unit of work.
  // ──────────────────────────────────────────────────────────

  adjust(productCode: string, delta: number, trx: Knex.Transaction): Promise<Result<InventoryRecord, LedgerError>>;
  adjust(productCode: string, delta: number): Promise<Result<InventoryRecord, LedgerError | StorageFailure>>;
  async adjust(
    productCode: string,
    delta: number,
    trx?: Knex.Transaction
  ): Promise<Result<InventoryRecord, LedgerError | StorageFailure>> {
    if (!trx) {
      return runUnitOfWork((unitTrx) => this.applyDelta(unitTrx, productCode, delta), {
        label: `inventory.adjust:${productCode}`,
      });
    }
    return this.applyDelta(trx, productCode, delta);
  }

  private async applyDelta(
    trx: Knex.Transaction,
    productCode: string,
    delta: number
  ): Promise<Result<InventoryRecord, LedgerError>> {
    const updated = await trx(this.tableName)
      .where('product_code', productCode)
      .andWhereRaw('current_stock + ? >= 0', [delta])
      .update({
        current_stock: trx.raw('current_stock + ?', [delta]),
        last_updated: new Date().toISOString(),
      });

    const row: InventoryRow | undefined = await trx(this.tableName)
      .where('product_code', productCode)
      .first();

    if (updated > 0 && row) {
      return ok(toInventoryRecord(row));
    }

    // The UPDATE matched nothing; the re-read only decides which error to report
    if (!row) {
      return err({
        code: 'PRODUCT_NOT_FOUND',
        message: `Product ${productCode} has no inventory record`,
        product_code: productCode,
      });
    }

    const available = parseNum(row.current_stock);
    const shortage = { product_code: productCode, requested: -delta, available };
    return err({
      code: 'INSUFFICIENT_STOCK',
      message: `Insufficient stock for ${productCode}: requested ${-delta}, available ${available}`,
      ...shortage,
      shortages: [shortage],
    });
  }

  /** Stock-count correction from the inventory screen */
  async adjustStock(
    productCode: string,
    delta: number,
    reason: string
  ): Promise<Result<InventoryRecord, AdjustmentError>> {
    if (!Number.isInteger(delta) || delta === 0) {
      return err({
        code: 'INVALID_ADJUSTMENT',
        message: 'Adjustment must be a non-zero whole number',
        delta,
      });
    }

    const result = await this.adjust(productCode, delta);
    if (result.ok) {
      inventoryLogger.info(
        { product_code: productCode, delta, reason, current_stock: result.value.current_stock },
        'Stock adjusted'
      );
    } else {
      inventoryLogger.warn({ product_code: productCode, delta, reason, code: result.error.code }, 'Stock adjustment rejected');
    }
    return result;
  }

  // ──────────────────────────────────────────────────────────
  // Reads
  // ──────────────────────────────────────────────────────────

  /** Codes without an inventory row are absent from the map */
  async getStockLevels(productCodes: string[], db: Knex = this.db): Promise<Map<string, number>> {
    const levels = new Map<string, number>();
    if (productCodes.length === 0) return levels;

    const rows: InventoryRow[] = await db(this.tableName)
      .whereIn('product_code', productCodes)
      .select('product_code', 'current_stock');
    for (const row of rows) {
      levels.set(row.product_code, parseNum(row.current_stock));
    }
    return levels;
  }

  async getInventoryRecord(productCode: string): Promise<InventoryRecord | null> {
    const row: InventoryRow | undefined = await this.db(this.tableName)
      .where('product_code', productCode)
      .first();
    return row ? toInventoryRecord(row) : null;
  }

  async listInventory(options: InventoryListOptions = {}): Promise<Paginated<InventoryListEntry>> {
    const { search, low_stock_only } = options;

    let query = this.db('inventory as i').join('products as p', 'p.product_code', 'i.product_code');

    if (search) {
      const term = `%${search.toLowerCase()}%`;
      query = query.where(function () {
        this.whereRaw('LOWER(p.product_name) LIKE ?', [term])
          .orWhereRaw('LOWER(p.product_code) LIKE ?', [term])
          .orWhereRaw('LOWER(p.brand) LIKE ?', [term]);
      });
    }
    if (low_stock_only) {
      query = query.whereRaw('i.current_stock <= p.min_stock_level');
    }

    return this.paginate<InventoryListRow, InventoryListEntry>(query, {
      page: options.page,
      limit: options.limit,
      columns: LIST_COLUMNS,
      countColumn: 'i.product_code',
      orderBy: [{ column: 'i.product_code', order: 'asc' }],
      map: toListEntry,
    });
  }

  /** Products at or below their minimum stock level, emptiest first */
  async getLowStockProducts(): Promise<InventoryListEntry[]> {
    const rows: InventoryListRow[] = await this.db('inventory as i')
      .join('products as p', 'p.product_code', 'i.product_code')
      .whereRaw('i.current_stock <= p.min_stock_level')
      .select(LIST_COLUMNS)
      .orderBy('i.current_stock', 'asc')
      .orderBy('i.product_code', 'asc');
    return rows.map(toListEntry);
  }

  async getInventorySummary(): Promise<InventorySummary> {
    const row: InventorySummaryRow | undefined = await this.db('inventory as i')
      .join('products as p', 'p.product_code', 'i.product_code')
      .select(
        this.db.raw('COUNT(*) as total_products'),
        this.db.raw('COALESCE(SUM(i.current_stock), 0) as total_units'),
        this.db.raw('COALESCE(SUM(CASE WHEN i.current_stock <= p.min_stock_level THEN 1 ELSE 0 END), 0) as low_stock_count'),
        this.db.raw('COALESCE(SUM(i.current_stock * p.cost_price), 0) as cost_value'),
        this.db.raw('COALESCE(SUM(i.current_stock * p.retail_price), 0) as retail_value')
      )
      .first();

    return {
      total_products: parseNum(row?.total_products ?? 0),
      total_units: parseNum(row?.total_units ?? 0),
      low_stock_count: parseNum(row?.low_stock_count ?? 0),
      cost_value: round2(parseNum(row?.cost_value ?? 0)),
      retail_value: round2(parseNum(row?.retail_value ?? 0)),
    };
  }
}

export const inventoryService = new InventoryService();
