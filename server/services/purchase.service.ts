// =============================================================
// File: server/services/purchase.service.ts
// Module: Purchase Posting Engine
// Description: Supplier purchase orders.
//
//   Pending ──receive──▶ Received   (stock goes up)
//   Pending ──cancel───▶ Cancelled  (or deleted outright)
//
// Creating an order never touches inventory; goods count only
// once they are received. Status flips are conditional UPDATEs
// so two concurrent receipts cannot both add stock.
// =============================================================

import { Knex } from 'knex';
import { getEnv } from '../config/env';
import { purchaseLogger } from '../lib/logger';
import type { LastPurchaseRow, PurchaseLineItemRow, PurchaseOrderRow } from '../database/rows';
import { PURCHASE_CANCEL_MODES, PURCHASE_STATUS } from '../../shared/constants';
import {
  CreatePurchaseInput,
  err,
  LastPurchaseInfo,
  ok,
  Paginated,
  PurchaseCancelMode,
  PurchaseError,
  PurchaseLineItem,
  PurchaseOrder,
  PurchaseStatus,
  PurchaseWithLines,
  Result,
} from '../../shared/types';
import { BaseService, ListOptions } from './base.service';
import { documentSequenceService, NextIdGenerator } from './document-sequence.service';
import { inventoryService, InventoryService } from './inventory.service';
import { computeLines, findInvalidLine, formatLocalDate, parseNum, sumLineTotals } from './posting-calculations';
import { referenceService } from './reference.service';
import { runUnitOfWork, toStorageFailure } from './unit-of-work';

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface PurchaseListOptions extends ListOptions {
  supplier_id?: string;
  status?: PurchaseStatus;
  from_date?: string;
  to_date?: string;
}

export interface PurchaseServiceOptions {
  ids?: NextIdGenerator;
  ledger?: InventoryService;
  clock?: () => Date;
  /** Defaults to PURCHASE_CANCEL_MODE */
  cancelMode?: PurchaseCancelMode;
}

// ────────────────────────────────────────────────────────────
// Helpers
// ────────────────────────────────────────────────────────────

function toPurchaseStatus(value: string): PurchaseStatus {
  switch (value) {
    case PURCHASE_STATUS.RECEIVED:
      return PURCHASE_STATUS.RECEIVED;
    case PURCHASE_STATUS.CANCELLED:
      return PURCHASE_STATUS.CANCELLED;
    default:
      return PURCHASE_STATUS.PENDING;
  }
}

function toPurchaseOrder(row: PurchaseOrderRow): PurchaseOrder {
  return {
    purchase_no: row.purchase_no,
    supplier_id: row.supplier_id,
    purchase_date: row.purchase_date,
    total_amount: parseNum(row.total_amount),
    payment_status: toPurchaseStatus(row.payment_status),
    notes: row.notes,
  };
}

function toPurchaseLine(row: PurchaseLineItemRow): PurchaseLineItem {
  return {
    purchase_no: row.purchase_no,
    line_number: parseNum(row.line_number),
    product_code: row.product_code,
    quantity: parseNum(row.quantity),
    unit_price: parseNum(row.unit_price),
    line_total: parseNum(row.line_total),
  };
}

function notFound(purchaseNo: string): PurchaseError {
  return { code: 'PURCHASE_NOT_FOUND', message: `Purchase ${purchaseNo} not found`, purchase_no: purchaseNo };
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

export class PurchaseService extends BaseService {
  private readonly ids: NextIdGenerator;
  private readonly ledger: InventoryService;
  private readonly clock: () => Date;
  private readonly cancelMode: PurchaseCancelMode | undefined;

  constructor(options: PurchaseServiceOptions = {}) {
    super('purchase_orders');
    this.ids = options.ids ?? documentSequenceService;
    this.ledger = options.ledger ?? inventoryService;
    this.clock = options.clock ?? (() => new Date());
    this.cancelMode = options.cancelMode;
  }

  // ──────────────────────────────────────────────────────────
  // Create (Pending)
  // ──────────────────────────────────────────────────────────

  async createPurchase(input: CreatePurchaseInput): Promise<Result<string, PurchaseError>> {
    let rejection: PurchaseError | null;
    try {
      rejection = await this.checkPreconditions(input);
    } catch (error) {
      purchaseLogger.error({ err: error }, 'Purchase pre-checks failed');
      return err(toStorageFailure(error));
    }
    if (rejection) {
      purchaseLogger.warn({ code: rejection.code, supplier_id: input.supplier_id }, 'Purchase rejected');
      return err(rejection);
    }

    const lines = computeLines(input.lines);
    const purchaseDate = formatLocalDate(this.clock());

    const result = await runUnitOfWork<string, PurchaseError>(
      async (trx) => {
        const purchaseNo = await this.ids.nextId('purchase', trx);

        await trx(this.tableName).insert({
          purchase_no: purchaseNo,
          supplier_id: input.supplier_id,
          purchase_date: purchaseDate,
          total_amount: sumLineTotals(lines),
          payment_status: PURCHASE_STATUS.PENDING,
          notes: input.notes ?? null,
        });
        await trx('purchase_line_items').insert(
          lines.map((line) => ({ purchase_no: purchaseNo, ...line }))
        );

        return ok(purchaseNo);
      },
      { label: 'purchase.create' }
    );

    if (result.ok) {
      purchaseLogger.info({ purchase_no: result.value, lines: lines.length }, 'Purchase created');
    }
    return result;
  }

  private async checkPreconditions(input: CreatePurchaseInput): Promise<PurchaseError | null> {
    if (input.lines.length === 0) {
      return { code: 'EMPTY_PURCHASE', message: 'A purchase needs at least one line item' };
    }

    const invalidLine = findInvalidLine(input.lines, { allowZeroQuantity: true });
    if (invalidLine) return invalidLine;

    if (!(await referenceService.supplierExists(input.supplier_id))) {
      return {
        code: 'SUPPLIER_NOT_FOUND',
        message: `Supplier ${input.supplier_id} not found`,
        supplier_id: input.supplier_id,
      };
    }

    const [missing] = await referenceService.findMissingProducts(input.lines.map((l) => l.product_code));
    if (missing !== undefined) {
      return { code: 'PRODUCT_NOT_FOUND', message: `Product ${missing} not found`, product_code: missing };
    }

    return null;
  }

  // ──────────────────────────────────────────────────────────
  // Pending → Received
  // ──────────────────────────────────────────────────────────

  async markReceived(purchaseNo: string): Promise<Result<void, PurchaseError>> {
    const result = await runUnitOfWork<void, PurchaseError>(
      async (trx) => {
        const blocked = await this.pendingGuard(trx, purchaseNo, 'receive');
        if (blocked) return err(blocked);

        const flipped = await trx(this.tableName)
          .where({ purchase_no: purchaseNo, payment_status: PURCHASE_STATUS.PENDING })
          .update({ payment_status: PURCHASE_STATUS.RECEIVED });
        if (flipped === 0) {
          // Another transition committed between the read and the update
          const raced = await this.pendingGuard(trx, purchaseNo, 'receive');
          return err(raced ?? notFound(purchaseNo));
        }

        const lines: PurchaseLineItemRow[] = await trx('purchase_line_items')
          .where('purchase_no', purchaseNo)
          .orderBy('line_number', 'asc');

        for (const line of lines) {
          const quantity = parseNum(line.quantity);
          if (quantity === 0) continue;
          const adjusted = await this.ledger.adjust(line.product_code, quantity, trx);
          if (!adjusted.ok) return err(adjusted.error);
        }

        return ok(undefined);
      },
      { label: 'purchase.receive' }
    );

    if (result.ok) {
      purchaseLogger.info({ purchase_no: purchaseNo }, 'Purchase received');
    } else {
      purchaseLogger.warn({ purchase_no: purchaseNo, code: result.error.code }, 'Purchase receipt rejected');
    }
    return result;
  }

  // ──────────────────────────────────────────────────────────
  // Pending → Cancelled / deleted
  // ──────────────────────────────────────────────────────────

  async cancelPurchase(purchaseNo: string): Promise<Result<void, PurchaseError>> {
    const mode = this.cancelMode ?? getEnv().PURCHASE_CANCEL_MODE;

    const result = await runUnitOfWork<void, PurchaseError>(
      async (trx) => {
        const blocked = await this.pendingGuard(trx, purchaseNo, 'cancel');
        if (blocked) return err(blocked);

        let affected: number;
        if (mode === PURCHASE_CANCEL_MODES.STATUS) {
          affected = await trx(this.tableName)
            .where({ purchase_no: purchaseNo, payment_status: PURCHASE_STATUS.PENDING })
            .update({ payment_status: PURCHASE_STATUS.CANCELLED });
        } else {
          await trx('purchase_line_items').where('purchase_no', purchaseNo).delete();
          affected = await trx(this.tableName)
            .where({ purchase_no: purchaseNo, payment_status: PURCHASE_STATUS.PENDING })
            .delete();
        }

        if (affected === 0) {
          const raced = await this.pendingGuard(trx, purchaseNo, 'cancel');
          return err(raced ?? notFound(purchaseNo));
        }
        return ok(undefined);
      },
      { label: 'purchase.cancel' }
    );

    if (result.ok) {
      purchaseLogger.info({ purchase_no: purchaseNo, mode }, 'Purchase cancelled');
    } else {
      purchaseLogger.warn({ purchase_no: purchaseNo, code: result.error.code }, 'Purchase cancellation rejected');
    }
    return result;
  }

  /** Null while the order is Pending, otherwise the error for the attempted transition */
  private async pendingGuard(
    trx: Knex.Transaction,
    purchaseNo: string,
    action: 'receive' | 'cancel'
  ): Promise<PurchaseError | null> {
    const header: PurchaseOrderRow | undefined = await trx(this.tableName)
      .where('purchase_no', purchaseNo)
      .first();
    if (!header) return notFound(purchaseNo);

    const status = toPurchaseStatus(header.payment_status);
    if (status === PURCHASE_STATUS.RECEIVED) {
      return action === 'receive'
        ? { code: 'ALREADY_RECEIVED', message: `Purchase ${purchaseNo} has already been received`, purchase_no: purchaseNo }
        : { code: 'CANNOT_CANCEL_RECEIVED', message: `Purchase ${purchaseNo} has been received and cannot be cancelled`, purchase_no: purchaseNo };
    }
    if (status === PURCHASE_STATUS.CANCELLED) {
      return { code: 'PURCHASE_CANCELLED', message: `Purchase ${purchaseNo} has been cancelled`, purchase_no: purchaseNo };
    }
    return null;
  }

  // ──────────────────────────────────────────────────────────
  // Lookups
  // ──────────────────────────────────────────────────────────

  async getPurchase(purchaseNo: string): Promise<PurchaseWithLines | null> {
    const header: PurchaseOrderRow | undefined = await this.db(this.tableName)
      .where('purchase_no', purchaseNo)
      .first();
    if (!header) return null;

    const lines: PurchaseLineItemRow[] = await this.db('purchase_line_items')
      .where('purchase_no', purchaseNo)
      .orderBy('line_number', 'asc');

    return { ...toPurchaseOrder(header), lines: lines.map(toPurchaseLine) };
  }

  async listPurchases(options: PurchaseListOptions = {}): Promise<Paginated<PurchaseOrder>> {
    const { supplier_id, status, from_date, to_date } = options;

    let query = this.db(this.tableName);
    if (supplier_id) query = query.where('supplier_id', supplier_id);
    if (status) query = query.where('payment_status', status);
    if (from_date) query = query.where('purchase_date', '>=', from_date);
    if (to_date) query = query.where('purchase_date', '<=', to_date);

    return this.paginate<PurchaseOrderRow, PurchaseOrder>(query, {
      page: options.page,
      limit: options.limit,
      columns: ['*'],
      countColumn: 'purchase_no',
      orderBy: [
        { column: 'purchase_date', order: 'desc' },
        { column: 'purchase_no', order: 'desc' },
      ],
      map: toPurchaseOrder,
    });
  }

  /** Most recent Received purchase line for a product, used as a reorder hint */
  async getLastReceivedPurchase(productCode: string): Promise<LastPurchaseInfo | null> {
    const row: LastPurchaseRow | undefined = await this.db('purchase_line_items as pli')
      .join('purchase_orders as po', 'po.purchase_no', 'pli.purchase_no')
      .join('suppliers as s', 's.supplier_id', 'po.supplier_id')
      .where('pli.product_code', productCode)
      .where('po.payment_status', PURCHASE_STATUS.RECEIVED)
      .select(
        'po.purchase_no',
        'po.purchase_date',
        'po.supplier_id',
        's.supplier_name',
        'pli.unit_price',
        'pli.quantity'
      )
      .orderBy('po.purchase_date', 'desc')
      .orderBy('po.purchase_no', 'desc')
      .first();
    if (!row) return null;

    return {
      purchase_no: row.purchase_no,
      purchase_date: row.purchase_date,
      supplier_id: row.supplier_id,
      supplier_name: row.supplier_name,
      unit_price: parseNum(row.unit_price),
      quantity: parseNum(row.quantity),
    };
  }
}

export const purchaseService = new PurchaseService();
