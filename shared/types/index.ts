import type { PURCHASE_STATUS, PURCHASE_CANCEL_MODES, DOCUMENT_TYPES } from '../constants';

// ============================================================
// Result: every posting operation returns one of these
// ============================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ============================================================
// Inventory
// ============================================================

export interface InventoryRecord {
  product_code: string;
  current_stock: number;
  last_updated: string;
}

export interface InventoryListEntry extends InventoryRecord {
  product_name: string;
  brand: string | null;
  min_stock_level: number;
  cost_price: number;
  retail_price: number;
  is_low_stock: boolean;
}

export interface InventorySummary {
  total_products: number;
  total_units: number;
  low_stock_count: number;
  cost_value: number;
  retail_value: number;
}

// ============================================================
// Sales & purchases
// ============================================================

export type PurchaseStatus = (typeof PURCHASE_STATUS)[keyof typeof PURCHASE_STATUS];
export type PurchaseCancelMode = (typeof PURCHASE_CANCEL_MODES)[keyof typeof PURCHASE_CANCEL_MODES];
export type DocumentType = (typeof DOCUMENT_TYPES)[keyof typeof DOCUMENT_TYPES];

/** One product/quantity/price entry as submitted by the POS screen */
export interface LineItemInput {
  product_code: string;
  quantity: number;
  unit_price: number;
}

export interface LineItem {
  line_number: number;
  product_code: string;
  quantity: number;
  unit_price: number;
  line_total: number;
}

export interface SaleLineItem extends LineItem {
  invoice_no: string;
}

export interface SaleOrder {
  invoice_no: string;
  customer_id: string;
  employee_id: string;
  sale_date: string;
  sale_time: string;
  total_amount: number;
  discount: number;
  net_amount: number;
}

export interface SaleWithLines extends SaleOrder {
  lines: SaleLineItem[];
}

export interface PurchaseLineItem extends LineItem {
  purchase_no: string;
}

export interface PurchaseOrder {
  purchase_no: string;
  supplier_id: string;
  purchase_date: string;
  total_amount: number;
  payment_status: PurchaseStatus;
  notes: string | null;
}

export interface PurchaseWithLines extends PurchaseOrder {
  lines: PurchaseLineItem[];
}

export interface LastPurchaseInfo {
  purchase_no: string;
  purchase_date: string;
  supplier_id: string;
  supplier_name: string;
  unit_price: number;
  quantity: number;
}

export interface CreateSaleInput {
  customer_id: string;
  employee_id: string;
  discount?: number;
  lines: LineItemInput[];
}

export interface CreatePurchaseInput {
  supplier_id: string;
  notes?: string | null;
  lines: LineItemInput[];
}

export interface Paginated<T> {
  data: T[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}

// ============================================================
// Errors
// ============================================================

export interface StorageFailure {
  code: 'STORAGE_FAILURE';
  message: string;
  retryable: boolean;
  driver_code: string | null;
}

export interface StockShortage {
  product_code: string;
  requested: number;
  available: number;
}

export interface InsufficientStockError extends StockShortage {
  code: 'INSUFFICIENT_STOCK';
  message: string;
  shortages: StockShortage[];
}

export interface ProductNotFoundError {
  code: 'PRODUCT_NOT_FOUND';
  message: string;
  product_code: string;
}

export interface InvalidLineItemError {
  code: 'INVALID_LINE_ITEM';
  message: string;
  line_number: number;
  product_code: string;
}

export type LedgerError = InsufficientStockError | ProductNotFoundError;

export type AdjustmentError =
  | LedgerError
  | { code: 'INVALID_ADJUSTMENT'; message: string; delta: number }
  | StorageFailure;

export type SaleError =
  | { code: 'EMPTY_CART'; message: string }
  | InvalidLineItemError
  | { code: 'INVALID_DISCOUNT'; message: string; discount: number }
  | { code: 'CUSTOMER_NOT_FOUND'; message: string; customer_id: string }
  | { code: 'EMPLOYEE_NOT_FOUND'; message: string; employee_id: string }
  | LedgerError
  | StorageFailure;

export type PurchaseError =
  | { code: 'EMPTY_PURCHASE'; message: string }
  | InvalidLineItemError
  | { code: 'SUPPLIER_NOT_FOUND'; message: string; supplier_id: string }
  | ProductNotFoundError
  | { code: 'PURCHASE_NOT_FOUND'; message: string; purchase_no: string }
  | { code: 'ALREADY_RECEIVED'; message: string; purchase_no: string }
  | { code: 'CANNOT_CANCEL_RECEIVED'; message: string; purchase_no: string }
  | { code: 'PURCHASE_CANCELLED'; message: string; purchase_no: string }
  | LedgerError
  | StorageFailure;

export type DomainError = SaleError | PurchaseError | AdjustmentError;
