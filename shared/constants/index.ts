export const APP_NAME = 'Retail POS Core';
export const APP_VERSION = '1.0.0';

export const DEFAULT_API_PORT = 3001;
export const DEFAULT_DB_PORT = 5432;

export const PURCHASE_STATUS = {
  PENDING: 'Pending',
  RECEIVED: 'Received',
  CANCELLED: 'Cancelled',
} as const;

export const PURCHASE_CANCEL_MODES = {
  DELETE: 'delete',
  STATUS: 'status',
} as const;

export const DOCUMENT_TYPES = {
  INVOICE: 'invoice',
  PURCHASE: 'purchase',
} as const;

/** Prefix and zero-padding used when a document_sequences row is first created */
export const DOCUMENT_NUMBERING = {
  invoice: { prefix: 'INV', padding: 3 },
  purchase: { prefix: 'PUR', padding: 3 },
} as const;

export const ERROR_CODES = {
  EMPTY_CART: 'EMPTY_CART',
  EMPTY_PURCHASE: 'EMPTY_PURCHASE',
  INVALID_LINE_ITEM: 'INVALID_LINE_ITEM',
  INVALID_DISCOUNT: 'INVALID_DISCOUNT',
  INVALID_ADJUSTMENT: 'INVALID_ADJUSTMENT',
  CUSTOMER_NOT_FOUND: 'CUSTOMER_NOT_FOUND',
  EMPLOYEE_NOT_FOUND: 'EMPLOYEE_NOT_FOUND',
  SUPPLIER_NOT_FOUND: 'SUPPLIER_NOT_FOUND',
  PRODUCT_NOT_FOUND: 'PRODUCT_NOT_FOUND',
  PURCHASE_NOT_FOUND: 'PURCHASE_NOT_FOUND',
  INSUFFICIENT_STOCK: 'INSUFFICIENT_STOCK',
  ALREADY_RECEIVED: 'ALREADY_RECEIVED',
  CANNOT_CANCEL_RECEIVED: 'CANNOT_CANCEL_RECEIVED',
  PURCHASE_CANCELLED: 'PURCHASE_CANCELLED',
  STORAGE_FAILURE: 'STORAGE_FAILURE',
} as const;

/**
 * Driver error codes that mean "the unit of work lost a race, try again":
 * PostgreSQL deadlock_detected, serialization_failure, lock_not_available,
 * and SQLite's busy family.
 */
export const TRANSIENT_STORAGE_ERROR_CODES: readonly string[] = [
  '40P01',
  '40001',
  '55P03',
  'SQLITE_BUSY',
  'SQLITE_BUSY_SNAPSHOT',
  'SQLITE_LOCKED',
];

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 200;
