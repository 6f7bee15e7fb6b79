// Raw row shapes as the drivers hand them back. pg returns DECIMAL and
// aggregate BIGINT columns as strings and TIMESTAMPTZ as Date; SQLite
// returns numbers and text. Services map these to the shared types.

export type Numeric = number | string;

export interface InventoryRow {
  product_code: string;
  current_stock: Numeric;
  last_updated: string | Date;
}

export interface InventoryListRow extends InventoryRow {
  product_name: string;
  brand: string | null;
  min_stock_level: Numeric;
  cost_price: Numeric;
  retail_price: Numeric;
}

export interface InventorySummaryRow {
  total_products: Numeric | null;
  total_units: Numeric | null;
  low_stock_count: Numeric | null;
  cost_value: Numeric | null;
  retail_value: Numeric | null;
}

export interface SaleOrderRow {
  invoice_no: string;
  customer_id: string;
  employee_id: string;
  sale_date: string;
  sale_time: string;
  total_amount: Numeric;
  discount: Numeric;
  net_amount: Numeric;
}

export interface PurchaseOrderRow {
  purchase_no: string;
  supplier_id: string;
  purchase_date: string;
  total_amount: Numeric;
  payment_status: string;
  notes: string | null;
}

export interface LineItemRow {
  line_number: Numeric;
  product_code: string;
  quantity: Numeric;
  unit_price: Numeric;
  line_total: Numeric;
}

export interface SaleLineItemRow extends LineItemRow {
  invoice_no: string;
}

export interface PurchaseLineItemRow extends LineItemRow {
  purchase_no: string;
}

export interface LastPurchaseRow {
  purchase_no: string;
  purchase_date: string;
  supplier_id: string;
  supplier_name: string;
  unit_price: Numeric;
  quantity: Numeric;
}

export interface DocumentSequenceRow {
  document_type: string;
  prefix: string;
  last_number: Numeric;
  padding: Numeric;
}

export interface CountRow {
  total: Numeric;
}

export function toTimestampString(value: string | Date): string {
  return value instanceof Date ? value.toISOString() : value;
}
