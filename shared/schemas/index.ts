import { z } from 'zod';
import { MAX_PAGE_SIZE, PURCHASE_STATUS } from '../constants';

// Request shapes only. Business rules (positive quantities, duplicate
// products, stock) stay in the services so they report domain codes.

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

const pagination = {
  page: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
};

export const lineItemSchema = z.object({
  product_code: z.string().trim().min(1),
  quantity: z.number(),
  unit_price: z.number(),
});

export const createSaleSchema = z.object({
  customer_id: z.string().trim().min(1),
  employee_id: z.string().trim().min(1),
  discount: z.number().optional(),
  lines: z.array(lineItemSchema),
});

export const createPurchaseSchema = z.object({
  supplier_id: z.string().trim().min(1),
  notes: z.string().max(500).nullish(),
  lines: z.array(lineItemSchema),
});

export const adjustStockSchema = z.object({
  delta: z.number(),
  reason: z.string().trim().min(1).max(200),
});

export const listSalesQuerySchema = z.object({
  customer_id: z.string().optional(),
  employee_id: z.string().optional(),
  from_date: isoDate.optional(),
  to_date: isoDate.optional(),
  ...pagination,
});

export const listPurchasesQuerySchema = z.object({
  supplier_id: z.string().optional(),
  status: z.enum([PURCHASE_STATUS.PENDING, PURCHASE_STATUS.RECEIVED, PURCHASE_STATUS.CANCELLED]).optional(),
  from_date: isoDate.optional(),
  to_date: isoDate.optional(),
  ...pagination,
});

export const listInventoryQuerySchema = z.object({
  search: z.string().optional(),
  low_stock_only: z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1')
    .optional(),
  ...pagination,
});

export type CreateSaleBody = z.infer<typeof createSaleSchema>;
export type CreatePurchaseBody = z.infer<typeof createPurchaseSchema>;
export type AdjustStockBody = z.infer<typeof adjustStockSchema>;
