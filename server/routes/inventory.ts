// =============================================================
// File: server/routes/inventory.ts
// Module: Inventory Ledger
// Description: REST API for stock levels.
//                GET  /inventory                       paginated list
//                GET  /inventory/low-stock             at/below minimum
//                GET  /inventory/summary               totals and value
//                GET  /inventory/:productCode          single record
//                POST /inventory/:productCode/adjust   stock-count fix
//
// Note: adjust() itself is not exposed. Sales and purchase
//       receipts move stock inside their own transactions.
// =============================================================

import { FastifyInstance } from 'fastify';
import { inventoryService } from '../services/inventory.service';
import { adjustStockSchema, listInventoryQuerySchema } from '../../shared/schemas';
import { sendDomainError, sendValidationError } from '../lib/error-reply';

type ProductParams = { Params: { productCode: string } };

export async function inventoryRoutes(server: FastifyInstance) {
  // ──────────────────────────────────────────────────────────
  // GET /inventory
  // Query params: search, low_stock_only, page, limit
  // ──────────────────────────────────────────────────────────
  server.get('/inventory', async (request, reply) => {
    const query = listInventoryQuerySchema.safeParse(request.query);
    if (!query.success) return sendValidationError(reply, query.error);

    try {
      const result = await inventoryService.listInventory(query.data);
      return { success: true, ...result };
    } catch (error) {
      request.log.error({ err: error }, 'Failed to list inventory');
      return reply.code(500).send({ success: false, error: 'Failed to list inventory' });
    }
  });

  server.get('/inventory/low-stock', async (request, reply) => {
    try {
      const data = await inventoryService.getLowStockProducts();
      return { success: true, data };
    } catch (error) {
      request.log.error({ err: error }, 'Failed to fetch low stock products');
      return reply.code(500).send({ success: false, error: 'Failed to fetch low stock products' });
    }
  });

  server.get('/inventory/summary', async (request, reply) => {
    try {
      const data = await inventoryService.getInventorySummary();
      return { success: true, data };
    } catch (error) {
      request.log.error({ err: error }, 'Failed to fetch inventory summary');
      return reply.code(500).send({ success: false, error: 'Failed to fetch inventory summary' });
    }
  });

  server.get<ProductParams>('/inventory/:productCode', async (request, reply) => {
    try {
      const record = await inventoryService.getInventoryRecord(request.params.productCode);
      if (!record) {
        return reply.code(404).send({ success: false, error: 'Inventory record not found', code: 'PRODUCT_NOT_FOUND' });
      }
      return { success: true, data: record };
    } catch (error) {
      request.log.error({ err: error }, 'Failed to fetch inventory record');
      return reply.code(500).send({ success: false, error: 'Failed to fetch inventory record' });
    }
  });

  // ──────────────────────────────────────────────────────────
  // POST /inventory/:productCode/adjust
  // Body: { delta, reason }. Refused with 409 if the result
  // would be negative.
  // ──────────────────────────────────────────────────────────
  server.post<ProductParams>('/inventory/:productCode/adjust', async (request, reply) => {
    const body = adjustStockSchema.safeParse(request.body);
    if (!body.success) return sendValidationError(reply, body.error);

    try {
      const result = await inventoryService.adjustStock(
        request.params.productCode,
        body.data.delta,
        body.data.reason
      );
      if (!result.ok) return sendDomainError(reply, result.error);
      return { success: true, data: result.value };
    } catch (error) {
      request.log.error({ err: error }, 'Failed to adjust stock');
      return reply.code(500).send({ success: false, error: 'Failed to adjust stock' });
    }
  });
}
