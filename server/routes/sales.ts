// =============================================================
// File: server/routes/sales.ts
// Module: Sale Posting Engine
// Description: REST API for POS sales.
//                POST /sales             post a sale
//                GET  /sales             list sales
//                GET  /sales/:invoiceNo  sale with lines
// =============================================================

import { FastifyInstance } from 'fastify';
import { saleService } from '../services/sale.service';
import { createSaleSchema, listSalesQuerySchema } from '../../shared/schemas';
import { sendDomainError, sendValidationError } from '../lib/error-reply';

export async function saleRoutes(server: FastifyInstance) {
  // ──────────────────────────────────────────────────────────
  // POST /sales
  // Responds 201 with the posted sale as read back from the store.
  // ──────────────────────────────────────────────────────────
  server.post('/sales', async (request, reply) => {
    const body = createSaleSchema.safeParse(request.body);
    if (!body.success) return sendValidationError(reply, body.error);

    let invoiceNo: string;
    try {
      const result = await saleService.createSale(body.data);
      if (!result.ok) return sendDomainError(reply, result.error);
      invoiceNo = result.value;
    } catch (error) {
      request.log.error({ err: error }, 'Failed to post sale');
      return reply.code(500).send({ success: false, error: 'Failed to post sale' });
    }

    // The sale is committed from here on; a failed read-back still answers 201
    try {
      const sale = await saleService.getSale(invoiceNo);
      return reply.code(201).send({ success: true, data: sale ?? { invoice_no: invoiceNo } });
    } catch (error) {
      request.log.warn({ err: error, invoice_no: invoiceNo }, 'Sale posted but could not be read back');
      return reply.code(201).send({ success: true, data: { invoice_no: invoiceNo } });
    }
  });

  server.get('/sales', async (request, reply) => {
    const query = listSalesQuerySchema.safeParse(request.query);
    if (!query.success) return sendValidationError(reply, query.error);

    try {
      const result = await saleService.listSales(query.data);
      return { success: true, ...result };
    } catch (error) {
      request.log.error({ err: error }, 'Failed to list sales');
      return reply.code(500).send({ success: false, error: 'Failed to list sales' });
    }
  });

  server.get<{ Params: { invoiceNo: string } }>('/sales/:invoiceNo', async (request, reply) => {
    try {
      const sale = await saleService.getSale(request.params.invoiceNo);
      if (!sale) {
        return reply.code(404).send({ success: false, error: 'Sale not found', code: 'SALE_NOT_FOUND' });
      }
      return { success: true, data: sale };
    } catch (error) {
      request.log.error({ err: error }, 'Failed to fetch sale');
      return reply.code(500).send({ success: false, error: 'Failed to fetch sale' });
    }
  });
}
