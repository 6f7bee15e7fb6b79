// =============================================================
// File: server/routes/purchases.ts
// Module: Purchase Posting Engine
// Description: REST API for supplier purchase orders.
//                POST /purchases                       create (Pending)
//                GET  /purchases                       list
//                GET  /purchases/:purchaseNo           order with lines
//                POST /purchases/:purchaseNo/receive   Pending → Received
//                POST /purchases/:purchaseNo/cancel    Pending → cancelled
//                GET  /products/:productCode/last-purchase
// =============================================================

import { FastifyInstance } from 'fastify';
import { purchaseService } from '../services/purchase.service';
import { PURCHASE_STATUS } from '../../shared/constants';
import { createPurchaseSchema, listPurchasesQuerySchema } from '../../shared/schemas';
import { sendDomainError, sendValidationError } from '../lib/error-reply';

type PurchaseParams = { Params: { purchaseNo: string } };

export async function purchaseRoutes(server: FastifyInstance) {
  server.post('/purchases', async (request, reply) => {
    const body = createPurchaseSchema.safeParse(request.body);
    if (!body.success) return sendValidationError(reply, body.error);

    let purchaseNo: string;
    try {
      const result = await purchaseService.createPurchase(body.data);
      if (!result.ok) return sendDomainError(reply, result.error);
      purchaseNo = result.value;
    } catch (error) {
      request.log.error({ err: error }, 'Failed to create purchase');
      return reply.code(500).send({ success: false, error: 'Failed to create purchase' });
    }

    try {
      const purchase = await purchaseService.getPurchase(purchaseNo);
      return reply.code(201).send({ success: true, data: purchase ?? { purchase_no: purchaseNo } });
    } catch (error) {
      request.log.warn({ err: error, purchase_no: purchaseNo }, 'Purchase created but could not be read back');
      return reply.code(201).send({ success: true, data: { purchase_no: purchaseNo } });
    }
  });

  server.get('/purchases', async (request, reply) => {
    const query = listPurchasesQuerySchema.safeParse(request.query);
    if (!query.success) return sendValidationError(reply, query.error);

    try {
      const result = await purchaseService.listPurchases(query.data);
      return { success: true, ...result };
    } catch (error) {
      request.log.error({ err: error }, 'Failed to list purchases');
      return reply.code(500).send({ success: false, error: 'Failed to list purchases' });
    }
  });

  server.get<PurchaseParams>('/purchases/:purchaseNo', async (request, reply) => {
    try {
      const purchase = await purchaseService.getPurchase(request.params.purchaseNo);
      if (!purchase) {
        return reply.code(404).send({ success: false, error: 'Purchase not found', code: 'PURCHASE_NOT_FOUND' });
      }
      return { success: true, data: purchase };
    } catch (error) {
      request.log.error({ err: error }, 'Failed to fetch purchase');
      return reply.code(500).send({ success: false, error: 'Failed to fetch purchase' });
    }
  });

  // ──────────────────────────────────────────────────────────
  // POST /purchases/:purchaseNo/receive
  // Adds every line's quantity to stock. A second call answers
  // 409 ALREADY_RECEIVED.
  // ──────────────────────────────────────────────────────────
  server.post<PurchaseParams>('/purchases/:purchaseNo/receive', async (request, reply) => {
    const { purchaseNo } = request.params;
    try {
      const result = await purchaseService.markReceived(purchaseNo);
      if (!result.ok) return sendDomainError(reply, result.error);
    } catch (error) {
      request.log.error({ err: error }, 'Failed to receive purchase');
      return reply.code(500).send({ success: false, error: 'Failed to receive purchase' });
    }

    const received = { purchase_no: purchaseNo, payment_status: PURCHASE_STATUS.RECEIVED };
    try {
      const purchase = await purchaseService.getPurchase(purchaseNo);
      return { success: true, data: purchase ?? received };
    } catch (error) {
      request.log.warn({ err: error, purchase_no: purchaseNo }, 'Purchase received but could not be read back');
      return { success: true, data: received };
    }
  });

  server.post<PurchaseParams>('/purchases/:purchaseNo/cancel', async (request, reply) => {
    try {
      const result = await purchaseService.cancelPurchase(request.params.purchaseNo);
      if (!result.ok) return sendDomainError(reply, result.error);

      return { success: true, data: { purchase_no: request.params.purchaseNo } };
    } catch (error) {
      request.log.error({ err: error }, 'Failed to cancel purchase');
      return reply.code(500).send({ success: false, error: 'Failed to cancel purchase' });
    }
  });

  server.get<{ Params: { productCode: string } }>('/products/:productCode/last-purchase', async (request, reply) => {
    try {
      const lastPurchase = await purchaseService.getLastReceivedPurchase(request.params.productCode);
      return { success: true, data: lastPurchase };
    } catch (error) {
      request.log.error({ err: error }, 'Failed to fetch last purchase');
      return reply.code(500).send({ success: false, error: 'Failed to fetch last purchase' });
    }
  });
}
