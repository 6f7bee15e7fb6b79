import { FastifyReply } from 'fastify';
import type { ZodError } from 'zod';
import { ERROR_CODES } from '../../shared/constants';
import type { DomainError } from '../../shared/types';

const HTTP_STATUS: Record<DomainError['code'], number> = {
  [ERROR_CODES.EMPTY_CART]: 400,
  [ERROR_CODES.EMPTY_PURCHASE]: 400,
  [ERROR_CODES.INVALID_LINE_ITEM]: 400,
  [ERROR_CODES.INVALID_DISCOUNT]: 400,
  [ERROR_CODES.INVALID_ADJUSTMENT]: 400,
  [ERROR_CODES.CUSTOMER_NOT_FOUND]: 404,
  [ERROR_CODES.EMPLOYEE_NOT_FOUND]: 404,
  [ERROR_CODES.SUPPLIER_NOT_FOUND]: 404,
  [ERROR_CODES.PRODUCT_NOT_FOUND]: 404,
  [ERROR_CODES.PURCHASE_NOT_FOUND]: 404,
  [ERROR_CODES.INSUFFICIENT_STOCK]: 409,
  [ERROR_CODES.ALREADY_RECEIVED]: 409,
  [ERROR_CODES.CANNOT_CANCEL_RECEIVED]: 409,
  [ERROR_CODES.PURCHASE_CANCELLED]: 409,
  [ERROR_CODES.STORAGE_FAILURE]: 500,
};

export function httpStatusFor(error: DomainError): number {
  if (error.code === ERROR_CODES.STORAGE_FAILURE) return error.retryable ? 503 : 500;
  return HTTP_STATUS[error.code];
}

/**
 * Sends a domain error in the standard envelope:
 * { success: false, error, code, details }
 */
export function sendDomainError(reply: FastifyReply, error: DomainError) {
  const { code, message, ...details } = error;
  return reply.code(httpStatusFor(error)).send({ success: false, error: message, code, details });
}

export function sendValidationError(reply: FastifyReply, error: ZodError) {
  return reply.code(400).send({
    success: false,
    error: 'Invalid request',
    code: 'VALIDATION_ERROR',
    details: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  });
}
