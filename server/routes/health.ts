import { FastifyInstance } from 'fastify';
import { getDb } from '../database/connection';
import { APP_VERSION } from '../../shared/constants';

export async function healthRoutes(server: FastifyInstance) {
  server.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
    };
  });

  server.get('/health/db', async (request, reply) => {
    try {
      const db = getDb();
      await db.raw('SELECT 1');
      return { status: 'ok', database: 'connected' };
    } catch (error) {
      request.log.error({ err: error }, 'Database health check failed');
      return reply.code(503).send({ status: 'error', database: 'disconnected' });
    }
  });
}
