// =============================================================
// File: server/app.ts
// Description: Fastify server bootstrap with all route
//              registrations.
// =============================================================

import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import sensible from '@fastify/sensible';
import { getEnv } from './config/env';
import { initializeDb, closeDb } from './database/connection';
import logger, { loggerOptions } from './lib/logger';
import { healthRoutes } from './routes/health';
import { saleRoutes } from './routes/sales';
import { purchaseRoutes } from './routes/purchases';
import { inventoryRoutes } from './routes/inventory';
import { APP_NAME } from '../shared/constants';

export async function buildServer(): Promise<FastifyInstance> {
  const server = Fastify({ logger: loggerOptions });

  // Plugins
  await server.register(cors, {
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });
  await server.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginResourcePolicy: { policy: 'cross-origin' },
    crossOriginOpenerPolicy: false,
    crossOriginEmbedderPolicy: false,
  });
  await server.register(sensible);

  // Action endpoints (receive, cancel) are POSTed with a JSON content type
  // and no body; treat an empty body as {}.
  server.removeContentTypeParser('application/json');
  server.addContentTypeParser('application/json', { parseAs: 'string' }, (req, body, done) => {
    const text = String(body).trim();
    if (!text) {
      done(null, {});
      return;
    }
    try {
      done(null, JSON.parse(text));
    } catch (error) {
      done(server.httpErrors.badRequest(error instanceof Error ? error.message : 'Invalid JSON body'), undefined);
    }
  });

  // Initialize database
  await initializeDb();

  // Register routes
  await server.register(healthRoutes, { prefix: '/api' });
  await server.register(saleRoutes, { prefix: '/api' });
  await server.register(purchaseRoutes, { prefix: '/api' });
  await server.register(inventoryRoutes, { prefix: '/api' });

  server.addHook('onClose', async () => {
    await closeDb();
  });

  return server;
}

// Start server when run directly
async function start() {
  const env = getEnv();
  try {
    const server = await buildServer();

    const shutdown = async (signal: string) => {
      server.log.info({ signal }, 'Shutting down');
      await server.close();
      process.exit(0);
    };
    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    await server.listen({ port: env.API_PORT, host: env.API_HOST });
    server.log.info(`${APP_NAME} API running on http://${env.API_HOST}:${env.API_PORT}`);
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start');
    process.exit(1);
  }
}

if (require.main === module) {
  void start();
}
