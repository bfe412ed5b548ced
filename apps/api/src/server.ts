/**
 * Fastify Server Factory
 *
 * Creates and configures the Fastify instance with all plugins.
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';

import type { AppContext } from './context.js';
import { errorHandler } from './plugins/errorHandler.js';
import {
  authRoutes,
  downloadRoutes,
  healthRoutes,
  libraryRoutes,
  userRoutes,
  watcherRoutes,
} from './routes/index.js';

export async function createServer(context: AppContext): Promise<FastifyInstance> {
  const logger: FastifyBaseLogger = context.logger;
  const server = Fastify({
    logger,
    requestTimeout: 30000,
    bodyLimit: 1024 * 1024, // 1MB
  });

  // ============================================
  // Security plugins
  // ============================================

  await server.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:', 'https:'],
        scriptSrc: ["'self'"],
      },
    },
  });

  await server.register(cors, {
    origin: context.config.corsOrigins,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  });

  // ============================================
  // Error handling
  // ============================================

  await server.register(errorHandler);

  // ============================================
  // Routes
  // ============================================

  // Root route - API info
  server.get('/', async () => ({
    name: 'seedsync',
    version: '1.0.0',
    status: 'running',
    health: '/health',
  }));

  await server.register(healthRoutes, { prefix: '/health', context });
  await server.register(authRoutes, { prefix: '/auth', context });
  await server.register(userRoutes, { prefix: '/user', context });
  await server.register(downloadRoutes, { prefix: '/downloads', context });
  await server.register(watcherRoutes, { prefix: '/watcher', context });
  await server.register(libraryRoutes, { prefix: '/library', context });

  return server;
}
