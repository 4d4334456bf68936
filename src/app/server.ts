import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import formbody from '@fastify/formbody';
import helmet from '@fastify/helmet';
import config from '../config/env.js';
import { container } from '../container.js';
import logger from '../infra/logger/logger.js';
import type { HandlerAdapter } from './handler/HandlerAdapter.js';
import { registerCorrelationId } from './middlewares/index.js';
import { registerRoutes } from './routes/index.js';
import type { RouteRegistrar } from './routes/index.js';

export interface ServerOptions {
  /** Defaults to the container's adapter */
  adapter?: HandlerAdapter;
  /** Application routes, registered after the service routes */
  routes?: RouteRegistrar;
}

/**
 * Create and configure Fastify server
 */
export async function createServer(options: ServerOptions = {}): Promise<FastifyInstance> {
  const adapter = options.adapter ?? container.resolve('handlerAdapter');

  // Request logging goes through the adapter's per-request loggers
  const fastify = Fastify({
    logger: false,
    bodyLimit: config.BODY_LIMIT,
    // Trust proxy for client IPs behind a load balancer
    trustProxy: true,
  });

  // ============================================
  // SECURITY PLUGINS
  // ============================================

  // Helmet - Security headers
  await fastify.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        scriptSrc: ["'self'"],
        imgSrc: ["'self'", 'data:', 'https:'],
      },
    },
  });

  // ============================================
  // BODY PARSERS
  // ============================================

  // application/x-www-form-urlencoded, read by ctx.loadFormData
  await fastify.register(formbody);

  // ============================================
  // CORE MIDDLEWARES
  // ============================================

  registerCorrelationId(fastify);

  // ============================================
  // ROUTES
  // ============================================

  registerRoutes(fastify, adapter);
  options.routes?.(fastify, adapter);

  // ============================================
  // ERROR HANDLING
  // ============================================

  fastify.setNotFoundHandler(adapter.notFoundHandler);
  fastify.setErrorHandler(adapter.errorHandler);

  logger.info(
    {
      service: config.SERVICE_NAME,
      version: config.SERVICE_VERSION,
      env: config.NODE_ENV,
    },
    '🚀 Server configured'
  );

  return fastify;
}
