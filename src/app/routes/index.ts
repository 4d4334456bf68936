import type { FastifyInstance } from 'fastify';
import type { HandlerAdapter } from '../handler/HandlerAdapter.js';
import { healthCheckHandler, rootHandler } from './handlers.js';

/**
 * Registers application routes; every handler goes through the adapter
 */
export type RouteRegistrar = (fastify: FastifyInstance, adapter: HandlerAdapter) => void;

/**
 * Register the service routes
 */
export function registerRoutes(fastify: FastifyInstance, adapter: HandlerAdapter): void {
  // Root endpoint
  fastify.get('/', adapter.wrap(rootHandler));

  // Health check endpoint (liveness)
  fastify.get('/health', adapter.wrap(healthCheckHandler));
}
