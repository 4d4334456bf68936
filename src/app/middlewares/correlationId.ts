import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'crypto';

/**
 * Correlation ID Header Names
 */
export const CORRELATION_ID_HEADER = 'x-correlation-id';
export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Extended FastifyRequest with correlation context
 * Set by the onRequest hook; absent for requests that never went through it
 */
declare module 'fastify' {
  interface FastifyRequest {
    correlationId?: string;
    requestId?: string;
  }
}

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Register correlation ID middleware
 * - Extracts or generates correlation ID from incoming request
 * - Adds correlation ID to response headers
 * - Makes correlation ID available in request context
 */
export function registerCorrelationId(fastify: FastifyInstance): void {
  fastify.addHook('onRequest', (request: FastifyRequest, reply: FastifyReply, done) => {
    // Get correlation ID from header or generate new one
    const correlationId =
      headerValue(request, CORRELATION_ID_HEADER) ||
      headerValue(request, REQUEST_ID_HEADER) ||
      randomUUID();

    // Generate unique request ID for this specific request
    const requestId = randomUUID();

    request.correlationId = correlationId;
    request.requestId = requestId;
    request.id = requestId;

    void reply.header(CORRELATION_ID_HEADER, correlationId);
    void reply.header(REQUEST_ID_HEADER, requestId);

    done();
  });
}
