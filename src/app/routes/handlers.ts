import config from '../../config/env.js';
import type { Handler } from '../handler/types.js';

/**
 * Health check response interface
 */
interface HealthCheckResponse {
  status: 'ok';
  service: string;
  version: string;
  timestamp: string;
  uptime: number;
}

/**
 * Health check handler - Liveness probe
 */
export const healthCheckHandler: Handler = (ctx) => {
  const response: HealthCheckResponse = {
    status: 'ok',
    service: config.SERVICE_NAME,
    version: config.SERVICE_VERSION,
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  };

  return ctx.emitJSON(response);
};

/**
 * Root handler - Service info
 */
export const rootHandler: Handler = (ctx) =>
  ctx.emitJSON({
    service: config.SERVICE_NAME,
    version: config.SERVICE_VERSION,
    health: '/health',
  });
