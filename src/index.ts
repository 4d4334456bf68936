/**
 * Request Dispatch Kit
 * Fastify service entry point
 */

// Load environment variables FIRST
import dotenv from 'dotenv';
dotenv.config();

import { createServer } from './app/server.js';
import { TOKENS, registerDependencies } from './container.js';
import config from './config/env.js';
import logger from './infra/logger/logger.js';
import { gracefulShutdown } from './infra/shutdown/gracefulShutdown.js';
import { initializeSentry, flushSentry, closeSentry } from './infra/monitoring/index.js';

async function main(): Promise<void> {
  try {
    logger.info(
      {
        service: config.SERVICE_NAME,
        version: config.SERVICE_VERSION,
        env: config.NODE_ENV,
        nodeVersion: process.version,
      },
      '🚀 Starting service...'
    );

    // ============================================
    // INITIALIZATION ORDER MATTERS!
    // ============================================

    // 1. Initialize error tracking (Sentry)
    initializeSentry();

    // 2. Setup signal handlers for graceful shutdown
    gracefulShutdown.setupSignalHandlers();

    // 3. Register shutdown handlers (run in reverse order)
    gracefulShutdown.register('sentry', async () => {
      await flushSentry();
      await closeSentry();
    });

    // 4. Initialize dependency injection
    const container = registerDependencies();

    // Pending operator mails go out before the transport closes
    gracefulShutdown.registerNotifier(
      container.resolve(TOKENS.Notifier),
      container.resolve(TOKENS.MailSender)
    );

    // 5. Error pages
    const overrides = container.resolve(TOKENS.OverrideRegistry);
    overrides.setNotFoundHandler((ctx) =>
      ctx.renderTemplate(['errors/not-found', 'layouts/base'], { path: ctx.path })
    );
    overrides.setForbiddenHandler((ctx) =>
      ctx.renderTemplate(['errors/forbidden', 'layouts/base'], {})
    );
    overrides.setErrorHandler((ctx) =>
      ctx.renderTemplate(['errors/server-error', 'layouts/base'], { requestId: ctx.requestId })
    );

    // 6. Create and start HTTP server
    const server = await createServer();
    gracefulShutdown.registerFastify(server);
    await server.listen({ port: config.PORT, host: config.HOST });

    logger.info({ port: config.PORT, host: config.HOST }, '✅ HTTP server started');

    logger.info(
      {
        service: config.SERVICE_NAME,
        version: config.SERVICE_VERSION,
        pid: process.pid,
      },
      '🎉 Service started successfully'
    );
  } catch (error) {
    logger.fatal({ err: error }, '💥 Failed to start service');
    process.exit(1);
  }
}

// Start the application
void main();
