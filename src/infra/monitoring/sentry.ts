import * as Sentry from '@sentry/node';
import config from '../../config/env.js';
import logger from '../logger/logger.js';

let isInitialized = false;

/**
 * Initialize Sentry error tracking
 *
 * @see https://docs.sentry.io/platforms/node/
 */
export function initializeSentry(): void {
  if (!config.SENTRY_DSN) {
    logger.info('Sentry DSN not configured, error tracking disabled');
    return;
  }

  if (isInitialized) {
    logger.warn('Sentry already initialized');
    return;
  }

  Sentry.init({
    dsn: config.SENTRY_DSN,
    environment: config.SENTRY_ENVIRONMENT || config.NODE_ENV,
    release: `${config.SERVICE_NAME}@${config.SERVICE_VERSION}`,
    tracesSampleRate: config.SENTRY_TRACES_SAMPLE_RATE,

    // Don't send errors in test environment
    enabled: config.NODE_ENV !== 'test',

    beforeSend(event) {
      event.tags = {
        ...event.tags,
        service: config.SERVICE_NAME,
        environment: config.NODE_ENV,
      };
      return event;
    },
  });

  isInitialized = true;
  logger.info(`🔍 Sentry initialized (env: ${config.NODE_ENV})`);
}

/**
 * Capture an exception manually
 */
export function captureException(error: Error, context?: Record<string, unknown>): string {
  if (!isInitialized) {
    return '';
  }

  return Sentry.captureException(error, {
    extra: context,
  });
}

/**
 * Flush pending events before shutdown
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!isInitialized) return true;

  logger.info('Flushing Sentry events...');
  return Sentry.flush(timeout);
}

/**
 * Close Sentry client
 */
export async function closeSentry(): Promise<void> {
  if (isInitialized) {
    await Sentry.close();
    isInitialized = false;
    logger.info('Sentry closed');
  }
}
