import type { Logger as PinoLogger } from 'pino';
import pino from 'pino';
import config from '../../config/env.js';

export type Logger = PinoLogger;

/**
 * Sensitive data paths to redact from logs
 * Covers request credentials, form secrets and mail transport settings
 */
const REDACT_PATHS = [
  // Authentication & Tokens
  'password',
  'token',
  'accessToken',
  'refreshToken',
  'apiKey',
  'secret',
  'authorization',
  'csrfToken',

  // Request headers (security-sensitive)
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["x-api-key"]',
  'meta.headers.authorization',
  'meta.headers.cookie',

  // Form and body fields
  'body.password',
  'body.token',
  'body.csrfToken',
  'form.password',
  'form.csrfToken',

  // Infrastructure secrets
  'SMTP_PASSWORD',
  'auth.pass',
];

/**
 * Singleton Logger Factory
 * Creates a single logger instance for the entire application
 */
class LoggerFactory {
  private static instance: Logger | null = null;

  static getInstance(): Logger {
    if (!this.instance) {
      this.instance = this.createLogger();
    }
    return this.instance;
  }

  private static createLogger(): Logger {
    const isDevelopment = config.NODE_ENV === 'development';
    const isTest = config.NODE_ENV === 'test';

    if (isTest) {
      return pino({ level: 'silent' });
    }

    if (isDevelopment) {
      return pino({
        level: config.LOG_LEVEL,
        redact: {
          paths: REDACT_PATHS,
          censor: '[REDACTED]',
        },
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            singleLine: false,
          },
        },
      });
    }

    // Production logger
    return pino({
      level: config.LOG_LEVEL,
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        paths: REDACT_PATHS,
        censor: '[REDACTED]',
      },
      serializers: {
        err: pino.stdSerializers.err,
        cause: pino.stdSerializers.err,
      },
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        service: config.SERVICE_NAME,
        env: config.NODE_ENV,
      },
    });
  }

  /**
   * Create a child logger with additional context
   */
  static createChild(bindings: Record<string, unknown>): Logger {
    return this.getInstance().child(bindings);
  }

  /**
   * Create a request-scoped logger
   */
  static createRequestLogger(requestId: string, correlationId?: string): Logger {
    return this.createChild(correlationId ? { requestId, correlationId } : { requestId });
  }
}

const logger = LoggerFactory.getInstance();

export default logger;
export { LoggerFactory };
