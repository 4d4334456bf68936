import dotenv from 'dotenv';
import { envSchema } from './env.schema.js';
import type { EnvConfig } from './env.schema.js';

dotenv.config();

/**
 * Parse boolean from string
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Parse optional boolean from string (keeps "unset" distinguishable)
 */
function parseOptionalBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value.toLowerCase() === 'true';
}

/**
 * Parse integer from string
 */
function parseInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse float from string
 */
function parseFloat(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Empty strings from .env files count as unset
 */
function optionalString(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

let config: EnvConfig;

try {
  config = envSchema.parse({
    // Application
    NODE_ENV: process.env.NODE_ENV,
    PORT: parseInt(process.env.PORT),
    HOST: optionalString(process.env.HOST),
    LOG_LEVEL: process.env.LOG_LEVEL,
    SERVICE_NAME: optionalString(process.env.SERVICE_NAME),
    SERVICE_VERSION: optionalString(process.env.SERVICE_VERSION),
    BODY_LIMIT: parseInt(process.env.BODY_LIMIT),

    // Rendering
    TEMPLATES_DIR: optionalString(process.env.TEMPLATES_DIR),
    UA_COMPATIBLE: process.env.UA_COMPATIBLE,

    // Operator notifications
    ADMIN_EMAILS: process.env.ADMIN_EMAILS,
    ERROR_MAIL_ENABLED: parseOptionalBoolean(process.env.ERROR_MAIL_ENABLED),
    ERROR_MAIL_FROM: optionalString(process.env.ERROR_MAIL_FROM),
    ERROR_MAIL_FROM_NAME: optionalString(process.env.ERROR_MAIL_FROM_NAME),
    ERROR_MAIL_SUBJECT: optionalString(process.env.ERROR_MAIL_SUBJECT),

    // SMTP
    SMTP_HOST: optionalString(process.env.SMTP_HOST),
    SMTP_PORT: parseInt(process.env.SMTP_PORT),
    SMTP_SECURE: parseBoolean(process.env.SMTP_SECURE, false),
    SMTP_USER: optionalString(process.env.SMTP_USER),
    SMTP_PASSWORD: optionalString(process.env.SMTP_PASSWORD),

    // Observability - Sentry
    SENTRY_DSN: optionalString(process.env.SENTRY_DSN),
    SENTRY_ENVIRONMENT: optionalString(process.env.SENTRY_ENVIRONMENT),
    SENTRY_TRACES_SAMPLE_RATE: parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE),

    // Misc
    SHUTDOWN_TIMEOUT_MS: parseInt(process.env.SHUTDOWN_TIMEOUT_MS),
  });
} catch (error) {
  // eslint-disable-next-line no-console
  console.error('❌ Environment validation failed:', error);
  process.exit(1);
}

export default config;
export type { EnvConfig };
