import { z } from 'zod';

/**
 * Environment variable validation schema using Zod
 * All configuration is validated at startup - fail fast on misconfiguration
 */
export const envSchema = z.object({
  // ============================================
  // APPLICATION
  // ============================================
  NODE_ENV: z.enum(['development', 'production', 'staging', 'test']).default('development'),
  PORT: z.number().int().positive().default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SERVICE_NAME: z.string().min(1).default('request-dispatch-kit'),
  SERVICE_VERSION: z.string().default('1.0.0'),
  BODY_LIMIT: z.number().int().positive().default(1048576), // 1MB

  // ============================================
  // RENDERING
  // ============================================
  TEMPLATES_DIR: z.string().min(1).default('templates'),
  // Sent on every response handled by the adapter
  UA_COMPATIBLE: z.string().default('chrome=1'),

  // ============================================
  // OPERATOR NOTIFICATIONS
  // ============================================
  ADMIN_EMAILS: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((email) => email.trim())
        .filter(Boolean)
    )
    .pipe(z.array(z.string().email())),
  // Unset means "only in production"
  ERROR_MAIL_ENABLED: z.boolean().optional(),
  ERROR_MAIL_FROM: z.string().email().default('errors@localhost.localdomain'),
  ERROR_MAIL_FROM_NAME: z.string().default('Error notifications'),
  ERROR_MAIL_SUBJECT: z.string().default('An error occurred in the application'),

  // SMTP
  SMTP_HOST: z.string().min(1).optional(),
  SMTP_PORT: z.number().int().positive().default(587),
  SMTP_SECURE: z.boolean().default(false),
  SMTP_USER: z.string().optional(),
  SMTP_PASSWORD: z.string().optional(),

  // ============================================
  // OBSERVABILITY
  // ============================================
  // Sentry
  SENTRY_DSN: z.string().url().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.number().min(0).max(1).default(0.1),

  // ============================================
  // MISC
  // ============================================
  // Graceful Shutdown
  SHUTDOWN_TIMEOUT_MS: z.number().int().positive().default(30000),
});

/**
 * Type definition for the validated environment configuration
 */
export type EnvConfig = z.infer<typeof envSchema>;
