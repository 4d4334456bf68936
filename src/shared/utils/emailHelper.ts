/**
 * Email Helper Utilities
 *
 * Fire-and-forget email sending. Used when a failed email must not block or
 * fail the operation that triggered it.
 */
import logger from '../../infra/logger/logger.js';

/**
 * Context for email sending (for logging purposes)
 */
export interface EmailContext {
  /** Email type for logging (e.g., 'error-report') */
  emailType: string;
  /** Recipient email address */
  to?: string;
  /** Additional context for logging */
  [key: string]: unknown;
}

/**
 * Mask the local part of an address for logs: "ops@example.com" -> "op***@example.com"
 */
export function maskEmail(email: string): string {
  return email.replace(/^(.{2}).*@/, '$1***@');
}

function sanitize(context: EmailContext): EmailContext {
  const sanitizedContext = { ...context };
  if (sanitizedContext.to) {
    sanitizedContext.to = maskEmail(sanitizedContext.to);
  }
  return sanitizedContext;
}

/**
 * Send email in fire-and-forget mode
 *
 * Logs failures and never rejects. The returned promise only tells when the
 * attempt is over, so callers can track in-flight sends.
 *
 * @example
 * ```typescript
 * sendEmailSafely(mailSender.send(message), { emailType: 'error-report', to: admin });
 * ```
 */
export function sendEmailSafely(emailPromise: Promise<unknown>, context: EmailContext): Promise<void> {
  return emailPromise.then(
    () => undefined,
    (error: unknown) => {
      logger.error(
        {
          err: error,
          ...sanitize(context),
          recoverable: true,
        },
        `Failed to send ${context.emailType} email`
      );
    }
  );
}
