/**
 * Error Notifier
 *
 * Operator side channel for classified errors:
 * - 5xx errors go to Sentry
 * - every error is mailed to each administrator, rendered from the
 *   `mails/error` template
 *
 * `report` returns immediately. Rendering or delivery failures are logged
 * per recipient and never retried; they never reach the request.
 */
import type { INotifier, RequestMetadata } from '../../domain/ports/INotifier.js';
import type { IMailSender } from '../../domain/ports/IMailSender.js';
import type { ITemplateRenderer } from '../../domain/ports/ITemplateRenderer.js';
import type { AppError } from '../../shared/errors/index.js';
import { describeFailure } from '../../shared/errors/index.js';
import { maskEmail, sendEmailSafely } from '../../shared/utils/index.js';
import type { Logger } from '../logger/logger.js';
import defaultLogger from '../logger/logger.js';
import { captureException as sentryCaptureException } from '../monitoring/index.js';

// ============================================
// TYPES
// ============================================

export type ExceptionCapturer = (error: Error, context?: Record<string, unknown>) => string;

export interface ErrorMailSettings {
  /** Administrator addresses, one mail each */
  recipients: readonly string[];
  from: string;
  fromName?: string;
  toName?: string;
  subject: string;
  /** Template names passed to the renderer */
  templateNames?: readonly string[];
}

export interface ErrorNotifierOptions {
  serviceName: string;
  renderer: ITemplateRenderer;
  /** Omit to disable operator mails */
  mailSender?: IMailSender;
  mail: ErrorMailSettings;
  captureException?: ExceptionCapturer;
  logger?: Logger;
}

/**
 * Data handed to the error mail template
 */
export interface ErrorMailData {
  error: string;
  statusCode: number;
  code: string;
  userMail: string;
  appId: string;
  request: RequestMetadata;
  timestamp: string;
}

export const ERROR_MAIL_TEMPLATE = ['mails/error'] as const;

// ============================================
// NOTIFIER
// ============================================

export class ErrorNotifier implements INotifier {
  private readonly pending = new Set<Promise<void>>();
  private readonly log: Logger;
  private readonly capture: ExceptionCapturer;

  constructor(private readonly options: ErrorNotifierOptions) {
    this.log = options.logger ?? defaultLogger;
    this.capture = options.captureException ?? sentryCaptureException;
  }

  get mailEnabled(): boolean {
    return this.options.mailSender !== undefined && this.options.mail.recipients.length > 0;
  }

  report(error: AppError, meta: RequestMetadata): void {
    if (error.severity === 'error') {
      this.captureSafely(error, meta);
    }

    const mailSender = this.options.mailSender;
    if (mailSender && this.options.mail.recipients.length > 0) {
      this.track(this.mailOperators(mailSender, error, meta));
    }
  }

  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private captureSafely(error: AppError, meta: RequestMetadata): void {
    try {
      this.capture(error, { ...meta, statusCode: error.statusCode, code: error.code });
    } catch (captureError) {
      this.log.error({ err: captureError }, 'Failed to capture error in Sentry');
    }
  }

  private async mailOperators(
    mailSender: IMailSender,
    error: AppError,
    meta: RequestMetadata
  ): Promise<void> {
    const { mail, renderer, serviceName } = this.options;

    for (const admin of mail.recipients) {
      const data: ErrorMailData = {
        error: describeForOperator(error),
        statusCode: error.statusCode,
        code: error.code,
        userMail: admin,
        appId: serviceName,
        request: meta,
        timestamp: error.timestamp.toISOString(),
      };

      let html: string;
      try {
        html = await renderer.render(mail.templateNames ?? ERROR_MAIL_TEMPLATE, data);
      } catch (renderError) {
        this.log.error(
          { err: renderError, to: maskEmail(admin), requestId: meta.requestId },
          'Cannot prepare error email for administrator'
        );
        continue;
      }

      // A sender that throws before returning a promise fails this recipient only
      const delivery = Promise.resolve().then(() =>
        mailSender.send({
          to: admin,
          toName: mail.toName,
          from: mail.from,
          fromName: mail.fromName,
          subject: mail.subject,
          html,
        })
      );
      await sendEmailSafely(delivery, {
        emailType: 'error-report',
        to: admin,
        requestId: meta.requestId,
      });
    }
  }

  private track(work: Promise<void>): void {
    const tracked: Promise<void> = work
      .catch((error: unknown) => {
        this.log.error({ err: error }, 'Error notification failed');
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }
}

/**
 * Full error text for operators: status, code, message and the cause's stack
 */
export function describeForOperator(error: AppError): string {
  const header = `${error.statusCode} ${error.code}: ${error.message}`;
  const cause = error.cause;

  if (cause instanceof Error && cause.stack) {
    return `${header}\n${cause.stack}`;
  }
  if (cause !== undefined && !(cause instanceof Error)) {
    return `${header}\ncause: ${describeFailure(cause)}`;
  }
  return header;
}
