import type { AwilixContainer } from 'awilix';
import { createContainer, asValue, asFunction, InjectionMode } from 'awilix';
import type { EnvConfig } from './config/env.js';
import config from './config/env.js';
import type { Logger } from './infra/logger/logger.js';
import logger from './infra/logger/logger.js';
import type { IMailSender, INotifier, ITemplateRenderer } from './domain/ports/index.js';
import { HandlebarsTemplateRenderer } from './infra/templates/HandlebarsTemplateRenderer.js';
import { SmtpMailSender } from './infra/mail/SmtpMailSender.js';
import { ErrorNotifier } from './infra/notifier/index.js';
import { HandlerAdapter, OverrideRegistry } from './app/handler/index.js';

/**
 * Container Cradle Interface
 * Defines all available dependencies with their types
 */
export interface Cradle {
  // Infrastructure
  config: EnvConfig;
  logger: Logger;
  templateRenderer: ITemplateRenderer;
  mailSender: IMailSender | undefined;
  notifier: INotifier;

  // Request pipeline
  overrideRegistry: OverrideRegistry;
  handlerAdapter: HandlerAdapter;
}

/**
 * Dependency Injection Tokens
 * Use these tokens for type-safe dependency resolution
 */
export const TOKENS = {
  // Infrastructure
  Config: 'config',
  Logger: 'logger',
  TemplateRenderer: 'templateRenderer',
  MailSender: 'mailSender',
  Notifier: 'notifier',

  // Request pipeline
  OverrideRegistry: 'overrideRegistry',
  HandlerAdapter: 'handlerAdapter',
} as const;

/**
 * Whether operator error mails go out: explicit setting, otherwise production only
 */
export function isErrorMailEnabled(env: EnvConfig): boolean {
  return env.ERROR_MAIL_ENABLED ?? env.NODE_ENV === 'production';
}

/**
 * Create and configure the DI container
 */
export const container: AwilixContainer<Cradle> = createContainer<Cradle>({
  injectionMode: InjectionMode.PROXY,
  strict: true,
});

/**
 * Register all dependencies in the DI container
 * Call this function once at app startup.
 */
export function registerDependencies(): AwilixContainer<Cradle> {
  container.register({
    // ============================================
    // INFRASTRUCTURE
    // ============================================
    config: asValue(config),
    logger: asValue(logger),

    templateRenderer: asFunction(
      ({ config }: Cradle) =>
        new HandlebarsTemplateRenderer({
          baseDir: config.TEMPLATES_DIR,
          cache: config.NODE_ENV !== 'development',
        })
    ).singleton(),

    mailSender: asFunction(({ config, logger }: Cradle) => {
      if (!isErrorMailEnabled(config)) {
        return undefined;
      }
      if (!config.SMTP_HOST) {
        logger.warn('Error mails enabled but SMTP_HOST is not set, operator mails disabled');
        return undefined;
      }
      return new SmtpMailSender({
        host: config.SMTP_HOST,
        port: config.SMTP_PORT,
        secure: config.SMTP_SECURE,
        user: config.SMTP_USER,
        password: config.SMTP_PASSWORD,
      });
    }).singleton(),

    notifier: asFunction(
      ({ config, logger, templateRenderer, mailSender }: Cradle) => {
        const notifier = new ErrorNotifier({
          serviceName: config.SERVICE_NAME,
          renderer: templateRenderer,
          mailSender,
          mail: {
            recipients: config.ADMIN_EMAILS,
            from: config.ERROR_MAIL_FROM,
            fromName: config.ERROR_MAIL_FROM_NAME,
            toName: 'Administrator',
            subject: config.ERROR_MAIL_SUBJECT,
          },
          logger,
        });
        logger.info(
          { mailEnabled: notifier.mailEnabled, recipients: config.ADMIN_EMAILS.length },
          'Error notifier ready'
        );
        return notifier;
      }
    ).singleton(),

    // ============================================
    // REQUEST PIPELINE
    // ============================================
    overrideRegistry: asFunction(() => new OverrideRegistry()).singleton(),

    handlerAdapter: asFunction(
      ({ config, overrideRegistry, notifier, templateRenderer }: Cradle) =>
        new HandlerAdapter({
          overrides: overrideRegistry,
          notifier,
          renderer: templateRenderer,
          defaultHeaders: config.UA_COMPATIBLE ? { 'x-ua-compatible': config.UA_COMPATIBLE } : {},
        })
    ).singleton(),
  });

  logger.info('Dependency injection container initialized');
  return container;
}
