import type { FastifyInstance } from 'fastify';
import type { IMailSender } from '../../domain/ports/IMailSender.js';
import type { INotifier } from '../../domain/ports/INotifier.js';
import type { Logger } from '../logger/logger.js';
import defaultLogger from '../logger/logger.js';
import config from '../../config/env.js';

export type ShutdownHandler = () => Promise<void> | void;

export interface GracefulShutdownOptions {
  /** Upper bound for all handlers together */
  timeoutMs: number;
  /** Called with 0 or 1 once the handlers are done */
  exit?: (code: number) => void;
  logger?: Logger;
}

/**
 * What happened during a shutdown run
 */
export interface ShutdownReport {
  signal: string;
  completed: string[];
  failed: string[];
  timedOut: boolean;
}

class ShutdownTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Shutdown timeout after ${timeoutMs}ms`);
    this.name = 'ShutdownTimeoutError';
  }
}

/**
 * GracefulShutdown - releases resources in reverse registration order.
 *
 * Typical order of registration at startup, so teardown runs HTTP first:
 *   sentry -> notifier (flush mails, close transport) -> fastify
 * A failing handler is logged and the next one still runs.
 */
export class GracefulShutdown {
  private readonly handlers = new Map<string, ShutdownHandler>();
  private readonly log: Logger;
  private readonly exit: (code: number) => void;
  private running: Promise<ShutdownReport> | null = null;

  constructor(private readonly options: GracefulShutdownOptions) {
    this.log = options.logger ?? defaultLogger;
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  register(name: string, handler: ShutdownHandler): void {
    if (this.handlers.has(name)) {
      this.log.warn({ name }, 'Shutdown handler already registered, replacing');
    }
    this.handlers.set(name, handler);
    this.log.debug({ name }, 'Shutdown handler registered');
  }

  /**
   * Stop accepting requests and wait for in-flight ones
   */
  registerFastify(fastify: FastifyInstance): void {
    this.register('fastify', async () => {
      await fastify.close();
    });
  }

  /**
   * Let pending operator notifications go out, then close the mail transport
   */
  registerNotifier(notifier: INotifier, mailSender?: IMailSender): void {
    this.register('notifier', async () => {
      await notifier.flush();
      mailSender?.close?.();
    });
  }

  /**
   * Run every handler once. Later calls get the same run.
   */
  shutdown(signal: string): Promise<ShutdownReport> {
    if (this.running) {
      this.log.warn({ signal }, 'Shutdown already in progress');
      return this.running;
    }

    this.log.info({ signal }, '🛑 Graceful shutdown initiated');
    this.running = this.run(signal);
    return this.running;
  }

  private async run(signal: string): Promise<ShutdownReport> {
    const report: ShutdownReport = { signal, completed: [], failed: [], timedOut: false };
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new ShutdownTimeoutError(this.options.timeoutMs));
      }, this.options.timeoutMs);
    });

    try {
      await Promise.race([this.runHandlers(report), deadline]);
    } catch (error) {
      report.timedOut = error instanceof ShutdownTimeoutError;
      this.log.error(
        { err: error, pending: this.pendingNames(report) },
        '❌ Graceful shutdown failed'
      );
    } finally {
      clearTimeout(timer);
    }

    const duration = Date.now() - startTime;
    const clean = !report.timedOut && report.failed.length === 0;
    this.log.info(
      { duration, ...report },
      clean ? '✅ Graceful shutdown completed' : 'Graceful shutdown finished with errors'
    );
    this.exit(clean ? 0 : 1);
    return report;
  }

  private async runHandlers(report: ShutdownReport): Promise<void> {
    const handlers = Array.from(this.handlers.entries()).reverse();

    for (const [name, handler] of handlers) {
      try {
        await handler();
        report.completed.push(name);
      } catch (error) {
        report.failed.push(name);
        this.log.error({ err: error, handler: name }, `Shutdown handler failed: ${name}`);
      }
    }
  }

  private pendingNames(report: ShutdownReport): string[] {
    const done = new Set([...report.completed, ...report.failed]);
    return [...this.handlers.keys()].filter((name) => !done.has(name));
  }

  setupSignalHandlers(): void {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGUSR2'];

    for (const signal of signals) {
      process.on(signal, () => {
        void this.shutdown(signal);
      });
    }

    // Faults inside requests are recovered by the handler adapter; anything
    // reaching these handlers escaped every request boundary
    process.on('uncaughtException', (error) => {
      this.log.fatal({ err: error }, 'Uncaught exception');
      void this.shutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
      this.log.fatal({ reason }, 'Unhandled rejection');
      void this.shutdown('unhandledRejection');
    });
  }
}

export const gracefulShutdown = new GracefulShutdown({ timeoutMs: config.SHUTDOWN_TIMEOUT_MS });
