import { describe, it, expect, vi } from 'vitest';
import type { IMailSender, INotifier } from '../../src/domain/ports/index.js';
import { GracefulShutdown } from '../../src/infra/shutdown/gracefulShutdown.js';

function build(timeoutMs = 1000) {
  const exit = vi.fn<(code: number) => void>();
  return { shutdown: new GracefulShutdown({ timeoutMs, exit }), exit };
}

describe('GracefulShutdown', () => {
  it('should run handlers in reverse registration order', async () => {
    const { shutdown, exit } = build();
    const order: string[] = [];
    for (const name of ['sentry', 'notifier', 'fastify']) {
      shutdown.register(name, () => {
        order.push(name);
      });
    }

    const report = await shutdown.shutdown('SIGTERM');

    expect(order).toEqual(['fastify', 'notifier', 'sentry']);
    expect(report).toEqual({
      signal: 'SIGTERM',
      completed: ['fastify', 'notifier', 'sentry'],
      failed: [],
      timedOut: false,
    });
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('should keep going after a failing handler and exit with 1', async () => {
    const { shutdown, exit } = build();
    const sentry = vi.fn();
    shutdown.register('sentry', sentry);
    shutdown.register('notifier', async () => {
      await Promise.resolve();
      throw new Error('smtp gone');
    });
    shutdown.register('fastify', () => undefined);

    const report = await shutdown.shutdown('SIGINT');

    expect(report.completed).toEqual(['fastify', 'sentry']);
    expect(report.failed).toEqual(['notifier']);
    expect(sentry).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should give up on handlers that outlive the timeout', async () => {
    const { shutdown, exit } = build(20);
    const sentry = vi.fn();
    shutdown.register('sentry', sentry);
    shutdown.register('fastify', () => new Promise<void>(() => undefined));

    const report = await shutdown.shutdown('SIGTERM');

    expect(report.timedOut).toBe(true);
    expect(report.completed).toEqual([]);
    expect(sentry).not.toHaveBeenCalled();
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should run only once when signalled repeatedly', async () => {
    const { shutdown, exit } = build();
    const handler = vi.fn();
    shutdown.register('fastify', handler);

    const first = shutdown.shutdown('SIGTERM');
    const second = shutdown.shutdown('SIGINT');

    expect(second).toBe(first);
    const report = await first;
    expect(report.signal).toBe('SIGTERM');
    expect(handler).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });

  it('should replace a handler registered twice under one name', async () => {
    const { shutdown } = build();
    const stale = vi.fn();
    const fresh = vi.fn();
    shutdown.register('fastify', stale);
    shutdown.register('fastify', fresh);

    const report = await shutdown.shutdown('SIGTERM');

    expect(report.completed).toEqual(['fastify']);
    expect(stale).not.toHaveBeenCalled();
    expect(fresh).toHaveBeenCalledTimes(1);
  });

  it('should flush pending notifications before closing the mail transport', async () => {
    const { shutdown, exit } = build();
    const calls: string[] = [];
    const notifier: INotifier = {
      report: () => undefined,
      flush: async () => {
        await Promise.resolve();
        calls.push('flush');
      },
    };
    const mailSender: IMailSender = {
      send: async () => undefined,
      close: () => {
        calls.push('close');
      },
    };

    shutdown.registerNotifier(notifier, mailSender);
    const report = await shutdown.shutdown('SIGTERM');

    expect(calls).toEqual(['flush', 'close']);
    expect(report.completed).toEqual(['notifier']);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('should flush the notifier when there is no mail transport', async () => {
    const { shutdown } = build();
    const flush = vi.fn(async () => undefined);

    shutdown.registerNotifier({ report: () => undefined, flush });
    const report = await shutdown.shutdown('SIGTERM');

    expect(flush).toHaveBeenCalledTimes(1);
    expect(report.failed).toEqual([]);
  });
});
