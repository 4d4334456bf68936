import { describe, it, expect, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { OverrideRegistry } from '../../src/app/handler/OverrideRegistry.js';
import type { Handler } from '../../src/app/handler/types.js';
import {
  forbidden,
  internalError,
  methodNotAllowed,
  notFound,
} from '../../src/shared/errors/AppError.js';
import { RecordingNotifier, adapterApp } from '../helpers.js';

function allOverrides(): OverrideRegistry {
  const overrides = new OverrideRegistry();
  overrides.setErrorHandler((ctx) => ctx.emitJSON({ page: 'error' }));
  overrides.setNotFoundHandler((ctx) => ctx.emitJSON({ page: 'not-found' }));
  overrides.setForbiddenHandler((ctx) => ctx.emitJSON({ page: 'forbidden' }));
  return overrides;
}

describe('RecoveryRouter', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  async function request(
    handler: Handler,
    overrides: OverrideRegistry,
    notifier = new RecordingNotifier()
  ): Promise<{ statusCode: number; payload: string; notifier: RecordingNotifier }> {
    const built = await adapterApp({ '/r': handler }, { overrides, notifier });
    app = built.app;
    const response = await app.inject({ method: 'GET', url: '/r' });
    return { statusCode: response.statusCode, payload: response.payload, notifier };
  }

  describe('override selection', () => {
    it.each([
      [internalError(), 500, '{"page":"error"}'],
      [notFound(), 404, '{"page":"not-found"}'],
      [forbidden(), 403, '{"page":"forbidden"}'],
    ])('should run the override matching %s', async (error, statusCode, payload) => {
      const result = await request(() => error, allOverrides());

      expect(result.statusCode).toBe(statusCode);
      expect(result.payload).toBe(payload);
    });

    it('should answer other statuses with a bare response even when every override is set', async () => {
      const result = await request(() => methodNotAllowed(), allOverrides());

      expect(result.statusCode).toBe(405);
      expect(result.payload).toBe('');
    });

    it('should never use an override registered for another status', async () => {
      const overrides = new OverrideRegistry();
      const notFoundPage = vi.fn<Handler>((ctx) => ctx.emitJSON({ page: 'not-found' }));
      overrides.setNotFoundHandler(notFoundPage);

      const result = await request(() => internalError('db down'), overrides);

      expect(result.statusCode).toBe(500);
      expect(result.payload).toBe('');
      expect(notFoundPage).not.toHaveBeenCalled();
    });

    it('should give the override the failure and preset the status', async () => {
      const overrides = new OverrideRegistry();
      let seen: { code?: string; status: number } | undefined;
      overrides.setForbiddenHandler((ctx) => {
        seen = { code: ctx.failure?.code, status: ctx.reply.statusCode };
        return ctx.emitJSON({ denied: true });
      });

      const result = await request(() => forbidden('Admins only'), overrides);

      expect(seen).toEqual({ code: 'FORBIDDEN', status: 403 });
      expect(result.statusCode).toBe(403);
      expect(result.payload).toBe('{"denied":true}');
    });

    it('should use the last registered override', async () => {
      const overrides = new OverrideRegistry();
      overrides.setNotFoundHandler((ctx) => ctx.emitJSON('first'));
      overrides.setNotFoundHandler((ctx) => ctx.emitJSON('second'));

      const result = await request(() => notFound(), overrides);

      expect(result.payload).toBe('"second"');
    });
  });

  it('should pick up overrides registered after the server was built', async () => {
    const overrides = new OverrideRegistry();
    const built = await adapterApp({ '/r': () => forbidden() }, { overrides });
    app = built.app;

    const before = await app.inject({ method: 'GET', url: '/r' });
    overrides.setForbiddenHandler((ctx) => ctx.emitJSON({ page: 'forbidden' }));
    const after = await app.inject({ method: 'GET', url: '/r' });

    expect(before.payload).toBe('');
    expect(after.statusCode).toBe(403);
    expect(after.payload).toBe('{"page":"forbidden"}');
  });

  describe('failing overrides', () => {
    it('should write the original status when the override returns a failure', async () => {
      const overrides = new OverrideRegistry();
      overrides.setNotFoundHandler(() => internalError('template missing'));
      const errorPage = vi.fn<Handler>((ctx) => ctx.emitJSON({ page: 'error' }));
      overrides.setErrorHandler(errorPage);

      const result = await request(() => notFound(), overrides);

      expect(result.statusCode).toBe(404);
      expect(result.payload).toBe('');
      expect(errorPage).not.toHaveBeenCalled();
    });

    it('should write the original status when the override throws', async () => {
      const overrides = new OverrideRegistry();
      overrides.setForbiddenHandler(() => {
        throw new Error('override crashed');
      });

      const result = await request(() => forbidden(), overrides);

      expect(result.statusCode).toBe(403);
      expect(result.payload).toBe('');
    });

    it('should keep what the override wrote before failing', async () => {
      const overrides = new OverrideRegistry();
      overrides.setErrorHandler((ctx) => {
        ctx.emitJSON({ page: 'error' });
        return internalError('after write');
      });

      const result = await request(() => new Error('boom'), overrides);

      expect(result.statusCode).toBe(500);
      expect(result.payload).toBe('{"page":"error"}');
    });
  });

  describe('notification', () => {
    it('should notify exactly once with the original error on every branch', async () => {
      const branches: [Handler, OverrideRegistry][] = [
        [() => notFound(), new OverrideRegistry()],
        [() => notFound(), allOverrides()],
        [
          () => notFound(),
          new OverrideRegistry({ notFound: () => internalError('override failed') }),
        ],
        [
          (ctx) => {
            ctx.writeStatus(204);
            return notFound();
          },
          allOverrides(),
        ],
      ];

      for (const [handler, overrides] of branches) {
        const result = await request(handler, overrides);
        await app?.close();
        app = undefined;

        expect(result.notifier.reports).toHaveLength(1);
        expect(result.notifier.reports[0]?.error.statusCode).toBe(404);
        expect(result.notifier.reports[0]?.error.code).toBe('NOT_FOUND');
      }
    });

    it('should not write anything after a committed response', async () => {
      const notFoundPage = vi.fn<Handler>((ctx) => ctx.emitJSON({ page: 'not-found' }));
      const overrides = new OverrideRegistry({ notFound: notFoundPage });

      const result = await request((ctx) => {
        ctx.writeStatus(204);
        return notFound();
      }, overrides);

      expect(result.statusCode).toBe(204);
      expect(notFoundPage).not.toHaveBeenCalled();
    });

    it('should still answer when the notifier throws', async () => {
      const notifier = new RecordingNotifier();
      vi.spyOn(notifier, 'report').mockImplementation(() => {
        throw new Error('notifier down');
      });

      const result = await request(() => forbidden(), new OverrideRegistry(), notifier);

      expect(result.statusCode).toBe(403);
      expect(notifier.report).toHaveBeenCalledTimes(1);
    });
  });
});
