import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import formbody from '@fastify/formbody';
import type {
  IMailSender,
  INotifier,
  ITemplateRenderer,
  MailMessage,
  RequestMetadata,
} from '../src/domain/ports/index.js';
import { HandlerAdapter } from '../src/app/handler/HandlerAdapter.js';
import { OverrideRegistry } from '../src/app/handler/OverrideRegistry.js';
import type { Handler } from '../src/app/handler/types.js';
import { RequestContext } from '../src/shared/context/RequestContext.js';
import type { AppError } from '../src/shared/errors/AppError.js';

/**
 * Records every report instead of sending it anywhere
 */
export class RecordingNotifier implements INotifier {
  readonly reports: { error: AppError; meta: RequestMetadata }[] = [];

  report(error: AppError, meta: RequestMetadata): void {
    this.reports.push({ error, meta });
  }

  async flush(): Promise<void> {}
}

/**
 * Renders "<names joined by +>:<JSON data>" or fails for configured names
 */
export class FakeTemplateRenderer implements ITemplateRenderer {
  readonly calls: { names: readonly string[]; data: unknown }[] = [];
  readonly failing = new Set<string>();

  async render(names: readonly string[], data: unknown): Promise<string> {
    this.calls.push({ names, data });
    const broken = names.find((name) => this.failing.has(name));
    if (broken) {
      throw new Error(`cannot render ${broken}`);
    }
    return `${names.join('+')}:${JSON.stringify(data)}`;
  }
}

export class FakeMailSender implements IMailSender {
  readonly sent: MailMessage[] = [];
  readonly failFor = new Set<string>();

  async send(message: MailMessage): Promise<void> {
    if (this.failFor.has(message.to)) {
      throw new Error(`mailbox unavailable: ${message.to}`);
    }
    this.sent.push(message);
  }
}

/**
 * Fastify app with a single GET/POST route that builds a RequestContext and
 * hands it to `use`. Lets context-level code run against a real reply.
 */
export async function contextApp(
  use: (ctx: RequestContext) => Promise<void> | void,
  renderer: ITemplateRenderer = new FakeTemplateRenderer()
): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  await app.register(formbody);
  app.route({
    method: ['GET', 'POST'],
    url: '/ctx',
    handler: async (request, reply) => {
      const ctx = new RequestContext(request, reply, { renderer });
      await use(ctx);
    },
  });
  await app.ready();
  return app;
}

export interface AdapterAppOptions {
  overrides?: OverrideRegistry;
  notifier?: RecordingNotifier;
  defaultHeaders?: Record<string, string>;
}

export interface AdapterApp {
  app: FastifyInstance;
  adapter: HandlerAdapter;
  overrides: OverrideRegistry;
  notifier: RecordingNotifier;
}

/**
 * Bare Fastify app wired to a HandlerAdapter with in-memory collaborators
 */
export async function adapterApp(
  routes: Record<string, Handler>,
  options: AdapterAppOptions = {}
): Promise<AdapterApp> {
  const overrides = options.overrides ?? new OverrideRegistry();
  const notifier = options.notifier ?? new RecordingNotifier();
  const adapter = new HandlerAdapter({
    overrides,
    notifier,
    renderer: new FakeTemplateRenderer(),
    defaultHeaders: options.defaultHeaders,
  });

  const app = Fastify({ logger: false });
  await app.register(formbody);
  for (const [url, handler] of Object.entries(routes)) {
    app.route({ method: ['GET', 'POST'], url, handler: adapter.wrap(handler) });
  }
  app.setNotFoundHandler(adapter.notFoundHandler);
  app.setErrorHandler(adapter.errorHandler);
  await app.ready();

  return { app, adapter, overrides, notifier };
}
