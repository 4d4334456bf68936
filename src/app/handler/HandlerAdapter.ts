/**
 * Handler Adapter
 *
 * Adapts a fallible handler to Fastify's route contract:
 * - Builds a fresh RequestContext and sets default headers
 * - Invokes the handler inside the single fault-recovery boundary
 * - Classifies returned failures and recovered faults
 * - Hands the classified error to the RecoveryRouter
 *
 * `serve` never rejects: a fault in one request degrades to a 500 for that
 * request only.
 *
 * @example
 * const adapter = new HandlerAdapter({ overrides, notifier, renderer });
 * fastify.get('/items/:id', adapter.wrap(async (ctx) => {
 *   const item = await findItem(ctx.request.params);
 *   if (!item) return notFound();
 *   return ctx.emitJSON(item);
 * }));
 */
import type {
  FastifyError,
  FastifyReply,
  FastifyRequest,
  RouteHandlerMethod,
} from 'fastify';
import type { INotifier } from '../../domain/ports/INotifier.js';
import type { ITemplateRenderer } from '../../domain/ports/ITemplateRenderer.js';
import { RequestContext } from '../../shared/context/RequestContext.js';
import { AppError, isErrorStatusCode, notFound } from '../../shared/errors/AppError.js';
import { classify, recoverPanic } from '../../shared/errors/classify.js';
import type { OverrideRegistry } from './OverrideRegistry.js';
import { RecoveryRouter } from './RecoveryRouter.js';
import type { RecoveryOptions } from './RecoveryRouter.js';
import type { Handler, RequestOutcome } from './types.js';

// ============================================
// TYPES
// ============================================

export interface HandlerAdapterOptions {
  overrides: OverrideRegistry;
  notifier: INotifier;
  renderer: ITemplateRenderer;
  /** Headers set on every response before the handler runs */
  defaultHeaders?: Record<string, string>;
}

type Invocation =
  | { state: 'success' }
  | { state: 'failed'; failure: Error }
  | { state: 'panicked'; failure: Error };

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  'x-ua-compatible': 'chrome=1',
});

// ============================================
// ADAPTER
// ============================================

export class HandlerAdapter {
  private readonly router: RecoveryRouter;
  private readonly renderer: ITemplateRenderer;
  private readonly defaultHeaders: Readonly<Record<string, string>>;

  constructor(options: HandlerAdapterOptions) {
    this.router = new RecoveryRouter(options.overrides, options.notifier);
    this.renderer = options.renderer;
    this.defaultHeaders = options.defaultHeaders ?? DEFAULT_HEADERS;
  }

  /**
   * Fastify route handler for `handler`
   */
  wrap(handler: Handler): RouteHandlerMethod {
    return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
      await this.serve(handler, request, reply);
    };
  }

  /**
   * For `fastify.setNotFoundHandler`: unmatched routes are answered by the
   * not-found override (or a bare 404) but never reported to operators.
   * A 404 returned by a handler is still reported.
   */
  readonly notFoundHandler = async (
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<void> => {
    await this.serve(() => notFound(), request, reply, { report: false });
  };

  /**
   * For `fastify.setErrorHandler`: errors raised by Fastify itself
   * (malformed JSON, body too large, hooks) keep their 4xx/5xx status
   */
  readonly errorHandler = async (
    error: FastifyError,
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<void> => {
    await this.serve(() => classifyFrameworkError(error), request, reply);
  };

  /**
   * Run one request through the lifecycle
   */
  async serve(
    handler: Handler,
    request: FastifyRequest,
    reply: FastifyReply,
    options: RecoveryOptions = {}
  ): Promise<RequestOutcome> {
    // invoking
    const ctx = new RequestContext(request, reply, { renderer: this.renderer });
    this.setDefaultHeaders(ctx);

    const invocation = await RequestContext.run(ctx, () => this.invoke(handler, ctx));

    if (invocation.state === 'success') {
      if (!ctx.committed) {
        ctx.log.debug('Handler succeeded without writing a response');
      }
      return { state: 'success', statusCode: reply.statusCode };
    }

    const error = classify(invocation.failure);
    try {
      const resolution = await this.router.handle(ctx, error, options);
      return { state: invocation.state, resolution, statusCode: reply.statusCode };
    } catch (routingFault) {
      ctx.log.fatal({ err: routingFault }, 'Recovery routing failed');
      return { state: invocation.state, resolution: 'committed', statusCode: reply.statusCode };
    }
  }

  /**
   * The fault-recovery boundary. Thrown values and rejections become
   * PanicErrors; nothing escapes.
   */
  private async invoke(handler: Handler, ctx: RequestContext): Promise<Invocation> {
    try {
      const outcome = await handler(ctx);
      if (outcome instanceof Error) {
        return { state: 'failed', failure: outcome };
      }
      return { state: 'success' };
    } catch (fault) {
      return { state: 'panicked', failure: recoverPanic(fault) };
    }
  }

  private setDefaultHeaders(ctx: RequestContext): void {
    for (const [name, value] of Object.entries(this.defaultHeaders)) {
      void ctx.reply.header(name, value);
    }
  }
}

/**
 * Framework errors carry their own status code
 */
export function classifyFrameworkError(error: FastifyError | Error): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const statusCode = 'statusCode' in error ? error.statusCode : undefined;
  if (typeof statusCode === 'number' && isErrorStatusCode(statusCode)) {
    return new AppError(error.message, statusCode, frameworkErrorCode(error), { cause: error });
  }
  return classify(error);
}

function frameworkErrorCode(error: FastifyError | Error): string {
  return 'code' in error && typeof error.code === 'string' ? error.code : 'FRAMEWORK_ERROR';
}
