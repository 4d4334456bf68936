/**
 * Recovery Router
 *
 * Answers a classified error. Priority, first match wins:
 *   1. 500 + error override registered      -> run it
 *   2. 404 + not-found override registered  -> run it
 *   3. 403 + forbidden override registered  -> run it
 *   4. bare status response, empty body
 * An override that fails (returns or throws) falls to step 4 for the
 * original status; overrides never cascade into one another.
 *
 * Whatever the branch, the error is logged and the notifier is called
 * exactly once, unless the caller asks for a quiet answer (unmatched
 * routes, which are answered but never reported).
 */
import type { INotifier } from '../../domain/ports/INotifier.js';
import type { RequestContext } from '../../shared/context/RequestContext.js';
import type { AppError } from '../../shared/errors/AppError.js';
import { classify, recoverPanic } from '../../shared/errors/classify.js';
import { overrideKindFor, type OverrideRegistry } from './OverrideRegistry.js';
import type { Handler, RecoveryResolution } from './types.js';

export interface RecoveryOptions {
  /** Log at warn/error and notify operators. Defaults to true. */
  report?: boolean;
}

export class RecoveryRouter {
  constructor(
    private readonly overrides: OverrideRegistry,
    private readonly notifier: INotifier
  ) {}

  async handle(
    ctx: RequestContext,
    error: AppError,
    options: RecoveryOptions = {}
  ): Promise<RecoveryResolution> {
    if (options.report === false) {
      ctx.log.debug({ statusCode: error.statusCode, url: ctx.path }, error.message);
      return this.resolve(ctx, error);
    }

    this.log(ctx, error);
    try {
      return await this.resolve(ctx, error);
    } finally {
      this.notify(ctx, error);
    }
  }

  private async resolve(ctx: RequestContext, error: AppError): Promise<RecoveryResolution> {
    if (ctx.committed) {
      ctx.log.warn(
        { statusCode: error.statusCode },
        'Response already sent before the failure, not writing an error response'
      );
      return 'committed';
    }

    const kind = overrideKindFor(error.statusCode);
    const override = kind ? this.overrides.snapshot()[kind] : undefined;
    if (override) {
      const overrideFailure = await this.runOverride(override, ctx, error);
      if (!overrideFailure) {
        return 'override';
      }

      ctx.log.error(
        { err: overrideFailure, statusCode: error.statusCode },
        'Override handler failed, writing default response'
      );
      if (ctx.committed) {
        return 'committed';
      }
    }

    return this.writeDefault(ctx, error.statusCode);
  }

  /**
   * Run an override. Returns the failure it produced, if any.
   */
  private async runOverride(
    override: Handler,
    ctx: RequestContext,
    error: AppError
  ): Promise<AppError | undefined> {
    ctx.failure = error;
    void ctx.reply.code(error.statusCode);

    try {
      const outcome = await override(ctx);
      return outcome instanceof Error ? classify(outcome) : undefined;
    } catch (fault) {
      return classify(recoverPanic(fault));
    }
  }

  private writeDefault(ctx: RequestContext, statusCode: number): RecoveryResolution {
    try {
      ctx.writeStatus(statusCode);
    } catch (writeError) {
      ctx.log.error({ err: writeError, statusCode }, 'Failed to write default error response');
      return 'committed';
    }
    return 'default';
  }

  private log(ctx: RequestContext, error: AppError): void {
    const fields = {
      err: error,
      cause: error.cause,
      code: error.code,
      statusCode: error.statusCode,
      method: ctx.method,
      url: ctx.path,
    };

    if (error.severity === 'error') {
      ctx.log.error(fields, error.message);
    } else {
      ctx.log.warn(fields, error.message);
    }
  }

  private notify(ctx: RequestContext, error: AppError): void {
    try {
      this.notifier.report(error, ctx.metadata());
    } catch (notifyError) {
      ctx.log.error({ err: notifyError }, 'Error notifier threw while reporting');
    }
  }
}
