import type { RequestContext } from '../../shared/context/RequestContext.js';

/**
 * What a handler returns: undefined when it wrote the response itself,
 * an Error (classified or not) when the request failed
 */
export type HandlerOutcome = Error | undefined | void;

/**
 * All handlers in the app have this shape
 */
export type Handler = (ctx: RequestContext) => HandlerOutcome | Promise<HandlerOutcome>;

/**
 * Lifecycle of one request through the adapter
 */
export type LifecycleState = 'invoking' | 'success' | 'failed' | 'panicked' | 'responded';

/**
 * How a failed request was answered
 * - override: a registered override handler wrote the response
 * - default: the bare status response was written
 * - committed: a response was already out, nothing more was written
 */
export type RecoveryResolution = 'override' | 'default' | 'committed';

export interface RequestOutcome {
  /** State the request left `invoking` with */
  state: Exclude<LifecycleState, 'invoking' | 'responded'>;
  resolution?: RecoveryResolution;
  statusCode: number;
}
