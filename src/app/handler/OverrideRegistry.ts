/**
 * Override handler registrations
 *
 * Replaces the default status-only response for 500, 404 and 403 outcomes.
 * Each setter publishes a new frozen snapshot, so a request holding a
 * snapshot never observes a half-applied change. Last registration wins.
 */
import logger from '../../infra/logger/logger.js';
import type { Handler } from './types.js';

export interface OverrideHandlers {
  readonly error?: Handler;
  readonly notFound?: Handler;
  readonly forbidden?: Handler;
}

export type OverrideKind = keyof OverrideHandlers;

/**
 * Which override, if any, answers a status code
 */
export function overrideKindFor(statusCode: number): OverrideKind | undefined {
  switch (statusCode) {
    case 500:
      return 'error';
    case 404:
      return 'notFound';
    case 403:
      return 'forbidden';
    default:
      return undefined;
  }
}

export class OverrideRegistry {
  private current: Readonly<OverrideHandlers>;

  constructor(initial: OverrideHandlers = {}) {
    this.current = Object.freeze({ ...initial });
  }

  setErrorHandler(handler: Handler): void {
    this.publish('error', handler);
  }

  setNotFoundHandler(handler: Handler): void {
    this.publish('notFound', handler);
  }

  setForbiddenHandler(handler: Handler): void {
    this.publish('forbidden', handler);
  }

  /**
   * Handlers in effect right now. Later registrations publish a new object.
   */
  snapshot(): Readonly<OverrideHandlers> {
    return this.current;
  }

  private publish(kind: OverrideKind, handler: Handler): void {
    if (this.current[kind]) {
      logger.debug({ kind }, 'Override handler already registered, replacing');
    }
    this.current = Object.freeze({ ...this.current, [kind]: handler });
  }
}
