import type { AppError } from '../../shared/errors/AppError.js';

/**
 * Request details attached to an error report
 */
export interface RequestMetadata {
  requestId: string;
  correlationId: string;
  method: string;
  url: string;
  ip?: string;
  userAgent?: string;
}

/**
 * Notifier Interface
 * Side channel for classified errors. `report` is fire-and-forget: it must
 * not throw and must not delay the response.
 */
export interface INotifier {
  report(error: AppError, meta: RequestMetadata): void;

  /**
   * Resolve once every report already started has finished
   */
  flush(): Promise<void>;
}
