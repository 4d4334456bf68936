/**
 * Error classification
 *
 * Turns any failure value (a returned Error, a thrown value, a rejected
 * promise's reason) into an AppError with an HTTP status. Pure and total:
 * it never throws, whatever it is given.
 */
import { inspect } from 'util';
import { AppError, InternalError } from './AppError.js';

// ============================================
// TYPES
// ============================================

export type Failure =
  | { kind: 'classified'; error: AppError }
  | { kind: 'unclassified'; cause: unknown };

// ============================================
// CLASSIFICATION
// ============================================

export function toFailure(value: unknown): Failure {
  if (value instanceof AppError) {
    return { kind: 'classified', error: value };
  }
  return { kind: 'unclassified', cause: value };
}

/**
 * Human-readable description of an arbitrary failure value
 */
export function describeFailure(value: unknown): string {
  if (value instanceof Error) {
    return value.message || value.name;
  }
  if (typeof value === 'string') {
    return value;
  }
  try {
    return inspect(value, { depth: 2, breakLength: Infinity });
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * Classify a failure. AppErrors pass through untouched, so
 * `classify(classify(x)) === classify(x)`.
 */
export function classify(value: unknown): AppError {
  const failure = toFailure(value);

  switch (failure.kind) {
    case 'classified':
      return failure.error;
    case 'unclassified':
      return new InternalError(describeFailure(failure.cause), { cause: failure.cause });
  }
}

// ============================================
// FAULT RECOVERY
// ============================================

/**
 * A fault recovered at the request boundary: a thrown value or a rejected
 * promise. Keeps the original value as `cause` and the best stack available.
 */
export class PanicError extends Error {
  readonly fault: unknown;

  constructor(fault: unknown) {
    super(`panic recovered: ${describeFailure(fault)}`, { cause: fault });
    this.name = 'PanicError';
    this.fault = fault;

    if (fault instanceof Error && fault.stack) {
      this.stack = `${this.name}: ${this.message}\n${stackFrames(fault.stack)}`;
    } else {
      Error.captureStackTrace(this, PanicError);
    }
  }
}

/**
 * Drop the "Name: message" header of a stack, keeping the frames
 */
function stackFrames(stack: string): string {
  const lines = stack.split('\n');
  const firstFrame = lines.findIndex((line) => line.trimStart().startsWith('at '));
  return firstFrame === -1 ? stack : lines.slice(firstFrame).join('\n');
}

export function recoverPanic(fault: unknown): PanicError {
  return new PanicError(fault);
}
