/**
 * Error Handling Module
 *
 * Classified error taxonomy, named constructors and the classifier.
 */

// Error classes
export {
  AppError,
  BadRequestError,
  ForbiddenError,
  NotFoundError,
  MethodNotAllowedError,
  InternalError,
  isErrorStatusCode,
  type ErrorSeverity,
} from './AppError.js';

// Named constructors
export { badRequest, forbidden, notFound, methodNotAllowed, internalError } from './AppError.js';

// Classification
export {
  classify,
  toFailure,
  describeFailure,
  recoverPanic,
  PanicError,
  type Failure,
} from './classify.js';
