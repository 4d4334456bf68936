/**
 * Shared Utilities
 *
 * Export commonly used utility functions.
 */
export { sendEmailSafely, maskEmail, type EmailContext } from './emailHelper.js';
