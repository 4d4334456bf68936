export {
  initializeSentry,
  captureException,
  flushSentry,
  closeSentry,
} from './sentry.js';
