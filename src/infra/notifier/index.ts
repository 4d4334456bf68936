export {
  ErrorNotifier,
  describeForOperator,
  ERROR_MAIL_TEMPLATE,
  type ErrorNotifierOptions,
  type ErrorMailSettings,
  type ErrorMailData,
  type ExceptionCapturer,
} from './ErrorNotifier.js';
