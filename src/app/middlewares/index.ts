export { registerCorrelationId, CORRELATION_ID_HEADER, REQUEST_ID_HEADER } from './correlationId.js';
