export { RelayError, errorFromEnvelope, errorFromReason } from './relay-error.js';
export type { RelayErrorCode } from './relay-error.js';
