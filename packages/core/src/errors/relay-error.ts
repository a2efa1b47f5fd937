import type { ErrorEnvelope, ErrorReason } from '../envelope/envelope.js';

export type RelayErrorCode =
  | 'IDENTITY_CORRUPT'
  | 'INVALID_RECOVERY_PHRASE'
  | 'MALFORMED_ENVELOPE'
  | 'PROTOCOL_VIOLATION'
  | 'ADDRESS_OFFLINE'
  | 'TIMEOUT'
  | 'HANDLER_FAILURE'
  | 'REJECTED'
  | 'TRANSPORT_FAILED'
  | 'INVALID_CONFIG';

export class RelayError extends Error {
  readonly code: RelayErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: RelayErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'RelayError';
    this.code = code;
    this.context = context;
  }
}

const CODE_BY_REASON: Record<ErrorReason, RelayErrorCode> = {
  AddressOffline: 'ADDRESS_OFFLINE',
  Timeout: 'TIMEOUT',
  HandlerFailure: 'HANDLER_FAILURE',
  ProtocolViolation: 'PROTOCOL_VIOLATION',
  MalformedEnvelope: 'MALFORMED_ENVELOPE',
  Rejected: 'REJECTED',
  TransportFailed: 'TRANSPORT_FAILED',
};

/**
 * Turn a wire-level ERROR reason into the local error a caller sees.
 */
export function errorFromReason(
  reason: ErrorReason,
  message?: string,
  context?: Record<string, unknown>,
): RelayError {
  return new RelayError(CODE_BY_REASON[reason], message ?? reason, { reason, ...context });
}

export function errorFromEnvelope(envelope: ErrorEnvelope): RelayError {
  const context = envelope.requestId ? { requestId: envelope.requestId } : undefined;
  return errorFromReason(envelope.reason, envelope.message, context);
}
