export {
  PROTOCOL_VERSION,
  CLOSE_CODES,
  SOCKET_ROLES,
  ENDPOINT_PATHS,
  roleFromPath,
  endpointUrl,
  relayBaseUrl,
} from './constants.js';
export type { SocketRole } from './constants.js';

export {
  IdentityManager,
  loadOrCreate,
  generateIdentity,
  recoverIdentity,
  identityFromPrivateKey,
  signData,
  verifySignature,
  publicKeyToAddress,
  addressToPublicKey,
  isValidAddress,
  shortAddress,
  toHex,
  fromHex,
  MemoryStorage,
  FileStorageAdapter,
  RECOVERY_FILE,
  WARNING_FILE,
} from './identity/index.js';
export type { AgentIdentity, Address, IdentityStorage } from './identity/index.js';

export {
  ENVELOPE_KINDS,
  ERROR_REASONS,
  envelopeSchema,
  isTerminal,
  encode,
  decode,
  frameToText,
  signAnnounce,
  verifyAnnounce,
  canonicalJson,
} from './envelope/index.js';
export type {
  EnvelopeKind,
  ErrorReason,
  Envelope,
  AnnounceEnvelope,
  InputEnvelope,
  OutputEnvelope,
  LookupEnvelope,
  LookupResultEnvelope,
  ErrorEnvelope,
  TerminalEnvelope,
  RawFrame,
} from './envelope/index.js';

export { RelayError, errorFromEnvelope, errorFromReason } from './errors/index.js';
export type { RelayErrorCode } from './errors/index.js';

export { ConnectionRegistry } from './registry/index.js';
export type {
  RelayChannel,
  RegistryEntry,
  RegisterOutcome,
  ConnectionRegistryEvents,
} from './registry/index.js';

export { PendingRequestTable } from './pending/index.js';
export type { ReplyChannel, PendingEntry, PendingRequestEvents } from './pending/index.js';

export {
  loadClientConfig,
  loadRelayConfig,
  defaultKeyPath,
  DEFAULT_RELAY_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_TIMEOUT_MS,
} from './config/index.js';
export type { ClientConfig, RelayConfig } from './config/index.js';

export { createLogger, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
