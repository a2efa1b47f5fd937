export {
  ENVELOPE_KINDS,
  ERROR_REASONS,
  envelopeSchema,
  isTerminal,
} from './envelope.js';
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
} from './envelope.js';
export { encode, decode, frameToText } from './codec.js';
export type { RawFrame } from './codec.js';
export { signAnnounce, verifyAnnounce, canonicalJson } from './announce.js';
