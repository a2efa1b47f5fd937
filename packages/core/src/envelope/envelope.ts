import { z } from 'zod';

export const ENVELOPE_KINDS = ['ANNOUNCE', 'INPUT', 'OUTPUT', 'LOOKUP', 'LOOKUP_RESULT', 'ERROR'] as const;

export type EnvelopeKind = (typeof ENVELOPE_KINDS)[number];

export const ERROR_REASONS = [
  'AddressOffline',
  'Timeout',
  'HandlerFailure',
  'ProtocolViolation',
  'MalformedEnvelope',
  'Rejected',
  'TransportFailed',
] as const;

export type ErrorReason = (typeof ERROR_REASONS)[number];

const token = z.string().min(1);

export const announceSchema = z.object({
  kind: z.literal('ANNOUNCE'),
  from: token,
  timestamp: z.number().int().nonnegative(),
  summary: z.string().default(''),
  signature: token,
});

export const inputSchema = z.object({
  kind: z.literal('INPUT'),
  from: token.optional(),
  to: token,
  requestId: token,
  payload: z.string(),
  /** Caller's deadline; the relay caps it at its own maximum. */
  timeoutMs: z.number().int().positive().optional(),
});

export const outputSchema = z.object({
  kind: z.literal('OUTPUT'),
  from: token.optional(),
  to: token.optional(),
  requestId: token,
  payload: z.string(),
});

export const lookupSchema = z.object({
  kind: z.literal('LOOKUP'),
  from: token.optional(),
  to: token,
});

export const lookupResultSchema = z.object({
  kind: z.literal('LOOKUP_RESULT'),
  to: token,
  online: z.boolean(),
  summary: z.string().optional(),
});

export const errorSchema = z.object({
  kind: z.literal('ERROR'),
  requestId: token.optional(),
  reason: z.enum(ERROR_REASONS),
  message: z.string().optional(),
});

export const envelopeSchema = z.discriminatedUnion('kind', [
  announceSchema,
  inputSchema,
  outputSchema,
  lookupSchema,
  lookupResultSchema,
  errorSchema,
]);

export type AnnounceEnvelope = z.infer<typeof announceSchema>;
export type InputEnvelope = z.infer<typeof inputSchema>;
export type OutputEnvelope = z.infer<typeof outputSchema>;
export type LookupEnvelope = z.infer<typeof lookupSchema>;
export type LookupResultEnvelope = z.infer<typeof lookupResultSchema>;
export type ErrorEnvelope = z.infer<typeof errorSchema>;

export type Envelope = z.infer<typeof envelopeSchema>;

/** OUTPUT or ERROR: the envelopes that end a pending request. */
export type TerminalEnvelope = OutputEnvelope | ErrorEnvelope;

export function isTerminal(envelope: Envelope): envelope is TerminalEnvelope {
  return envelope.kind === 'OUTPUT' || envelope.kind === 'ERROR';
}
