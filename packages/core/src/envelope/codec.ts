import { RelayError } from '../errors/index.js';
import { type Envelope, envelopeSchema } from './envelope.js';

/** What a WebSocket hands us for one frame. */
export type RawFrame = string | ArrayBuffer | Uint8Array | readonly Uint8Array[];

const decoder = new TextDecoder();

export function frameToText(data: RawFrame): string {
  if (typeof data === 'string') return data;
  if (data instanceof Uint8Array) return decoder.decode(data);
  if (data instanceof ArrayBuffer) return decoder.decode(new Uint8Array(data));

  const total = data.reduce((sum, chunk) => sum + chunk.length, 0);
  const joined = new Uint8Array(total);
  let offset = 0;
  for (const chunk of data) {
    joined.set(chunk, offset);
    offset += chunk.length;
  }
  return decoder.decode(joined);
}

export function encode(envelope: Envelope): string {
  return JSON.stringify(envelope);
}

/**
 * Parse one frame into an envelope.
 *
 * Checks structure only: the kind must be known and the fields that kind
 * requires must be present with the right types. Address shape, signatures
 * and recipients are left to the caller.
 */
export function decode(data: RawFrame): Envelope {
  let raw: unknown;
  try {
    raw = JSON.parse(frameToText(data));
  } catch {
    throw new RelayError('MALFORMED_ENVELOPE', 'invalid JSON');
  }

  const result = envelopeSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'kind';
    throw new RelayError('MALFORMED_ENVELOPE', `invalid envelope: ${field}: ${issue?.message ?? 'unknown error'}`, {
      field,
    });
  }
  return result.data;
}
