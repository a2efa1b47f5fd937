import { type AgentIdentity, fromHex, signData, toHex, verifySignature } from '../identity/index.js';
import type { AnnounceEnvelope } from './envelope.js';

const encoder = new TextEncoder();

/** JSON with object keys sorted, so signer and verifier hash identical bytes. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

function signedBytes(envelope: Omit<AnnounceEnvelope, 'signature'>): Uint8Array {
  const { kind, from, timestamp, summary } = envelope;
  return encoder.encode(canonicalJson({ kind, from, timestamp, summary }));
}

export function signAnnounce(identity: AgentIdentity, summary = '', timestamp = Date.now()): AnnounceEnvelope {
  const unsigned = { kind: 'ANNOUNCE' as const, from: identity.address, timestamp, summary };
  return { ...unsigned, signature: toHex(signData(identity, signedBytes(unsigned))) };
}

/**
 * True when `signature` was made by the key behind `from`. Holding the
 * keypair is the only proof of identity the relay asks for.
 */
export function verifyAnnounce(envelope: AnnounceEnvelope): boolean {
  const signature = fromHex(envelope.signature);
  if (!signature) return false;
  return verifySignature(envelope.from, signedBytes(envelope), signature);
}
