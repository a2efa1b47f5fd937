import { generateMnemonic, mnemonicToSeedSync, validateMnemonic } from 'bip39';
import nacl from 'tweetnacl';
import { RelayError } from '../errors/index.js';

/** `0x` followed by the 64 lowercase hex digits of an Ed25519 public key. */
export type Address = string;

export interface AgentIdentity {
  address: Address;
  publicKey: Uint8Array;
  /** 32-byte Ed25519 seed; never leaves the process. */
  privateKey: Uint8Array;
  /** 12-word phrase the private key was derived from, when it is known. */
  recoveryPhrase: string | null;
}

const ADDRESS_PATTERN = /^0x[0-9a-f]{64}$/;
const HEX_PATTERN = /^(?:[0-9a-f]{2})*$/;

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

export function fromHex(hex: string): Uint8Array | null {
  const normalized = hex.toLowerCase();
  if (!HEX_PATTERN.test(normalized)) return null;
  const bytes = new Uint8Array(normalized.length / 2);
  for (let i = 0; i < normalized.length; i += 2) {
    bytes[i / 2] = Number.parseInt(normalized.substring(i, i + 2), 16);
  }
  return bytes;
}

export function publicKeyToAddress(publicKey: Uint8Array): Address {
  return `0x${toHex(publicKey)}`;
}

export function isValidAddress(value: string): value is Address {
  return ADDRESS_PATTERN.test(value);
}

export function addressToPublicKey(address: string): Uint8Array | null {
  if (!isValidAddress(address)) return null;
  return fromHex(address.slice(2));
}

/** Display form, e.g. `0x3d40...660c`. */
export function shortAddress(address: string): string {
  if (address.length <= 12) return address;
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}

export function identityFromPrivateKey(privateKey: Uint8Array, recoveryPhrase: string | null = null): AgentIdentity {
  const pair = nacl.sign.keyPair.fromSeed(privateKey);
  return {
    address: publicKeyToAddress(pair.publicKey),
    publicKey: pair.publicKey,
    privateKey,
    recoveryPhrase,
  };
}

function normalizePhrase(phrase: string): string {
  return phrase.trim().toLowerCase().split(/\s+/).join(' ');
}

/**
 * Rebuild an identity from its recovery phrase. The private key is the first
 * 32 bytes of the phrase's BIP-39 seed, so the same phrase always yields the
 * same address.
 */
export function recoverIdentity(phrase: string): AgentIdentity {
  const normalized = normalizePhrase(phrase);
  if (!validateMnemonic(normalized)) {
    throw new RelayError('INVALID_RECOVERY_PHRASE', 'Invalid recovery phrase');
  }
  const seed = mnemonicToSeedSync(normalized);
  return identityFromPrivateKey(new Uint8Array(seed.subarray(0, nacl.sign.seedLength)), normalized);
}

export function generateIdentity(): AgentIdentity {
  return recoverIdentity(generateMnemonic(128));
}

export function signData(identity: AgentIdentity, data: Uint8Array): Uint8Array {
  const { secretKey } = nacl.sign.keyPair.fromSeed(identity.privateKey);
  return nacl.sign.detached(data, secretKey);
}

/** The address is the public key, so it is all a verifier needs. */
export function verifySignature(address: string, data: Uint8Array, signature: Uint8Array): boolean {
  const publicKey = addressToPublicKey(address);
  if (!publicKey || signature.length !== nacl.sign.signatureLength) return false;
  return nacl.sign.detached.verify(data, signature, publicKey);
}
