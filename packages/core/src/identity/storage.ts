import { chmod, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import nacl from 'tweetnacl';
import { z } from 'zod';
import { RelayError } from '../errors/index.js';
import { type AgentIdentity, fromHex, identityFromPrivateKey, toHex } from './keypair.js';

export interface IdentityStorage {
  save(identity: AgentIdentity): Promise<void>;
  /** Null when nothing is stored; throws IDENTITY_CORRUPT when what is stored is unusable. */
  load(): Promise<AgentIdentity | null>;
}

const storedIdentitySchema = z.object({
  address: z.string(),
  publicKey: z.string(),
  privateKey: z.string(),
});

type StoredIdentity = z.infer<typeof storedIdentitySchema>;

function toStored(identity: AgentIdentity): StoredIdentity {
  return {
    address: identity.address,
    publicKey: toHex(identity.publicKey),
    privateKey: toHex(identity.privateKey),
  };
}

function corrupt(source: string, detail: string): RelayError {
  return new RelayError('IDENTITY_CORRUPT', `Identity at ${source} is corrupt: ${detail}`, { source });
}

function fromStored(data: unknown, recoveryPhrase: string | null, source: string): AgentIdentity {
  const parsed = storedIdentitySchema.safeParse(data);
  if (!parsed.success) {
    throw corrupt(source, 'missing address, publicKey or privateKey');
  }
  const { address, publicKey, privateKey } = parsed.data;

  const seed = fromHex(privateKey);
  if (!seed || seed.length !== nacl.sign.seedLength) {
    throw corrupt(source, 'privateKey must be 32 bytes of hex');
  }

  // The stored public half must agree with what the private key derives.
  const identity = identityFromPrivateKey(seed, recoveryPhrase);
  if (toHex(identity.publicKey) !== publicKey.toLowerCase() || identity.address !== address.toLowerCase()) {
    throw corrupt(source, 'publicKey does not match privateKey');
  }
  return identity;
}

export class MemoryStorage implements IdentityStorage {
  private stored: StoredIdentity | null = null;
  private recoveryPhrase: string | null = null;

  async save(identity: AgentIdentity): Promise<void> {
    this.stored = toStored(identity);
    this.recoveryPhrase = identity.recoveryPhrase;
  }

  async load(): Promise<AgentIdentity | null> {
    if (!this.stored) return null;
    return fromStored(this.stored, this.recoveryPhrase, 'memory');
  }
}

export const RECOVERY_FILE = 'recovery.txt';
export const WARNING_FILE = 'DO_NOT_SHARE';

const WARNING_TEXT = `WARNING: PRIVATE KEYS - DO NOT SHARE

This directory contains your agent's private key and recovery phrase.
Anyone holding them can announce as your agent.
Never commit these files to version control.

Losing both files means losing the agent's address for good.
`;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores the key file at `keyPath` with `recovery.txt` and a warning file
 * beside it. Everything is readable by the owner only.
 */
export class FileStorageAdapter implements IdentityStorage {
  readonly keyPath: string;

  constructor(keyPath: string) {
    this.keyPath = keyPath;
  }

  private get recoveryPath(): string {
    return join(dirname(this.keyPath), RECOVERY_FILE);
  }

  async save(identity: AgentIdentity): Promise<void> {
    const dir = dirname(this.keyPath);
    await mkdir(dir, { recursive: true, mode: 0o700 });

    await writeFile(this.keyPath, `${JSON.stringify(toStored(identity), null, 2)}\n`, { encoding: 'utf-8', mode: 0o600 });
    await chmod(this.keyPath, 0o600);

    if (identity.recoveryPhrase) {
      await writeFile(this.recoveryPath, `${identity.recoveryPhrase}\n`, { encoding: 'utf-8', mode: 0o600 });
      await chmod(this.recoveryPath, 0o600);
    }

    await writeFile(join(dir, WARNING_FILE), WARNING_TEXT, { encoding: 'utf-8', flag: 'wx' }).catch((error: unknown) => {
      if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) throw error;
    });
  }

  async load(): Promise<AgentIdentity | null> {
    let raw: string;
    try {
      raw = await readFile(this.keyPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw corrupt(this.keyPath, error instanceof Error ? error.message : String(error));
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      throw corrupt(this.keyPath, 'not valid JSON');
    }

    return fromStored(data, await this.loadRecoveryPhrase(), this.keyPath);
  }

  private async loadRecoveryPhrase(): Promise<string | null> {
    try {
      const phrase = (await readFile(this.recoveryPath, 'utf-8')).trim();
      return phrase.length > 0 ? phrase : null;
    } catch (error) {
      if (isNotFound(error)) return null;
      throw corrupt(this.recoveryPath, error instanceof Error ? error.message : String(error));
    }
  }
}
