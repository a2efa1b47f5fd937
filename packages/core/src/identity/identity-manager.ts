import { type Address, type AgentIdentity, generateIdentity, signData, verifySignature } from './keypair.js';
import { FileStorageAdapter, type IdentityStorage } from './storage.js';

export class IdentityManager {
  private storage: IdentityStorage;
  private identity: AgentIdentity | null = null;

  constructor(storage: IdentityStorage) {
    this.storage = storage;
  }

  /**
   * Load the stored identity, or create and store a new one when there is
   * none. A stored identity is returned as-is, never regenerated.
   */
  async init(): Promise<AgentIdentity> {
    const existing = await this.storage.load();
    if (existing) {
      this.identity = existing;
      return existing;
    }

    const created = generateIdentity();
    await this.storage.save(created);
    this.identity = created;
    return created;
  }

  getAddress(): Address {
    return this.requireIdentity().address;
  }

  sign(data: Uint8Array): Uint8Array {
    return signData(this.requireIdentity(), data);
  }

  verify(address: Address, data: Uint8Array, signature: Uint8Array): boolean {
    return verifySignature(address, data, signature);
  }

  private requireIdentity(): AgentIdentity {
    if (!this.identity) {
      throw new Error('IdentityManager not initialized. Call init() first.');
    }
    return this.identity;
  }
}

export function loadOrCreate(keyPath: string): Promise<AgentIdentity> {
  return new IdentityManager(new FileStorageAdapter(keyPath)).init();
}
