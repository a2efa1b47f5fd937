export {
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
} from './keypair.js';
export type { AgentIdentity, Address } from './keypair.js';
export type { IdentityStorage } from './storage.js';
export { MemoryStorage, FileStorageAdapter, RECOVERY_FILE, WARNING_FILE } from './storage.js';
export { IdentityManager, loadOrCreate } from './identity-manager.js';
