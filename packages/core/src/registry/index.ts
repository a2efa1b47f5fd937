export { ConnectionRegistry } from './connection-registry.js';
export type {
  RelayChannel,
  RegistryEntry,
  RegisterOutcome,
  ConnectionRegistryEvents,
} from './connection-registry.js';
