export {
  loadClientConfig,
  loadRelayConfig,
  defaultKeyPath,
  DEFAULT_RELAY_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_TIMEOUT_MS,
} from './config.js';
export type { ClientConfig, RelayConfig } from './config.js';
