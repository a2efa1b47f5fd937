export { PROTOCOL_VERSION } from 'agentlink-protocol';
export { serve, AgentHost, DEFAULT_HEARTBEAT_INTERVAL_MS } from './serve.js';
export type {
  AgentHandler,
  TrustGate,
  RequestContext,
  HostStatus,
  HostStatusHandler,
  ServeOptions,
} from './serve.js';
export { connect, RemoteAgent } from './connect.js';
export type { ConnectOptions, SendOptions, SendCallback } from './connect.js';
export { backoffDelay, DEFAULT_BACKOFF } from './backoff.js';
export type { BackoffOptions } from './backoff.js';
