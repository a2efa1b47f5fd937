export const RELAY_SERVER_VERSION = '0.1.0';

export { createRelayServer } from './server.js';
export type { RelayServer, RelayServerOptions } from './server.js';
export { RelayRouter } from './router.js';
export type { RelayRouterOptions } from './router.js';
export { createApp } from './routes.js';
export type { StatusResponse, AgentSummary } from './routes.js';
