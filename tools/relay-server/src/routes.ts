import express, { type Express } from 'express';
import type { RelayRouter } from './router.js';

export interface StatusResponse {
  agentsOnline: number;
  pendingRequests: number;
}

export interface AgentSummary {
  address: string;
  summary: string;
  connectedAt: number;
  lastSeen: number;
}

/** Read-only HTTP introspection over the router's registry and pending table. */
export function createApp(router: RelayRouter): Express {
  const app = express();
  const startTime = Date.now();

  const status = (): StatusResponse => ({
    agentsOnline: router.registry.size,
    pendingRequests: router.pending.size,
  });

  app.get('/status', (_req, res) => {
    res.json(status());
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', ...status(), uptime: Math.floor((Date.now() - startTime) / 1000) });
  });

  app.get('/agents', (req, res) => {
    const query = typeof req.query.q === 'string' ? req.query.q : '';
    const entries = query ? router.registry.search(query) : router.registry.list();
    const agents: AgentSummary[] = entries.map(({ address, summary, connectedAt, lastSeen }) => ({
      address,
      summary,
      connectedAt,
      lastSeen,
    }));
    res.json({ count: agents.length, agents });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
