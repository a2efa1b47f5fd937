import { randomUUID } from 'node:crypto';
import { createServer } from 'node:http';
import {
  CLOSE_CODES,
  type ConnectionRegistry,
  type Logger,
  type PendingRequestTable,
  type RelayChannel,
  type RelayConfig,
  type SocketRole,
  createLogger,
  encode,
  loadRelayConfig,
  roleFromPath,
} from 'agentlink-protocol';
import WebSocket, { WebSocketServer } from 'ws';
import { createApp } from './routes.js';
import { RelayRouter } from './router.js';

/** How long a closing socket gets to finish the close handshake on shutdown. */
const CLOSE_GRACE_MS = 1000;

export interface RelayServerOptions {
  /** Overrides `config.port`; 0 binds an ephemeral port. */
  port?: number;
  host?: string;
  /** Merged over the environment configuration. */
  config?: Partial<RelayConfig>;
  logger?: Logger;
}

export interface RelayServer {
  /** Resolves with the bound port. */
  listening: Promise<number>;
  router: RelayRouter;
  registry: ConnectionRegistry;
  pending: PendingRequestTable;
  close: () => Promise<void>;
}

export function createRelayServer(options: RelayServerOptions = {}): RelayServer {
  const config: RelayConfig = { ...loadRelayConfig(), ...options.config };
  const port = options.port ?? config.port;
  const host = options.host ?? config.host;
  const logger = options.logger ?? createLogger('agentlink-relay', config.logLevel);
  const router = new RelayRouter({ timeoutMs: config.timeoutMs, maxTimeoutMs: config.maxTimeoutMs, logger });

  const server = createServer(createApp(router));
  const wss = new WebSocketServer({ noServer: true });
  const sockets = new Map<WebSocket, RelayChannel>();
  const alive = new Map<WebSocket, boolean>();

  server.on('upgrade', (request, socket, head) => {
    const path = upgradePath(request.url);
    const role = path === null ? null : roleFromPath(path);
    if (!role) {
      socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => accept(ws, role));
  });

  function accept(ws: WebSocket, role: SocketRole): void {
    const channel: RelayChannel = {
      id: randomUUID(),
      send: (envelope) => {
        if (ws.readyState === WebSocket.OPEN) ws.send(encode(envelope));
      },
      close: (code, reason) => ws.close(code, reason),
    };
    sockets.set(ws, channel);
    alive.set(ws, true);

    ws.on('pong', () => alive.set(ws, true));
    ws.on('message', (data) => router.receive(channel, data));
    ws.on('error', (err) => {
      logger.warn({ channel: channel.id, err: err.message }, 'socket error');
    });
    ws.on('close', () => {
      sockets.delete(ws);
      alive.delete(ws);
      router.closed(channel);
    });

    router.open(channel, role);
  }

  // A socket that has not answered the previous ping is gone.
  const pingId = setInterval(() => {
    for (const [ws, channel] of sockets) {
      if (alive.get(ws) === false) {
        logger.info({ channel: channel.id }, 'terminating unresponsive socket');
        ws.terminate();
        continue;
      }
      alive.set(ws, false);
      ws.ping();
    }
  }, config.heartbeatIntervalMs);
  router.pending.start(config.sweepIntervalMs);

  const listening = new Promise<number>((resolve, reject) => {
    const failed = (err: Error): void => {
      clearInterval(pingId);
      router.pending.stop();
      logger.error({ host, port, err: err.message }, 'relay failed to listen');
      reject(err);
    };
    server.once('error', failed);
    server.listen(port, host, () => {
      server.off('error', failed);
      const address = server.address();
      const bound = address !== null && typeof address === 'object' ? address.port : port;
      logger.info({ host, port: bound }, 'relay listening');
      resolve(bound);
    });
  });
  // Embedders that never await `listening` still see the failure in the log.
  void listening.catch(() => undefined);

  let closing: Promise<void> | null = null;

  async function shutdown(): Promise<void> {
    clearInterval(pingId);
    // Nothing may route to a socket once it starts closing.
    router.shutdown();

    await Promise.all(Array.from(sockets.keys(), (ws) => closeSocket(ws)));
    await new Promise<void>((resolve) => wss.close(() => resolve()));

    if (server.listening) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
    }
    logger.info('relay stopped');
  }

  return {
    listening,
    router,
    registry: router.registry,
    pending: router.pending,
    close: () => {
      if (!closing) closing = shutdown();
      return closing;
    },
  };
}

/** Path of an upgrade request target, or null when it is not a valid URL. */
function upgradePath(target: string | undefined): string | null {
  const url = `http://relay.invalid${target ?? '/'}`;
  return URL.canParse(url) ? new URL(url).pathname : null;
}

function closeSocket(ws: WebSocket): Promise<void> {
  if (ws.readyState === WebSocket.CLOSED) return Promise.resolve();
  return new Promise((resolve) => {
    const timer = setTimeout(() => ws.terminate(), CLOSE_GRACE_MS);
    ws.once('close', () => {
      clearTimeout(timer);
      resolve();
    });
    ws.close(CLOSE_CODES.SHUTDOWN, 'relay shutting down');
  });
}
