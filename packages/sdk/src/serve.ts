import {
  type AgentIdentity,
  type Address,
  CLOSE_CODES,
  type Envelope,
  type ErrorEnvelope,
  type InputEnvelope,
  type Logger,
  type OutputEnvelope,
  RelayError,
  createLogger,
  decode,
  encode,
  endpointUrl,
  loadClientConfig,
  shortAddress,
  signAnnounce,
} from 'agentlink-protocol';
import type WebSocket from 'ws';
import { type BackoffOptions, DEFAULT_BACKOFF, backoffDelay } from './backoff.js';
import { describeError, openSocket, sendIfOpen } from './socket.js';

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 60_000;

export interface RequestContext {
  requestId: string;
  from?: Address;
}

/** Answers one INPUT payload. May be async; a throw becomes a HandlerFailure error. */
export type AgentHandler = (payload: string, context: RequestContext) => string | Promise<string>;

/** Decides whether a request reaches the handler at all. */
export type TrustGate = (request: RequestContext & { payload: string }) => boolean | Promise<boolean>;

export type HostStatus =
  | 'connecting'
  | 'online'
  | 'disconnected'
  | 'superseded'
  | 'rejected'
  | 'failed'
  | 'closed';

export type HostStatusHandler = (status: HostStatus, detail?: string) => void;

export interface ServeOptions {
  relayUrl?: string;
  summary?: string;
  heartbeatIntervalMs?: number;
  /** Timeout for opening the announce socket. */
  connectTimeoutMs?: number;
  reconnect?: Partial<BackoffOptions>;
  trust?: TrustGate;
  logger?: Logger;
}

/**
 * A served agent: one announce socket to the relay, kept alive across
 * transport loss until `close()` or until the relay refuses it.
 */
export class AgentHost {
  readonly address: Address;
  /** Resolves at the first acknowledged announce. */
  readonly ready: Promise<void>;

  private identity: AgentIdentity;
  private handler: AgentHandler;
  private trust: TrustGate | undefined;
  private url: string;
  private summary: string;
  private heartbeatIntervalMs: number;
  private connectTimeoutMs: number;
  private backoff: BackoffOptions;
  private logger: Logger;

  private socket: WebSocket | null = null;
  private attempt = 0;
  private stopped = false;
  private acknowledged = false;
  private heartbeatId: ReturnType<typeof setInterval> | null = null;
  private reconnectId: ReturnType<typeof setTimeout> | null = null;
  private queue: Promise<void> = Promise.resolve();
  private statusHandlers: HostStatusHandler[] = [];
  private settleReady: { resolve: () => void; reject: (err: Error) => void } | null = null;

  constructor(identity: AgentIdentity, handler: AgentHandler, options: ServeOptions = {}) {
    const config = loadClientConfig(process.env, {
      relayUrl: options.relayUrl,
      timeoutMs: options.connectTimeoutMs,
    });
    this.identity = identity;
    this.address = identity.address;
    this.handler = handler;
    this.trust = options.trust;
    this.url = endpointUrl(config.relayUrl, 'announce');
    this.summary = options.summary ?? '';
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.connectTimeoutMs = config.timeoutMs;
    this.backoff = { ...DEFAULT_BACKOFF, ...options.reconnect };
    this.logger = options.logger ?? createLogger('agent-host');

    this.ready = new Promise<void>((resolve, reject) => {
      this.settleReady = { resolve, reject };
    });
    // Callers that never await `ready` still learn about failures through onStatus.
    void this.ready.catch(() => undefined);
  }

  /** Open the announce socket. Called once by `serve()`. */
  start(): void {
    if (this.socket || this.stopped) return;
    this.connect();
  }

  onStatus(handler: HostStatusHandler): void {
    this.statusHandlers.push(handler);
  }

  get online(): boolean {
    return this.socket !== null && this.acknowledged;
  }

  /** Stop heartbeats and reconnects, then close the announce socket. */
  async close(): Promise<void> {
    if (this.stopped) return;
    this.halt('closed', new RelayError('TRANSPORT_FAILED', 'Agent host closed before it was announced'));

    const ws = this.socket;
    this.socket = null;
    if (!ws || ws.readyState === ws.CLOSED) return;
    await new Promise<void>((resolve) => {
      ws.once('close', () => resolve());
      ws.close(CLOSE_CODES.NORMAL, 'agent closed');
    });
  }

  private connect(): void {
    this.emitStatus('connecting', this.url);
    void openSocket(this.url, this.connectTimeoutMs).then(
      (ws) => this.attach(ws),
      (err: unknown) => {
        this.logger.warn({ url: this.url, err: describeError(err) }, 'announce socket failed to open');
        this.scheduleReconnect();
      },
    );
  }

  private attach(ws: WebSocket): void {
    if (this.stopped) {
      ws.close(CLOSE_CODES.NORMAL, 'agent closed');
      return;
    }
    this.socket = ws;
    this.acknowledged = false;

    ws.on('message', (data) => this.onFrame(data));
    ws.on('error', (err) => {
      this.logger.warn({ err: err.message }, 'announce socket error');
    });
    ws.on('close', (code, reason) => this.onClose(ws, code, reason.toString()));

    this.announce();
  }

  private announce(): void {
    sendIfOpen(this.socket, encode(signAnnounce(this.identity, this.summary)));
  }

  private onFrame(data: WebSocket.RawData): void {
    let envelope: Envelope;
    try {
      envelope = decode(data);
    } catch (err) {
      this.logger.warn({ err: describeError(err) }, 'ignoring malformed frame from relay');
      return;
    }

    switch (envelope.kind) {
      case 'LOOKUP_RESULT':
        if (envelope.to === this.address && envelope.online) this.onAcknowledged();
        return;
      case 'INPUT':
        this.enqueue(envelope);
        return;
      case 'ERROR':
        this.logger.warn({ reason: envelope.reason, message: envelope.message }, 'relay reported an error');
        return;
      default:
        this.logger.debug({ kind: envelope.kind }, 'ignoring unexpected envelope');
    }
  }

  private onAcknowledged(): void {
    // Heartbeat acks on an already acknowledged socket change nothing.
    if (this.acknowledged) return;
    this.acknowledged = true;
    this.attempt = 0;

    this.logger.info({ address: shortAddress(this.address) }, 'agent online');
    this.settleReady?.resolve();
    this.settleReady = null;
    this.startHeartbeat();
    this.emitStatus('online', this.address);
  }

  /** Handlers run one at a time, in arrival order. */
  private enqueue(input: InputEnvelope): void {
    this.queue = this.queue.then(() => this.handle(input));
  }

  private async handle(input: InputEnvelope): Promise<void> {
    const context: RequestContext = { requestId: input.requestId, from: input.from };

    let reply: OutputEnvelope | ErrorEnvelope;
    try {
      if (this.trust && !(await this.trust({ ...context, payload: input.payload }))) {
        reply = { kind: 'ERROR', requestId: input.requestId, reason: 'Rejected', message: 'Request rejected by agent' };
      } else {
        const payload = await this.handler(input.payload, context);
        reply = { kind: 'OUTPUT', requestId: input.requestId, payload, from: this.address, to: input.from };
      }
    } catch (err) {
      this.logger.error({ requestId: input.requestId, err: describeError(err) }, 'handler failed');
      reply = { kind: 'ERROR', requestId: input.requestId, reason: 'HandlerFailure', message: describeError(err) };
    }

    if (!sendIfOpen(this.socket, encode(reply))) {
      this.logger.warn({ requestId: input.requestId }, 'reply dropped, announce socket is not open');
    }
  }

  private onClose(ws: WebSocket, code: number, reason: string): void {
    if (ws !== this.socket) return;
    this.socket = null;
    this.acknowledged = false;
    this.stopHeartbeat();
    if (this.stopped) return;

    if (code === CLOSE_CODES.SUPERSEDED) {
      this.logger.warn({ address: shortAddress(this.address) }, 'superseded by another connection');
      this.halt('superseded', new RelayError('TRANSPORT_FAILED', 'Superseded by a newer announce'), reason);
      return;
    }
    if (code === CLOSE_CODES.PROTOCOL_VIOLATION) {
      this.logger.error({ reason }, 'relay rejected the announce socket');
      this.halt('rejected', new RelayError('PROTOCOL_VIOLATION', reason || 'Rejected by relay'), reason);
      return;
    }

    this.logger.warn({ code, reason }, 'announce socket closed');
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.stopped) return;
    if (this.attempt >= this.backoff.maxAttempts) {
      this.halt('failed', new RelayError('TRANSPORT_FAILED', `Gave up after ${this.attempt} reconnect attempts`));
      return;
    }

    const delay = backoffDelay(this.attempt, this.backoff);
    this.attempt++;
    this.emitStatus('disconnected', `reconnecting in ${delay}ms`);
    this.reconnectId = setTimeout(() => {
      this.reconnectId = null;
      this.connect();
    }, delay);
  }

  private halt(status: HostStatus, readyError: Error, detail?: string): void {
    this.stopped = true;
    this.stopHeartbeat();
    if (this.reconnectId) {
      clearTimeout(this.reconnectId);
      this.reconnectId = null;
    }
    this.settleReady?.reject(readyError);
    this.settleReady = null;
    this.emitStatus(status, detail);
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatId = setInterval(() => this.announce(), this.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatId) {
      clearInterval(this.heartbeatId);
      this.heartbeatId = null;
    }
  }

  private emitStatus(status: HostStatus, detail?: string): void {
    for (const handler of this.statusHandlers) handler(status, detail);
  }
}

/** Announce `identity` on the relay and answer INPUTs with `handler`. */
export function serve(identity: AgentIdentity, handler: AgentHandler, options: ServeOptions = {}): AgentHost {
  const host = new AgentHost(identity, handler, options);
  host.start();
  return host;
}
