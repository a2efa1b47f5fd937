import { randomUUID } from 'node:crypto';
import {
  type Address,
  CLOSE_CODES,
  type Envelope,
  type Logger,
  type OutputEnvelope,
  PendingRequestTable,
  RelayError,
  createLogger,
  decode,
  encode,
  endpointUrl,
  errorFromEnvelope,
  loadClientConfig,
  shortAddress,
} from 'agentlink-protocol';
import type WebSocket from 'ws';
import { describeError, openSocket } from './socket.js';

export interface ConnectOptions {
  relayUrl?: string;
  /** Default per-request timeout. */
  timeoutMs?: number;
  /** The caller's own address, passed along as `from`. */
  from?: Address;
  logger?: Logger;
}

export interface SendOptions {
  timeoutMs?: number;
}

export type SendCallback = (error: RelayError | null, reply?: string) => void;

/**
 * Handle on a remote agent. Requests share one lazily opened input socket and
 * are told apart by requestId, so any number can be in flight at once.
 */
export class RemoteAgent {
  readonly address: Address;

  private relayUrl: string;
  private timeoutMs: number;
  private from: Address | undefined;
  private logger: Logger;
  private pending = new PendingRequestTable();
  private socket: WebSocket | null = null;
  private opening: Promise<WebSocket> | null = null;
  private closed = false;

  constructor(address: Address, options: ConnectOptions = {}) {
    const config = loadClientConfig(process.env, { relayUrl: options.relayUrl, timeoutMs: options.timeoutMs });
    this.address = address;
    this.relayUrl = config.relayUrl;
    this.timeoutMs = config.timeoutMs;
    this.from = options.from;
    this.logger = options.logger ?? createLogger('remote-agent');
  }

  /** Send `payload` and resolve with the agent's reply. */
  async send(payload: string, options: SendOptions = {}): Promise<string> {
    const output = await this.request(payload, options);
    return output.payload;
  }

  /** Callback form of `send` for callers that do not await. */
  sendWithCallback(payload: string, callback: SendCallback, options: SendOptions = {}): void {
    void this.send(payload, options).then(
      (reply) => callback(null, reply),
      (err: unknown) => callback(toRelayError(err)),
    );
  }

  /**
   * Send one INPUT and wait for its terminal envelope. Rejects with the error
   * the relay or agent reported, or with TIMEOUT once `timeoutMs` passes.
   */
  async request(payload: string, options: SendOptions = {}): Promise<OutputEnvelope> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const deadline = Date.now() + timeoutMs;
    const socket = await this.inputSocketWithin(timeoutMs);
    const requestId = randomUUID();

    return new Promise<OutputEnvelope>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const token = this.pending.add(
        requestId,
        {
          send: (envelope: Envelope) => {
            clearTimeout(timer);
            if (envelope.kind === 'OUTPUT') resolve(envelope);
            else if (envelope.kind === 'ERROR') reject(errorFromEnvelope(envelope));
            else reject(new RelayError('PROTOCOL_VIOLATION', `Unexpected ${envelope.kind} reply`, { requestId }));
          },
        },
        timeoutMs,
      );
      if (token === null) {
        reject(new RelayError('PROTOCOL_VIOLATION', 'Duplicate requestId', { requestId }));
        return;
      }

      timer = setTimeout(() => this.pending.expire(requestId, token), Math.max(0, deadline - Date.now()));
      socket.send(
        encode({ kind: 'INPUT', to: this.address, requestId, payload, from: this.from, timeoutMs }),
      );
    });
  }

  /** One LOOKUP round trip on a short-lived lookup socket. */
  async isOnline(options: SendOptions = {}): Promise<boolean> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const ws = await openSocket(endpointUrl(this.relayUrl, 'lookup'), timeoutMs);

    try {
      return await new Promise<boolean>((resolve, reject) => {
        const timer = setTimeout(() => {
          reject(new RelayError('TIMEOUT', `No lookup result within ${timeoutMs}ms`, { address: this.address }));
        }, timeoutMs);

        ws.on('message', (data) => {
          let envelope: Envelope;
          try {
            envelope = decode(data);
          } catch (err) {
            this.logger.warn({ err: describeError(err) }, 'ignoring malformed lookup frame');
            return;
          }
          if (envelope.kind === 'LOOKUP_RESULT' && envelope.to === this.address) {
            clearTimeout(timer);
            resolve(envelope.online);
          } else if (envelope.kind === 'ERROR') {
            clearTimeout(timer);
            reject(errorFromEnvelope(envelope));
          }
        });
        ws.on('close', () => {
          clearTimeout(timer);
          reject(new RelayError('TRANSPORT_FAILED', 'Lookup socket closed before a result arrived'));
        });
        ws.on('error', (err) => {
          this.logger.warn({ err: err.message }, 'lookup socket error');
        });

        ws.send(encode({ kind: 'LOOKUP', to: this.address, from: this.from }));
      });
    } finally {
      ws.close(CLOSE_CODES.NORMAL);
    }
  }

  /** Close the input socket. Calls still in flight end by timeout. */
  close(): void {
    this.closed = true;
    this.socket?.close(CLOSE_CODES.NORMAL, 'caller closed');
    this.socket = null;
  }

  /** The input socket, or TIMEOUT when it is not open within `timeoutMs`. */
  private async inputSocketWithin(timeoutMs: number): Promise<WebSocket> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new RelayError('TIMEOUT', `No response within ${timeoutMs}ms`, { address: this.address }));
      }, timeoutMs);
    });
    try {
      return await Promise.race([this.inputSocket(), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async inputSocket(): Promise<WebSocket> {
    if (this.closed) throw new RelayError('TRANSPORT_FAILED', 'Connection is closed');
    if (this.socket && this.socket.readyState === this.socket.OPEN) return this.socket;

    if (!this.opening) {
      this.opening = openSocket(endpointUrl(this.relayUrl, 'input'), this.timeoutMs)
        .then((ws) => this.attach(ws))
        .finally(() => {
          this.opening = null;
        });
    }
    return this.opening;
  }

  private attach(ws: WebSocket): WebSocket {
    if (this.closed) {
      ws.close(CLOSE_CODES.NORMAL, 'caller closed');
      throw new RelayError('TRANSPORT_FAILED', 'Connection is closed');
    }
    this.socket = ws;

    ws.on('message', (data) => {
      let envelope: Envelope;
      try {
        envelope = decode(data);
      } catch (err) {
        this.logger.warn({ err: describeError(err) }, 'ignoring malformed frame from relay');
        return;
      }
      if ((envelope.kind === 'OUTPUT' || envelope.kind === 'ERROR') && envelope.requestId) {
        if (!this.pending.resolve(envelope.requestId, envelope)) {
          this.logger.debug({ requestId: envelope.requestId }, 'dropping reply for a settled request');
        }
        return;
      }
      if (envelope.kind === 'ERROR') {
        this.logger.warn({ reason: envelope.reason, message: envelope.message }, 'relay reported an error');
      }
    });
    ws.on('error', (err) => {
      this.logger.warn({ err: err.message }, 'input socket error');
    });
    ws.on('close', (code, reason) => {
      if (this.socket === ws) this.socket = null;
      this.logger.debug({ to: shortAddress(this.address), code, reason: reason.toString() }, 'input socket closed');
    });
    return ws;
  }
}

function toRelayError(err: unknown): RelayError {
  return err instanceof RelayError ? err : new RelayError('TRANSPORT_FAILED', describeError(err));
}

/** Handle on the agent at `address`. No socket is opened until the first request. */
export function connect(address: Address, options: ConnectOptions = {}): RemoteAgent {
  return new RemoteAgent(address, options);
}
