import {
  type Address,
  CLOSE_CODES,
  ConnectionRegistry,
  DEFAULT_MAX_TIMEOUT_MS,
  DEFAULT_TIMEOUT_MS,
  type Envelope,
  type ErrorReason,
  type InputEnvelope,
  type Logger,
  PendingRequestTable,
  type RawFrame,
  type RelayChannel,
  type SocketRole,
  type TerminalEnvelope,
  createLogger,
  decode,
  isValidAddress,
  shortAddress,
  verifyAnnounce,
} from 'agentlink-protocol';

export interface RelayRouterOptions {
  registry?: ConnectionRegistry;
  pending?: PendingRequestTable;
  /** Pending deadline for an INPUT that names none. */
  timeoutMs?: number;
  /** Ceiling on a caller-supplied `timeoutMs`. */
  maxTimeoutMs?: number;
  logger?: Logger;
}

interface ConnectionState {
  role: SocketRole;
  /** Set once an announce socket is authenticated. */
  address: Address | null;
  /** Set after a violation; later frames are ignored. */
  failed: boolean;
}

/**
 * Per-socket state machine of the relay. The transport hands it opened
 * channels, raw frames and closes; everything else happens here.
 */
export class RelayRouter {
  readonly registry: ConnectionRegistry;
  readonly pending: PendingRequestTable;

  private connections = new Map<RelayChannel, ConnectionState>();
  private timeoutMs: number;
  private maxTimeoutMs: number;
  private logger: Logger;

  constructor(options: RelayRouterOptions = {}) {
    this.logger = options.logger ?? createLogger('relay-router');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxTimeoutMs = options.maxTimeoutMs ?? DEFAULT_MAX_TIMEOUT_MS;
    this.registry =
      options.registry ??
      new ConnectionRegistry({
        onSuperseded: (address, previous) => {
          this.logger.info({ address: shortAddress(address), channel: previous.id }, 'announce superseded');
        },
      });
    this.pending =
      options.pending ??
      new PendingRequestTable({
        onTimeout: (requestId) => this.logger.info({ requestId }, 'request timed out'),
      });
  }

  open(channel: RelayChannel, role: SocketRole): void {
    this.connections.set(channel, { role, address: null, failed: false });
    this.logger.debug({ channel: channel.id, role }, 'socket opened');
  }

  receive(channel: RelayChannel, data: RawFrame): void {
    const state = this.connections.get(channel);
    if (!state || state.failed) return;

    let envelope: Envelope;
    try {
      envelope = decode(data);
    } catch (err) {
      this.fail(channel, state, 'MalformedEnvelope', err instanceof Error ? err.message : String(err));
      return;
    }

    switch (state.role) {
      case 'announce':
        this.onAnnounceFrame(channel, state, envelope);
        return;
      case 'input':
        if (envelope.kind !== 'INPUT') {
          this.fail(channel, state, 'ProtocolViolation', `${envelope.kind} is not allowed on an input socket`);
          return;
        }
        this.onInput(channel, envelope);
        return;
      case 'lookup':
        if (envelope.kind !== 'LOOKUP') {
          this.fail(channel, state, 'ProtocolViolation', `${envelope.kind} is not allowed on a lookup socket`);
          return;
        }
        channel.send(this.lookupResult(envelope.to));
        return;
    }
  }

  closed(channel: RelayChannel): void {
    const state = this.connections.get(channel);
    if (!state) return;
    this.connections.delete(channel);

    if (state.address && this.registry.unregister(state.address, channel)) {
      this.logger.info({ address: shortAddress(state.address) }, 'agent offline');
    }
    if (state.role === 'input') {
      const dropped = this.pending.dropChannel(channel);
      if (dropped > 0) this.logger.debug({ channel: channel.id, dropped }, 'dropped requests of closed input socket');
    }
  }

  /**
   * Forget every registration and pending request and ignore further frames,
   * so nothing routes to a socket that is about to close.
   */
  shutdown(): void {
    this.pending.clear();
    this.registry.clear();
    for (const state of this.connections.values()) state.failed = true;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  private onAnnounceFrame(channel: RelayChannel, state: ConnectionState, envelope: Envelope): void {
    if (!state.address) {
      if (envelope.kind !== 'ANNOUNCE') {
        this.fail(channel, state, 'ProtocolViolation', `expected ANNOUNCE, got ${envelope.kind}`);
        return;
      }
      if (!isValidAddress(envelope.from) || !verifyAnnounce(envelope)) {
        this.fail(channel, state, 'ProtocolViolation', 'ANNOUNCE signature does not match its address');
        return;
      }
      state.address = envelope.from;
      const outcome = this.registry.register(envelope.from, channel, envelope.summary);
      this.logger.info({ address: shortAddress(envelope.from), outcome }, 'agent online');
      channel.send(this.lookupResult(envelope.from));
      return;
    }

    switch (envelope.kind) {
      case 'ANNOUNCE':
        if (this.registry.lookup(state.address) !== channel) {
          // Superseded and about to close; a late heartbeat must not take the address back.
          this.logger.debug({ address: shortAddress(state.address), channel: channel.id }, 'ignoring announce from superseded socket');
          return;
        }
        if (envelope.from !== state.address || !verifyAnnounce(envelope)) {
          this.fail(channel, state, 'ProtocolViolation', 'ANNOUNCE does not match the registered address');
          return;
        }
        this.registry.register(state.address, channel, envelope.summary);
        channel.send(this.lookupResult(state.address));
        return;
      case 'OUTPUT':
        this.deliver(envelope.requestId, envelope);
        return;
      case 'ERROR':
        if (!envelope.requestId) {
          this.logger.warn({ address: shortAddress(state.address), reason: envelope.reason }, 'agent reported an error');
          return;
        }
        this.deliver(envelope.requestId, envelope);
        return;
      default:
        this.fail(channel, state, 'ProtocolViolation', `${envelope.kind} is not allowed on an announce socket`);
    }
  }

  private onInput(channel: RelayChannel, input: InputEnvelope): void {
    const target = isValidAddress(input.to) ? this.registry.lookup(input.to) : undefined;
    if (!target) {
      channel.send({
        kind: 'ERROR',
        requestId: input.requestId,
        reason: 'AddressOffline',
        message: `${shortAddress(input.to)} is not connected`,
      });
      return;
    }

    const timeoutMs = Math.min(input.timeoutMs ?? this.timeoutMs, this.maxTimeoutMs);
    if (this.pending.add(input.requestId, channel, timeoutMs) === null) {
      channel.send({
        kind: 'ERROR',
        requestId: input.requestId,
        reason: 'ProtocolViolation',
        message: 'requestId is already pending',
      });
      return;
    }

    this.logger.debug({ requestId: input.requestId, to: shortAddress(input.to), timeoutMs }, 'forwarding input');
    target.send(input);
  }

  private deliver(requestId: string, envelope: TerminalEnvelope): void {
    if (!this.pending.resolve(requestId, envelope)) {
      this.logger.debug({ requestId }, 'no pending request, dropping reply');
    }
  }

  private lookupResult(address: Address): Envelope {
    const entry = isValidAddress(address) ? this.registry.get(address) : undefined;
    return entry
      ? { kind: 'LOOKUP_RESULT', to: address, online: true, summary: entry.summary || undefined }
      : { kind: 'LOOKUP_RESULT', to: address, online: false };
  }

  private fail(channel: RelayChannel, state: ConnectionState, reason: ErrorReason, message: string): void {
    state.failed = true;
    this.logger.warn({ channel: channel.id, role: state.role, reason, message }, 'closing socket after violation');
    channel.send({ kind: 'ERROR', reason, message });
    channel.close(CLOSE_CODES.PROTOCOL_VIOLATION, message.slice(0, 120));
  }
}
