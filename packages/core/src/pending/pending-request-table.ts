import type { Envelope, ErrorEnvelope, TerminalEnvelope } from '../envelope/index.js';

/** Where the terminal envelope for a request is delivered. */
export interface ReplyChannel {
  send(envelope: Envelope): void;
}

export interface PendingEntry {
  requestId: string;
  token: string;
  channel: ReplyChannel;
  createdAt: number;
  deadline: number;
}

export interface PendingRequestEvents {
  onTimeout?: (requestId: string) => void;
}

/**
 * requestId → waiting reply channel, each entry removed exactly once.
 *
 * Removal only happens in `take()`, and resolve, expire, sweep and
 * dropChannel all go through it, so an entry is delivered or timed out at
 * most once. A second resolve for the same id finds nothing and does nothing.
 */
export class PendingRequestTable {
  private entries = new Map<string, PendingEntry>();
  private events: PendingRequestEvents;
  private sequence = 0;
  private sweepId: ReturnType<typeof setInterval> | null = null;

  constructor(events: PendingRequestEvents = {}) {
    this.events = events;
  }

  /**
   * Start waiting for `requestId`. Returns a token naming this entry, or null
   * when the id is already pending.
   */
  add(requestId: string, channel: ReplyChannel, timeoutMs: number): string | null {
    if (this.entries.has(requestId)) return null;

    const now = Date.now();
    const token = `${requestId}#${++this.sequence}`;
    this.entries.set(requestId, { requestId, token, channel, createdAt: now, deadline: now + timeoutMs });
    return token;
  }

  /** Deliver the terminal envelope. False when the id is unknown, already resolved or expired. */
  resolve(requestId: string, envelope: TerminalEnvelope): boolean {
    const entry = this.take(requestId);
    if (!entry) return false;
    entry.channel.send(envelope);
    return true;
  }

  /**
   * Evict one entry and tell its channel it timed out. With `token`, only the
   * entry that `add` returned that token for is evicted.
   */
  expire(requestId: string, token?: string): boolean {
    const entry = this.take(requestId, token);
    if (!entry) return false;

    const timeout: ErrorEnvelope = {
      kind: 'ERROR',
      requestId,
      reason: 'Timeout',
      message: `No response within ${entry.deadline - entry.createdAt}ms`,
    };
    entry.channel.send(timeout);
    this.events.onTimeout?.(requestId);
    return true;
  }

  /** Expire every entry whose deadline has passed. */
  sweep(now = Date.now()): number {
    let expired = 0;
    for (const entry of Array.from(this.entries.values())) {
      if (entry.deadline <= now && this.expire(entry.requestId, entry.token)) {
        expired++;
      }
    }
    return expired;
  }

  /** Forget every entry waiting on `channel`, e.g. after its socket closed. */
  dropChannel(channel: ReplyChannel): number {
    let dropped = 0;
    for (const entry of Array.from(this.entries.values())) {
      if (entry.channel === channel && this.take(entry.requestId, entry.token)) {
        dropped++;
      }
    }
    return dropped;
  }

  has(requestId: string): boolean {
    return this.entries.has(requestId);
  }

  get size(): number {
    return this.entries.size;
  }

  start(intervalMs: number): void {
    this.stop();
    this.sweepId = setInterval(() => {
      this.sweep();
    }, intervalMs);
  }

  stop(): void {
    if (this.sweepId) {
      clearInterval(this.sweepId);
      this.sweepId = null;
    }
  }

  /** Stop sweeping and forget everything, without notifying anyone. */
  clear(): number {
    this.stop();
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  private take(requestId: string, token?: string): PendingEntry | undefined {
    const entry = this.entries.get(requestId);
    if (!entry || (token !== undefined && entry.token !== token)) return undefined;
    this.entries.delete(requestId);
    return entry;
  }
}
