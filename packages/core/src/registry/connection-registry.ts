import { CLOSE_CODES } from '../constants.js';
import type { Envelope } from '../envelope/index.js';
import type { Address } from '../identity/index.js';

/** Handle the relay uses to push envelopes down one socket. */
export interface RelayChannel {
  readonly id: string;
  send(envelope: Envelope): void;
  close(code: number, reason: string): void;
}

export interface RegistryEntry {
  address: Address;
  channel: RelayChannel;
  connectedAt: number;
  lastSeen: number;
  summary: string;
}

export type RegisterOutcome = 'registered' | 'refreshed' | 'superseded';

export interface ConnectionRegistryEvents {
  onRegistered?: (address: Address, channel: RelayChannel) => void;
  onSuperseded?: (address: Address, previous: RelayChannel) => void;
  onUnregistered?: (address: Address, channel: RelayChannel) => void;
}

/**
 * Address → live announce channel, at most one per address.
 *
 * Every method is synchronous, so each call finishes before any other socket
 * callback runs and a register/lookup pair can never observe a half-applied
 * update. Callers only ever see snapshots of entries.
 */
export class ConnectionRegistry {
  private entries = new Map<Address, RegistryEntry>();
  private events: ConnectionRegistryEvents;

  constructor(events: ConnectionRegistryEvents = {}) {
    this.events = events;
  }

  /**
   * Bind `address` to `channel`. Re-registering the current channel only
   * refreshes it; a different channel replaces the old one, which is closed.
   */
  register(address: Address, channel: RelayChannel, summary = ''): RegisterOutcome {
    const now = Date.now();
    const current = this.entries.get(address);

    if (current && current.channel === channel) {
      current.lastSeen = now;
      current.summary = summary;
      return 'refreshed';
    }

    this.entries.set(address, { address, channel, connectedAt: now, lastSeen: now, summary });

    if (current) {
      current.channel.close(CLOSE_CODES.SUPERSEDED, 'superseded by a newer announce');
      this.events.onSuperseded?.(address, current.channel);
    }
    this.events.onRegistered?.(address, channel);
    return current ? 'superseded' : 'registered';
  }

  /**
   * Remove `address` only while `channel` is still its registrant, so a late
   * disconnect of a replaced socket cannot evict the newer one.
   */
  unregister(address: Address, channel: RelayChannel): boolean {
    const current = this.entries.get(address);
    if (!current || current.channel !== channel) return false;

    this.entries.delete(address);
    this.events.onUnregistered?.(address, channel);
    return true;
  }

  lookup(address: Address): RelayChannel | undefined {
    return this.entries.get(address)?.channel;
  }

  get(address: Address): RegistryEntry | undefined {
    const entry = this.entries.get(address);
    return entry ? { ...entry } : undefined;
  }

  has(address: Address): boolean {
    return this.entries.has(address);
  }

  list(): RegistryEntry[] {
    return Array.from(this.entries.values(), (entry) => ({ ...entry }));
  }

  addresses(): Address[] {
    return Array.from(this.entries.keys());
  }

  /** Case-insensitive substring match on announce summaries. */
  search(query: string, limit = 10): RegistryEntry[] {
    const needle = query.toLowerCase();
    return this.list()
      .filter((entry) => entry.summary.toLowerCase().includes(needle))
      .slice(0, limit);
  }

  /** Drop every entry without closing channels; returns what was removed. */
  clear(): RegistryEntry[] {
    const removed = this.list();
    for (const entry of removed) {
      this.unregister(entry.address, entry.channel);
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
