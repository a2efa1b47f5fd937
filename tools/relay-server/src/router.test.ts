import {
  CLOSE_CODES,
  type Envelope,
  type InputEnvelope,
  type RelayChannel,
  createLogger,
  encode,
  generateIdentity,
  shortAddress,
  signAnnounce,
} from 'agentlink-protocol';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RelayRouter } from './router.js';

interface FakeChannel extends RelayChannel {
  sent: Envelope[];
  closedWith: { code: number; reason: string } | null;
}

let nextId = 0;

function createChannel(): FakeChannel {
  const channel: FakeChannel = {
    id: `channel-${++nextId}`,
    sent: [],
    closedWith: null,
    send: (envelope) => {
      channel.sent.push(envelope);
    },
    close: (code, reason) => {
      channel.closedWith = { code, reason };
    },
  };
  return channel;
}

function input(to: string, requestId: string, payload = 'ping', timeoutMs?: number): string {
  const envelope: InputEnvelope = { kind: 'INPUT', to, requestId, payload, timeoutMs };
  return encode(envelope);
}

describe('RelayRouter', () => {
  const agent = generateIdentity();
  let router: RelayRouter;

  function announceChannel(summary = 'echo agent'): FakeChannel {
    const channel = createChannel();
    router.open(channel, 'announce');
    router.receive(channel, encode(signAnnounce(agent, summary)));
    return channel;
  }

  function inputChannel(): FakeChannel {
    const channel = createChannel();
    router.open(channel, 'input');
    return channel;
  }

  beforeEach(() => {
    router = new RelayRouter({ timeoutMs: 2000, maxTimeoutMs: 5000, logger: createLogger('router-test', 'silent') });
  });

  afterEach(() => {
    router.shutdown();
    vi.useRealTimers();
  });

  describe('announce sockets', () => {
    it('registers a signed announce and acknowledges it', () => {
      const channel = announceChannel();

      expect(router.registry.lookup(agent.address)).toBe(channel);
      expect(channel.sent).toEqual([
        { kind: 'LOOKUP_RESULT', to: agent.address, online: true, summary: 'echo agent' },
      ]);
    });

    it('closes the socket when the first frame is not an announce', () => {
      const channel = createChannel();
      router.open(channel, 'announce');
      router.receive(channel, input(agent.address, 'req-1'));

      expect(channel.sent).toEqual([
        { kind: 'ERROR', reason: 'ProtocolViolation', message: 'expected ANNOUNCE, got INPUT' },
      ]);
      expect(channel.closedWith?.code).toBe(CLOSE_CODES.PROTOCOL_VIOLATION);
      expect(router.registry.size).toBe(0);
    });

    it('rejects an announce whose signature does not match', () => {
      const channel = createChannel();
      router.open(channel, 'announce');
      router.receive(channel, encode({ ...signAnnounce(agent, 'honest'), summary: 'forged' }));

      expect(channel.sent).toEqual([
        { kind: 'ERROR', reason: 'ProtocolViolation', message: 'ANNOUNCE signature does not match its address' },
      ]);
      expect(router.registry.has(agent.address)).toBe(false);
    });

    it('rejects an announce from a malformed address', () => {
      const channel = createChannel();
      router.open(channel, 'announce');
      router.receive(channel, encode({ ...signAnnounce(agent), from: 'agent-7' }));

      expect(channel.closedWith?.code).toBe(CLOSE_CODES.PROTOCOL_VIOLATION);
      expect(router.registry.size).toBe(0);
    });

    it('ignores frames after a violation', () => {
      const channel = createChannel();
      router.open(channel, 'announce');
      router.receive(channel, 'not json');
      router.receive(channel, encode(signAnnounce(agent)));

      expect(channel.sent).toEqual([{ kind: 'ERROR', reason: 'MalformedEnvelope', message: 'invalid JSON' }]);
      expect(router.registry.size).toBe(0);
    });

    it('refreshes the registration on a repeated announce', () => {
      const channel = announceChannel('v1');
      router.receive(channel, encode(signAnnounce(agent, 'v2')));

      expect(router.registry.get(agent.address)?.summary).toBe('v2');
      expect(channel.sent).toHaveLength(2);
      expect(channel.closedWith).toBeNull();
    });

    it('rejects an announce for another address on an active socket', () => {
      const channel = announceChannel();
      router.receive(channel, encode(signAnnounce(generateIdentity())));

      expect(channel.closedWith).toEqual({
        code: CLOSE_CODES.PROTOCOL_VIOLATION,
        reason: 'ANNOUNCE does not match the registered address',
      });
    });

    it('supersedes an older connection for the same address', () => {
      const first = announceChannel();
      const second = announceChannel();

      expect(first.closedWith).toEqual({ code: CLOSE_CODES.SUPERSEDED, reason: 'superseded by a newer announce' });
      router.closed(first);
      expect(router.registry.lookup(agent.address)).toBe(second);
    });

    it('ignores a heartbeat that arrives on a superseded socket before it closes', () => {
      const first = announceChannel('v1');
      const second = announceChannel('v2');
      router.receive(first, encode(signAnnounce(agent, 'late heartbeat')));
      router.closed(first);

      expect(second.closedWith).toBeNull();
      expect(router.registry.lookup(agent.address)).toBe(second);
      expect(router.registry.get(agent.address)?.summary).toBe('v2');
      expect(first.sent).toHaveLength(1);
    });

    it('unregisters the address when the socket closes', () => {
      const channel = announceChannel();
      router.closed(channel);
      expect(router.registry.has(agent.address)).toBe(false);
    });
  });

  describe('input sockets', () => {
    it('answers AddressOffline at once for an unregistered address', () => {
      const caller = inputChannel();
      const nobody = `0x${'de'.repeat(32)}`;
      router.receive(caller, input(nobody, 'req-1'));

      expect(caller.sent).toEqual([
        { kind: 'ERROR', requestId: 'req-1', reason: 'AddressOffline', message: `${shortAddress(nobody)} is not connected` },
      ]);
      expect(router.pending.size).toBe(0);
      expect(caller.closedWith).toBeNull();
    });

    it('answers AddressOffline for something that is not an address', () => {
      const caller = inputChannel();
      router.receive(caller, input('not-an-address', 'req-1'));

      expect(caller.sent).toEqual([
        { kind: 'ERROR', requestId: 'req-1', reason: 'AddressOffline', message: 'not-an...ress is not connected' },
      ]);
    });

    it('forwards the input unchanged and routes the output back', () => {
      const agentChannel = announceChannel();
      const caller = inputChannel();
      router.receive(caller, input(agent.address, 'req-1', 'ping'));

      expect(agentChannel.sent[1]).toEqual({ kind: 'INPUT', to: agent.address, requestId: 'req-1', payload: 'ping' });
      expect(router.pending.has('req-1')).toBe(true);

      router.receive(agentChannel, encode({ kind: 'OUTPUT', requestId: 'req-1', payload: 'pong' }));
      expect(caller.sent).toEqual([{ kind: 'OUTPUT', requestId: 'req-1', payload: 'pong' }]);
      expect(router.pending.size).toBe(0);
    });

    it('routes an agent error back to the caller', () => {
      const agentChannel = announceChannel();
      const caller = inputChannel();
      router.receive(caller, input(agent.address, 'req-1'));
      router.receive(
        agentChannel,
        encode({ kind: 'ERROR', requestId: 'req-1', reason: 'HandlerFailure', message: 'boom' }),
      );

      expect(caller.sent).toEqual([{ kind: 'ERROR', requestId: 'req-1', reason: 'HandlerFailure', message: 'boom' }]);
    });

    it('drops a duplicate terminal envelope', () => {
      const agentChannel = announceChannel();
      const caller = inputChannel();
      router.receive(caller, input(agent.address, 'req-1'));
      router.receive(agentChannel, encode({ kind: 'OUTPUT', requestId: 'req-1', payload: 'one' }));
      router.receive(agentChannel, encode({ kind: 'OUTPUT', requestId: 'req-1', payload: 'again' }));

      router.receive(caller, input(agent.address, 'req-2'));
      router.receive(agentChannel, encode({ kind: 'OUTPUT', requestId: 'req-2', payload: 'two' }));

      expect(caller.sent).toEqual([
        { kind: 'OUTPUT', requestId: 'req-1', payload: 'one' },
        { kind: 'OUTPUT', requestId: 'req-2', payload: 'two' },
      ]);
      expect(agentChannel.closedWith).toBeNull();
    });

    it('refuses a requestId that is already pending', () => {
      announceChannel();
      const caller = inputChannel();
      router.receive(caller, input(agent.address, 'req-1'));
      router.receive(caller, input(agent.address, 'req-1'));

      expect(caller.sent).toEqual([
        { kind: 'ERROR', requestId: 'req-1', reason: 'ProtocolViolation', message: 'requestId is already pending' },
      ]);
      expect(caller.closedWith).toBeNull();
    });

    it('applies the default timeout', () => {
      vi.useFakeTimers();
      vi.setSystemTime(50_000);
      announceChannel();
      const caller = inputChannel();
      router.receive(caller, input(agent.address, 'req-1'));

      expect(router.pending.sweep(51_999)).toBe(0);
      expect(router.pending.sweep(52_000)).toBe(1);
      expect(caller.sent).toEqual([
        { kind: 'ERROR', requestId: 'req-1', reason: 'Timeout', message: 'No response within 2000ms' },
      ]);
    });

    it('caps a caller timeout at the maximum', () => {
      vi.useFakeTimers();
      vi.setSystemTime(50_000);
      announceChannel();
      const caller = inputChannel();
      router.receive(caller, input(agent.address, 'short', 'ping', 100));
      router.receive(caller, input(agent.address, 'long', 'ping', 60_000));

      expect(router.pending.sweep(50_100)).toBe(1);
      expect(router.pending.sweep(55_000)).toBe(1);
      expect(caller.sent.map((envelope) => (envelope.kind === 'ERROR' ? envelope.message : ''))).toEqual([
        'No response within 100ms',
        'No response within 5000ms',
      ]);
    });

    it('forgets pending requests of a closed input socket', () => {
      const agentChannel = announceChannel();
      const caller = inputChannel();
      router.receive(caller, input(agent.address, 'req-1'));
      router.closed(caller);

      expect(router.pending.size).toBe(0);
      router.receive(agentChannel, encode({ kind: 'OUTPUT', requestId: 'req-1', payload: 'late' }));
      expect(caller.sent).toEqual([]);
    });

    it('answers AddressOffline after the agent disconnected', () => {
      const agentChannel = announceChannel();
      router.closed(agentChannel);
      const caller = inputChannel();
      router.receive(caller, input(agent.address, 'req-1'));

      expect(caller.sent[0]).toMatchObject({ kind: 'ERROR', reason: 'AddressOffline' });
    });

    it('closes the socket on anything but INPUT', () => {
      const caller = inputChannel();
      router.receive(caller, encode({ kind: 'LOOKUP', to: agent.address }));

      expect(caller.sent).toEqual([
        { kind: 'ERROR', reason: 'ProtocolViolation', message: 'LOOKUP is not allowed on an input socket' },
      ]);
      expect(caller.closedWith?.code).toBe(CLOSE_CODES.PROTOCOL_VIOLATION);
    });

    it('closes the socket on a malformed envelope without touching others', () => {
      const agentChannel = announceChannel();
      const caller = inputChannel();
      router.receive(caller, encode({ kind: 'INPUT', to: agent.address, payload: 'no id' }));

      expect(caller.sent).toEqual([
        { kind: 'ERROR', reason: 'MalformedEnvelope', message: 'invalid envelope: requestId: Required' },
      ]);
      expect(router.registry.lookup(agent.address)).toBe(agentChannel);
      expect(agentChannel.closedWith).toBeNull();
    });
  });

  describe('lookup sockets', () => {
    it('reports whether an address is online', () => {
      announceChannel('weather');
      const channel = createChannel();
      router.open(channel, 'lookup');
      const offline = `0x${'00'.repeat(32)}`;

      router.receive(channel, encode({ kind: 'LOOKUP', to: agent.address }));
      router.receive(channel, encode({ kind: 'LOOKUP', to: offline }));

      expect(channel.sent).toEqual([
        { kind: 'LOOKUP_RESULT', to: agent.address, online: true, summary: 'weather' },
        { kind: 'LOOKUP_RESULT', to: offline, online: false },
      ]);
    });

    it('closes the socket on anything but LOOKUP', () => {
      const channel = createChannel();
      router.open(channel, 'lookup');
      router.receive(channel, input(agent.address, 'req-1'));

      expect(channel.closedWith?.code).toBe(CLOSE_CODES.PROTOCOL_VIOLATION);
    });
  });

  it('shutdown forgets registrations and pending requests', () => {
    const agentChannel = announceChannel();
    const caller = inputChannel();
    router.receive(caller, input(agent.address, 'req-1'));

    router.shutdown();
    router.receive(agentChannel, encode({ kind: 'OUTPUT', requestId: 'req-1', payload: 'late' }));

    expect(router.registry.size).toBe(0);
    expect(router.pending.size).toBe(0);
    expect(caller.sent).toEqual([]);
  });
});
