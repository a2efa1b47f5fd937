import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { OutputEnvelope } from '../envelope/index.js';
import { PendingRequestTable, type ReplyChannel } from './pending-request-table.js';

function output(requestId: string, payload: string): OutputEnvelope {
  return { kind: 'OUTPUT', requestId, payload };
}

function createChannel(): ReplyChannel & { send: ReturnType<typeof vi.fn> } {
  return { send: vi.fn() };
}

describe('PendingRequestTable', () => {
  let table: PendingRequestTable;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(10_000);
    table = new PendingRequestTable();
  });

  afterEach(() => {
    table.stop();
    vi.useRealTimers();
  });

  it('adds an entry and returns a token', () => {
    const token = table.add('req-1', createChannel(), 1000);
    expect(token).toBe('req-1#1');
    expect(table.has('req-1')).toBe(true);
    expect(table.size).toBe(1);
  });

  it('refuses a requestId that is already pending', () => {
    table.add('req-1', createChannel(), 1000);
    expect(table.add('req-1', createChannel(), 1000)).toBeNull();
    expect(table.size).toBe(1);
  });

  it('resolve delivers the envelope to the waiting channel', () => {
    const channel = createChannel();
    table.add('req-1', channel, 1000);

    expect(table.resolve('req-1', output('req-1', 'pong'))).toBe(true);
    expect(channel.send).toHaveBeenCalledWith(output('req-1', 'pong'));
    expect(table.has('req-1')).toBe(false);
  });

  it('resolve succeeds at most once per requestId', () => {
    const channel = createChannel();
    table.add('req-1', channel, 1000);
    table.resolve('req-1', output('req-1', 'first'));

    expect(table.resolve('req-1', output('req-1', 'second'))).toBe(false);
    expect(channel.send).toHaveBeenCalledTimes(1);
  });

  it('resolve of an unknown requestId does nothing', () => {
    expect(table.resolve('forged', output('forged', 'x'))).toBe(false);
  });

  it('a duplicate delivery does not affect a later request with a fresh id', () => {
    const channel = createChannel();
    table.add('req-1', channel, 1000);
    table.resolve('req-1', output('req-1', 'one'));
    table.resolve('req-1', output('req-1', 'one again'));

    table.add('req-2', channel, 1000);
    expect(table.resolve('req-2', output('req-2', 'two'))).toBe(true);
    expect(channel.send.mock.calls.map(([envelope]) => envelope.payload)).toEqual(['one', 'two']);
  });

  it('sweep evicts entries past their deadline with a Timeout error', () => {
    const slow = createChannel();
    const fast = createChannel();
    table.add('slow', slow, 500);
    table.add('fast', fast, 5000);

    expect(table.sweep(10_500)).toBe(1);
    expect(slow.send).toHaveBeenCalledWith({
      kind: 'ERROR',
      requestId: 'slow',
      reason: 'Timeout',
      message: 'No response within 500ms',
    });
    expect(fast.send).not.toHaveBeenCalled();
    expect(table.has('fast')).toBe(true);
  });

  it('a swept request can no longer be resolved', () => {
    const channel = createChannel();
    table.add('req-1', channel, 100);
    table.sweep(20_000);

    expect(table.resolve('req-1', output('req-1', 'late'))).toBe(false);
    expect(channel.send).toHaveBeenCalledTimes(1);
  });

  it('expire with a stale token leaves a newer entry alone', () => {
    const token = table.add('req-1', createChannel(), 1000);
    table.resolve('req-1', output('req-1', 'done'));
    const next = createChannel();
    table.add('req-1', next, 1000);

    expect(table.expire('req-1', token ?? undefined)).toBe(false);
    expect(table.has('req-1')).toBe(true);
    expect(next.send).not.toHaveBeenCalled();
  });

  it('reports timeouts through events', () => {
    const onTimeout = vi.fn();
    table = new PendingRequestTable({ onTimeout });
    table.add('req-1', createChannel(), 100);
    table.expire('req-1');
    expect(onTimeout).toHaveBeenCalledWith('req-1');
  });

  it('dropChannel forgets entries of a closed channel silently', () => {
    const gone = createChannel();
    const live = createChannel();
    table.add('a', gone, 1000);
    table.add('b', gone, 1000);
    table.add('c', live, 1000);

    expect(table.dropChannel(gone)).toBe(2);
    expect(gone.send).not.toHaveBeenCalled();
    expect(table.size).toBe(1);
    expect(table.has('c')).toBe(true);
  });

  it('start sweeps periodically until stopped', () => {
    const channel = createChannel();
    table.add('req-1', channel, 1500);
    table.start(1000);

    vi.advanceTimersByTime(1000);
    expect(channel.send).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1000);
    expect(channel.send).toHaveBeenCalledTimes(1);

    table.stop();
    table.add('req-2', channel, 100);
    vi.advanceTimersByTime(5000);
    expect(table.has('req-2')).toBe(true);
  });

  it('clear forgets everything and stops sweeping', () => {
    table.add('a', createChannel(), 1000);
    table.start(100);
    expect(table.clear()).toBe(1);
    expect(table.size).toBe(0);
  });
});
