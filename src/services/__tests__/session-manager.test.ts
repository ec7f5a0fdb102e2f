import { describe, it, expect, vi, afterEach } from 'vitest';
import { SessionRegistry } from '../session-manager';
import { RuleBasedExtractor } from '../extraction/rules';
import { ExtractionPort } from '../extraction/types';
import { SessionBusyError, SessionNotFoundError } from '../../utils/errors';

function deferredPort() {
  let release: (value: unknown) => void = () => {};
  const port: ExtractionPort = {
    name: 'deferred',
    extract: () =>
      new Promise((resolve) => {
        release = resolve;
      }),
  };
  return { port, release: (value: unknown) => release(value) };
}

describe('SessionRegistry', () => {
  it('creates sessions with their store id', () => {
    const registry = new SessionRegistry(new RuleBasedExtractor());
    const session = registry.create(42);

    expect(registry.size).toBe(1);
    expect(registry.get(session.id)).toBe(session);
    expect(session.snapshot().store_id).toBe(42);
  });

  it('routes a reply to its session', async () => {
    const registry = new SessionRegistry(new RuleBasedExtractor());
    const session = registry.create();
    const turn = await registry.reply(session.id, '123 Bistro');

    expect(turn.sessionId).toBe(session.id);
    expect(turn.state).toBe('AskResources');
  });

  it('throws for an unknown session', async () => {
    const registry = new SessionRegistry(new RuleBasedExtractor());

    expect(() => registry.get('missing')).toThrow(SessionNotFoundError);
    await expect(registry.reply('missing', 'hi')).rejects.toBeInstanceOf(SessionNotFoundError);
    expect(() => registry.delete('missing')).toThrow(SessionNotFoundError);
  });

  it('refuses a second reply while one is in flight', async () => {
    const { port, release } = deferredPort();
    const registry = new SessionRegistry(port);
    const session = registry.create();

    const first = registry.reply(session.id, '123 Bistro');
    await expect(registry.reply(session.id, 'again')).rejects.toBeInstanceOf(SessionBusyError);

    release({ store_name: '123 Bistro' });
    expect((await first).state).toBe('AskResources');
  });

  it('discards a session', () => {
    const registry = new SessionRegistry(new RuleBasedExtractor());
    const session = registry.create();
    registry.delete(session.id);

    expect(registry.size).toBe(0);
    expect(() => registry.get(session.id)).toThrow(SessionNotFoundError);
  });
});

describe('SessionRegistry expiry', () => {
  const options = { idleTtlMs: 60_000, completedTtlMs: 10_000, sweepIntervalMs: 1_000 };

  afterEach(() => {
    vi.useRealTimers();
  });

  it('drops a session that has been idle past its TTL', async () => {
    vi.useFakeTimers();
    const registry = new SessionRegistry(new RuleBasedExtractor(), {}, options);
    const session = registry.create();

    vi.advanceTimersByTime(59_000);
    await registry.reply(session.id, '123 Bistro');
    vi.advanceTimersByTime(59_000);
    expect(registry.size).toBe(1);

    vi.advanceTimersByTime(2_000);
    expect(registry.size).toBe(0);
    expect(() => registry.get(session.id)).toThrow(SessionNotFoundError);
    registry.close();
  });

  it('drops a completed session after the shorter grace period', async () => {
    vi.useFakeTimers();
    const registry = new SessionRegistry(new RuleBasedExtractor(), {}, options);
    const session = registry.create();
    const replies = ['123 Bistro', '4-seat table x5, 6-seat table x4', 'A', 'every day 08:00-17:00', 'yes', 'you decide', 'A'];
    for (const text of replies) await registry.reply(session.id, text);
    expect(session.done).toBe(true);

    vi.advanceTimersByTime(9_000);
    expect(registry.size).toBe(1);
    vi.advanceTimersByTime(2_000);
    expect(registry.size).toBe(0);
    registry.close();
  });

  it('keeps a session whose turn is still in flight', async () => {
    const { port, release } = deferredPort();
    const registry = new SessionRegistry(port, {}, options);
    const session = registry.create();
    const pending = registry.reply(session.id, '123 Bistro');

    registry.sweep(Date.now() + 120_000);
    expect(registry.get(session.id)).toBe(session);

    release({ store_name: '123 Bistro' });
    expect((await pending).state).toBe('AskResources');
    registry.close();
  });

  it('stops its sweep timer on close', () => {
    vi.useFakeTimers();
    const registry = new SessionRegistry(new RuleBasedExtractor(), {}, options);
    expect(vi.getTimerCount()).toBe(1);
    registry.close();
    expect(vi.getTimerCount()).toBe(0);
  });
});
