import { describe, expect, it } from 'vitest';
import { SessionStore } from './store.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('SessionStore', () => {
  it('creates one session per user, idempotently', () => {
    const store = new SessionStore();
    const a = store.get('u1');
    expect(store.get('u1')).toBe(a);
    expect(store.get('u2')).not.toBe(a);
    expect(store.size).toBe(2);
    expect(store.peek('u3')).toBeUndefined();
    expect(store.size).toBe(2);
  });

  it('runs tasks for the same user one at a time, in order', async () => {
    const store = new SessionStore();
    const gate = deferred();
    const order: string[] = [];

    const first = store.withSession('u1', async (s) => {
      order.push('first:start');
      await gate.promise;
      s.crop = 'wheat';
      order.push('first:end');
      return 1;
    });
    const second = store.withSession('u1', async (s) => {
      order.push(`second:${s.crop ?? '-'}`);
      return 2;
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);
    gate.resolve();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second:wheat']);
  });

  it('does not hold other users behind a slow one', async () => {
    const store = new SessionStore();
    const gate = deferred();
    const slow = store.withSession('u1', async () => {
      await gate.promise;
      return 'slow';
    });
    await expect(store.withSession('u2', async () => 'fast')).resolves.toBe('fast');
    gate.resolve();
    await expect(slow).resolves.toBe('slow');
  });

  it('propagates task errors and keeps the lane usable', async () => {
    const store = new SessionStore();
    await expect(
      store.withSession('u1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(store.withSession('u1', async () => 'ok')).resolves.toBe('ok');
  });

  it('evicts sessions idle for longer than the ttl', () => {
    let now = 1_000;
    const store = new SessionStore({ ttlMs: 500, now: () => now });
    store.get('old');
    now = 1_400;
    store.get('fresh');
    now = 1_600;

    expect(store.sweep()).toBe(1);
    expect(store.peek('old')).toBeUndefined();
    expect(store.peek('fresh')).toBeDefined();
  });

  it('keeps sessions with work in flight', async () => {
    let now = 0;
    const store = new SessionStore({ ttlMs: 10, now: () => now });
    const gate = deferred();
    const busy = store.withSession('u1', async () => gate.promise);
    await Promise.resolve();
    now = 100;
    expect(store.sweep()).toBe(0);
    gate.resolve();
    await busy;
    expect(store.sweep()).toBe(1);
  });

  it('never evicts without a ttl', () => {
    let now = 0;
    const store = new SessionStore({ now: () => now });
    store.get('u1');
    now = Number.MAX_SAFE_INTEGER;
    expect(store.sweep()).toBe(0);
  });
});
