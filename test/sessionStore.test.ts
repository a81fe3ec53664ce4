import { describe, expect, it } from 'vitest';
import { InMemorySessionStore } from '../src/services/sessionStore';
import { MANAGER, OTHER_MANAGER, makeItem, makeSession } from './helpers';

const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
};

describe('InMemorySessionStore', () => {
  it('returns undefined for an unknown manager', async () => {
    const store = new InMemorySessionStore();
    expect(await store.get(MANAGER)).toBeUndefined();
    expect((await store.getRecord(MANAGER)).mode).toBe('review');
  });

  it('hands out copies, so callers cannot mutate stored state', async () => {
    const store = new InMemorySessionStore();
    await store.put(MANAGER, makeSession([makeItem()]));

    const copy = await store.get(MANAGER);
    if (!copy) throw new Error('expected a session');
    copy.cursor = 5;
    copy.items[0].approvalStatus = 'approved';

    const again = await store.get(MANAGER);
    expect(again?.cursor).toBe(0);
    expect(again?.items[0].approvalStatus).toBe('pending');
  });

  it('clear drops the session but keeps activity, mode and memory', async () => {
    const store = new InMemorySessionStore();
    const at = new Date('2024-06-01T10:00:00Z');
    await store.put(MANAGER, makeSession([makeItem()]));
    await store.updateRecord(MANAGER, {
      lastActivity: at,
      mode: 'advice',
      memory: [{ input: 'hi', output: 'hello', at }],
      remindersSent: 2,
    });

    await store.clear(MANAGER);

    const record = await store.getRecord(MANAGER);
    expect(record.session).toBeUndefined();
    expect(record.lastActivity).toEqual(at);
    expect(record.mode).toBe('advice');
    expect(record.memory).toHaveLength(1);
    expect(record.remindersSent).toBe(0);
  });

  it('serializes work for the same manager in arrival order', async () => {
    const store = new InMemorySessionStore();
    const gate = deferred();
    const order: string[] = [];

    const first = store.withLock(MANAGER, async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = store.withLock(MANAGER, async () => {
      order.push('second');
    });

    await new Promise((r) => setTimeout(r, 0));
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not block other managers', async () => {
    const store = new InMemorySessionStore();
    const gate = deferred();
    const order: string[] = [];

    const held = store.withLock(MANAGER, async () => {
      await gate.promise;
      order.push('manager-1');
    });
    await store.withLock(OTHER_MANAGER, async () => {
      order.push('manager-2');
    });

    expect(order).toEqual(['manager-2']);
    gate.resolve();
    await held;
    expect(order).toEqual(['manager-2', 'manager-1']);
  });

  it('releases the lock after a failure and drops idle lock entries', async () => {
    const store = new InMemorySessionStore();

    await expect(
      store.withLock(MANAGER, async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(store.withLock(MANAGER, () => 'ok')).resolves.toBe('ok');
    expect(store.activeLockCount()).toBe(0);
  });

  it('lists every manager it has seen', async () => {
    const store = new InMemorySessionStore();
    await store.touch(MANAGER, new Date());
    await store.put(OTHER_MANAGER, makeSession([makeItem()]));
    expect((await store.listManagers()).sort()).toEqual([MANAGER, OTHER_MANAGER].sort());
  });
});
