import { describe, it, expect, afterEach, vi } from 'vitest';
import { MemorySessionStore } from '../memory-store.js';
import { createTurn } from '../types.js';

describe('MemorySessionStore', () => {
  const stores: MemorySessionStore[] = [];

  function newStore(ttlMs?: number): MemorySessionStore {
    const store = new MemorySessionStore({ ttlMs });
    stores.push(store);
    return store;
  }

  afterEach(() => {
    stores.splice(0).forEach(store => store.destroy());
    vi.useRealTimers();
  });

  it('should return an empty session for an unknown id', async () => {
    const store = newStore();

    expect(await store.load('new-session')).toEqual({ id: 'new-session', turns: [] });
  });

  it('should append turns in order', async () => {
    const store = newStore();

    await store.append('s1', createTurn('user', 'hi'));
    const session = await store.append('s1', createTurn('assistant', 'hello'), createTurn('user', 'bye'));

    expect(session.turns.map(t => t.content)).toEqual(['hi', 'hello', 'bye']);
    expect((await store.load('s1')).turns).toEqual(session.turns);
  });

  it('should keep sessions separate', async () => {
    const store = newStore();

    await store.append('a', createTurn('assistant', 'for a'));
    await store.append('b', createTurn('assistant', 'for b'));

    expect((await store.load('a')).turns).toEqual([{ role: 'assistant', content: 'for a' }]);
    expect((await store.list()).sort()).toEqual(['a', 'b']);
  });

  it('should replace and reset history', async () => {
    const store = newStore();
    await store.append('s1', createTurn('assistant', 'old'));

    await store.replace('s1', [createTurn('assistant', 'new')]);
    expect((await store.load('s1')).turns).toEqual([{ role: 'assistant', content: 'new' }]);

    await store.reset('s1');
    expect((await store.load('s1')).turns).toEqual([]);
    expect(await store.list()).toEqual([]);
  });

  it('should not let callers mutate stored history', async () => {
    const store = newStore();
    await store.append('s1', createTurn('assistant', 'kept'));

    const loaded = await store.load('s1');
    const copy = [...loaded.turns];
    copy.push(createTurn('assistant', 'injected'));

    expect((await store.load('s1')).turns).toHaveLength(1);
  });

  it('should forget idle sessions after the ttl', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const store = newStore(1000);

    await store.append('s1', createTurn('assistant', 'hello'));
    vi.setSystemTime(new Date('2026-01-01T00:00:00.500Z'));
    expect((await store.load('s1')).turns).toHaveLength(1);

    vi.setSystemTime(new Date('2026-01-01T00:00:02Z'));
    expect((await store.load('s1')).turns).toEqual([]);
  });
});
