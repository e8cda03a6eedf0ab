import { ExpirableStore } from '../src/stores/expirableStore';

describe('ExpirableStore', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 0;
  });

  test('entries are visible only before their deadline', () => {
    const store = new ExpirableStore<string, number>({ defaultTtlMs: 1000, cleanupIntervalMs: 0, now: clock });
    store.set('a', 1);

    now = 999;
    expect(store.get('a')).toBe(1);
    now = 1000;
    expect(store.get('a')).toBeUndefined();
    expect(store.has('a')).toBe(false);
  });

  test('set overwrites the value and resets the deadline', () => {
    const store = new ExpirableStore<string, number>({ defaultTtlMs: 1000, cleanupIntervalMs: 0, now: clock });
    store.set('a', 1);
    now = 800;
    store.set('a', 2);
    now = 1500;
    expect(store.get('a')).toBe(2);
  });

  test('set accepts a per-entry ttl', () => {
    const store = new ExpirableStore<string, number>({ defaultTtlMs: 1000, cleanupIntervalMs: 0, now: clock });
    store.set('short', 1, 100);
    store.set('long', 2);
    now = 100;
    expect(store.get('short')).toBeUndefined();
    expect(store.get('long')).toBe(2);
  });

  test('size, keys and entries skip expired entries', () => {
    const store = new ExpirableStore<string, string>({ defaultTtlMs: 1000, cleanupIntervalMs: 0, now: clock });
    store.set('a', 'x', 500);
    store.set('b', 'y');
    expect(store.size).toBe(2);

    now = 500;
    expect(store.size).toBe(1);
    expect(store.keys()).toEqual(['b']);
    expect(store.entries()).toEqual([['b', 'y']]);
  });

  test('getOrCreate creates once and slides the deadline on every access', () => {
    const store = new ExpirableStore<string, { hits: number }>({ defaultTtlMs: 1000, cleanupIntervalMs: 0, now: clock });
    const create = jest.fn(() => ({ hits: 0 }));

    const first = store.getOrCreate('k', create);
    now = 900;
    const second = store.getOrCreate('k', create);
    now = 1800;
    const third = store.getOrCreate('k', create);

    expect(create).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(third).toBe(first);
  });

  test('getOrCreate replaces an expired entry', () => {
    const store = new ExpirableStore<string, { id: number }>({ defaultTtlMs: 1000, cleanupIntervalMs: 0, now: clock });
    const first = store.getOrCreate('k', () => ({ id: 1 }));
    now = 1000;
    const second = store.getOrCreate('k', () => ({ id: 2 }));
    expect(second).not.toBe(first);
    expect(second.id).toBe(2);
  });

  test('get refreshes the deadline when sliding expiration is on', () => {
    const store = new ExpirableStore<string, number>({
      defaultTtlMs: 1000,
      cleanupIntervalMs: 0,
      slidingExpiration: true,
      now: clock,
    });
    store.set('a', 1);
    now = 900;
    expect(store.get('a')).toBe(1);
    now = 1800;
    expect(store.get('a')).toBe(1);
    now = 2800;
    expect(store.get('a')).toBeUndefined();
  });

  test('sweep removes expired entries and reports how many', () => {
    const store = new ExpirableStore<string, number>({ defaultTtlMs: 1000, cleanupIntervalMs: 0, now: clock });
    store.set('a', 1, 100);
    store.set('b', 2, 200);
    store.set('c', 3);
    now = 200;
    expect(store.sweep()).toBe(2);
    expect(store.sweep()).toBe(0);
    expect(store.keys()).toEqual(['c']);
  });

  test('delete and clear drop entries', () => {
    const store = new ExpirableStore<string, number>({ defaultTtlMs: 1000, cleanupIntervalMs: 0, now: clock });
    store.set('a', 1);
    store.set('b', 2);
    expect(store.delete('a')).toBe(true);
    expect(store.delete('a')).toBe(false);
    store.clear();
    expect(store.size).toBe(0);
  });

  test('a new default ttl applies to later writes', () => {
    const store = new ExpirableStore<string, number>({ defaultTtlMs: 1000, cleanupIntervalMs: 0, now: clock });
    store.defaultTtlMs = 100;
    expect(store.defaultTtlMs).toBe(100);
    store.set('a', 1);
    now = 100;
    expect(store.get('a')).toBeUndefined();
  });

  describe('background sweep', () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    test('runs on the cleanup interval until stopped', () => {
      const store = new ExpirableStore<string, number>({
        defaultTtlMs: 500,
        cleanupIntervalMs: 1000,
        now: () => Date.now(),
      });
      const sweep = jest.spyOn(store, 'sweep');
      store.set('a', 1);

      jest.advanceTimersByTime(1000);
      expect(sweep).toHaveBeenCalledTimes(1);
      expect(sweep.mock.results[0]?.value).toBe(1);

      store.stop();
      jest.advanceTimersByTime(5000);
      expect(sweep).toHaveBeenCalledTimes(1);
    });
  });
});
