import { MemorySessionStore } from './memory-session.store';

describe('MemorySessionStore', () => {
  let store: MemorySessionStore;

  beforeEach(() => {
    jest.useFakeTimers({ now: new Date('2026-03-01T12:00:00Z') });
    store = new MemorySessionStore(1000);
  });

  afterEach(() => {
    store.onModuleDestroy();
    jest.useRealTimers();
  });

  it('should return a stored value before it expires', async () => {
    await store.set('k', 'v', 10);

    jest.setSystemTime(new Date('2026-03-01T12:00:09Z'));
    await expect(store.get('k')).resolves.toBe('v');
  });

  it('should return null once the TTL has elapsed', async () => {
    await store.set('k', 'v', 10);

    jest.setSystemTime(new Date('2026-03-01T12:00:10Z'));
    await expect(store.get('k')).resolves.toBeNull();
    expect(store.size).toBe(0);
  });

  it('should return null for a key never set', async () => {
    await expect(store.get('missing')).resolves.toBeNull();
  });

  it('should overwrite an existing entry and its expiry', async () => {
    await store.set('k', 'first', 5);
    await store.set('k', 'second', 60);

    jest.setSystemTime(new Date('2026-03-01T12:00:30Z'));
    await expect(store.get('k')).resolves.toBe('second');
  });

  it('should sweep expired entries on the timer', async () => {
    store.onModuleInit();
    await store.set('short', 'a', 1);
    await store.set('long', 'b', 120);

    jest.advanceTimersByTime(2000);

    expect(store.size).toBe(1);
    await expect(store.get('long')).resolves.toBe('b');
  });

  it('should report how many entries a sweep removed', async () => {
    await store.set('a', '1', 1);
    await store.set('b', '2', 1);
    await store.set('c', '3', 100);

    jest.setSystemTime(new Date('2026-03-01T12:00:02Z'));
    expect(store.sweep()).toBe(2);
  });
});
