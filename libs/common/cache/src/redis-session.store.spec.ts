import { RedisSessionStore, RedisClient } from './redis-session.store';

describe('RedisSessionStore', () => {
  let client: jest.Mocked<RedisClient>;
  let store: RedisSessionStore;

  beforeEach(() => {
    client = {
      get: jest.fn(),
      set: jest.fn().mockResolvedValue('OK'),
      quit: jest.fn().mockResolvedValue('OK'),
    };
    store = new RedisSessionStore(client);
  });

  it('should delegate expiry to redis with SET EX', async () => {
    await store.set('session:abc', '{"id":1}', 900);

    expect(client.set).toHaveBeenCalledWith('session:abc', '{"id":1}', 'EX', 900);
  });

  it('should return the stored value', async () => {
    client.get.mockResolvedValue('{"id":1}');

    await expect(store.get('session:abc')).resolves.toBe('{"id":1}');
    expect(client.get).toHaveBeenCalledWith('session:abc');
  });

  it('should return null when redis has no entry', async () => {
    client.get.mockResolvedValue(null);

    await expect(store.get('session:abc')).resolves.toBeNull();
  });

  it('should propagate redis failures to the caller', async () => {
    client.set.mockRejectedValue(new Error('connection refused'));

    await expect(store.set('k', 'v', 1)).rejects.toThrow('connection refused');
  });

  it('should close the connection on shutdown', async () => {
    await store.onModuleDestroy();

    expect(client.quit).toHaveBeenCalled();
  });
});
