/**
 * Redis-backed session store (ioredis)
 * Expiry is delegated to Redis via SET ... EX
 */

import { Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { SessionStore } from './session-store';

export type RedisClient = Pick<Redis, 'get' | 'set' | 'quit'>;

export class RedisSessionStore implements SessionStore, OnModuleDestroy {
  private readonly logger = new Logger(RedisSessionStore.name);

  constructor(private readonly client: RedisClient) {}

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.set(key, value, 'EX', ttlSeconds);
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async onModuleDestroy(): Promise<void> {
    await this.client.quit();
    this.logger.log('Redis connection closed');
  }
}

/**
 * Create the ioredis connection used by RedisSessionStore
 */
export function createRedisClient(host: string, port: number): Redis {
  const logger = new Logger('RedisClient');
  const client = new Redis({
    host,
    port,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
  });

  client.on('ready', () => logger.log(`Connected to Redis at ${host}:${port}`));
  client.on('error', (error: Error) => logger.error(`Redis error: ${error.message}`));

  return client;
}
