/**
 * ContactBook Cache Module
 * Session cache with a pluggable store (memory or redis)
 */

import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CryptoModule } from '@contactbook/common/crypto';
import { MemorySessionStore } from './memory-session.store';
import { RedisSessionStore, createRedisClient } from './redis-session.store';
import { SESSION_STORE, SessionStore } from './session-store';
import { SessionCacheService } from './session-cache.service';

@Module({
  imports: [ConfigModule, CryptoModule],
  providers: [
    {
      provide: SESSION_STORE,
      inject: [ConfigService],
      useFactory: (config: ConfigService): SessionStore => {
        const driver = config.get<string>('cacheDriver');

        if (driver === 'memory') {
          return new MemorySessionStore();
        }

        if (driver === 'redis') {
          const host = config.get<string>('redisHost') ?? 'localhost';
          const port = config.get<number>('redisPort') ?? 6379;
          return new RedisSessionStore(createRedisClient(host, port));
        }

        throw new Error(`Unsupported cacheDriver '${driver}' (expected 'memory' or 'redis')`);
      },
    },
    SessionCacheService,
  ],
  exports: [SessionCacheService],
})
export class CacheModule {}
