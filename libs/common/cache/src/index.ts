export { CacheModule } from './cache.module';
export { SessionCacheService, SessionCacheStats } from './session-cache.service';
export { SessionStore, SESSION_STORE } from './session-store';
export { MemorySessionStore } from './memory-session.store';
export { RedisSessionStore, RedisClient, createRedisClient } from './redis-session.store';
