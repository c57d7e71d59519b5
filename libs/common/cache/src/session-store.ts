/**
 * Key/value store behind the session cache.
 * Implementations must drop an entry once its TTL has elapsed.
 */
export interface SessionStore {
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  get(key: string): Promise<string | null>;
}

export const SESSION_STORE = Symbol('SESSION_STORE');
