/**
 * Session Cache Service
 * token -> Identity snapshot, TTL bound to the token's own expiry.
 * Keys are SHA-256 digests of the token, so raw bearer tokens never
 * reach the store.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { TokenHashService } from '@contactbook/common/crypto';
import { Identity, isIdentity } from '@contactbook/common/types';
import { SESSION_STORE, SessionStore } from './session-store';

export interface SessionCacheStats {
  hits: number;
  misses: number;
}

@Injectable()
export class SessionCacheService {
  private readonly logger = new Logger(SessionCacheService.name);
  private hits = 0;
  private misses = 0;

  constructor(
    @Inject(SESSION_STORE) private readonly store: SessionStore,
    private readonly tokenHashService: TokenHashService,
  ) {}

  /**
   * Store (or overwrite) the snapshot for `token`.
   * Write failures are logged; the durable store remains authoritative.
   */
  async put(token: string, identity: Identity, ttlSeconds: number): Promise<void> {
    const ttl = Math.floor(ttlSeconds);
    if (ttl <= 0) {
      return;
    }

    try {
      await this.store.set(this.key(token), JSON.stringify(identity), ttl);
    } catch (error) {
      this.logger.warn(`Session cache write failed: ${describe(error)}`);
    }
  }

  /**
   * Snapshot for `token`, or null when absent, expired or unreadable
   */
  async get(token: string): Promise<Identity | null> {
    let raw: string | null;
    try {
      raw = await this.store.get(this.key(token));
    } catch (error) {
      this.logger.warn(`Session cache read failed, treating as miss: ${describe(error)}`);
      this.misses++;
      return null;
    }

    if (raw === null) {
      this.misses++;
      this.logger.debug('Session cache miss');
      return null;
    }

    const identity = parseIdentity(raw);
    if (!identity) {
      this.logger.warn('Discarding malformed session cache entry');
      this.misses++;
      return null;
    }

    this.hits++;
    this.logger.debug(`Session cache hit for ${identity.username}`);
    return identity;
  }

  stats(): SessionCacheStats {
    return { hits: this.hits, misses: this.misses };
  }

  private key(token: string): string {
    return `session:${this.tokenHashService.hash(token)}`;
  }
}

function parseIdentity(raw: string): Identity | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  return isIdentity(value) ? value : null;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
