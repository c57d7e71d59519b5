/**
 * In-process session store
 * Per-entry expiry checked on read, plus a periodic sweep so
 * abandoned entries do not accumulate.
 */

import { Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { SessionStore } from './session-store';

interface MemoryEntry {
  value: string;
  expiresAt: number; // epoch ms
}

export class MemorySessionStore implements SessionStore, OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MemorySessionStore.name);
  private readonly entries = new Map<string, MemoryEntry>();
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(private readonly sweepIntervalMs: number = 60 * 1000) {}

  onModuleInit(): void {
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.sweepTimer.unref();
    this.logger.log(`In-memory session store ready (sweep every ${this.sweepIntervalMs}ms)`);
  }

  onModuleDestroy(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.entries.clear();
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return null;
    }

    return entry.value;
  }

  /**
   * Remove expired entries, returning how many were dropped
   */
  sweep(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.entries.entries()) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.debug(`Swept ${removed} expired session entries`);
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
