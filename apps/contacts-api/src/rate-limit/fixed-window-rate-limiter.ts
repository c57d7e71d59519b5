/**
 * Fixed-window request counter, one window per key.
 * In-process only; each API instance counts its own traffic.
 */

import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';

const SWEEP_INTERVAL_MS = 60 * 1000;

interface Window {
  count: number;
  resetAt: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  resetAt: number;
}

@Injectable()
export class FixedWindowRateLimiter implements OnModuleInit, OnModuleDestroy {
  private readonly windows = new Map<string, Window>();
  private sweepTimer?: NodeJS.Timeout;

  onModuleInit() {
    this.sweepTimer = setInterval(() => this.sweep(), SWEEP_INTERVAL_MS);
    this.sweepTimer.unref();
  }

  onModuleDestroy() {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  /**
   * Count one request against `key`
   */
  hit(key: string, limit: number, windowMs: number, now: number = Date.now()): RateLimitDecision {
    let window = this.windows.get(key);
    if (!window || window.resetAt <= now) {
      window = { count: 0, resetAt: now + windowMs };
      this.windows.set(key, window);
    }

    window.count++;

    return {
      allowed: window.count <= limit,
      remaining: Math.max(0, limit - window.count),
      resetAt: window.resetAt,
    };
  }

  /**
   * Drop closed windows; returns how many were removed
   */
  sweep(now: number = Date.now()): number {
    let removed = 0;
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.windows.size;
  }
}
