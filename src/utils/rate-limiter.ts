// ===========================================
// CACHING & THROTTLING UTILITIES
// Used by DexScreener, RugCheck and Solana RPC clients
// ===========================================

import { logger } from './logger.js';

export type Clock = () => number;
export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise(resolve => setTimeout(resolve, ms));

// ============ TTL CACHE ============

export interface TTLCacheOptions {
  maxSize?: number;
  clock?: Clock;
  // Sweep interval for expired entries; 0 disables the timer
  cleanupIntervalMs?: number;
}

export class TTLCache<T> {
  private cache: Map<string, { data: T; expiry: number }> = new Map();
  private maxSize: number;
  private clock: Clock;

  constructor(options: TTLCacheOptions = {}) {
    this.maxSize = options.maxSize ?? 1000;
    this.clock = options.clock ?? Date.now;

    const cleanupIntervalMs = options.cleanupIntervalMs ?? 2 * 60 * 1000;
    if (cleanupIntervalMs > 0) {
      setInterval(() => this.cleanup(), cleanupIntervalMs).unref();
    }
  }

  get(key: string): T | null {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (entry.expiry <= this.clock()) {
      this.cache.delete(key);
      return null;
    }
    return entry.data;
  }

  set(key: string, data: T, ttlMs: number): void {
    // Evict oldest entry if at capacity
    if (!this.cache.has(key) && this.cache.size >= this.maxSize) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) {
        this.cache.delete(firstKey);
      }
    }

    this.cache.set(key, {
      data,
      expiry: this.clock() + ttlMs,
    });
  }

  private cleanup(): void {
    const now = this.clock();
    let cleaned = 0;
    for (const [key, value] of this.cache) {
      if (value.expiry <= now) {
        this.cache.delete(key);
        cleaned++;
      }
    }
    if (cleaned > 0) {
      logger.debug({ cleaned, remaining: this.cache.size }, 'TTLCache cleanup');
    }
  }
}

// ============ ADAPTIVE THROTTLE ============

export interface AdaptiveThrottleConfig {
  serviceName: string;
  initialIntervalMs: number;
  // Added to the interval on every observed rate limit
  stepMs: number;
  maxIntervalMs: number;
  clock?: Clock;
  sleep?: Sleeper;
}

/**
 * Enforces a minimum gap between outbound calls. The gap only ever grows:
 * each rate-limit response widens it by one step, up to the cap.
 */
export class AdaptiveThrottle {
  private intervalMs: number;
  private lastRequestTime: number | null = null;
  private rateLimitHits = 0;
  private readonly clock: Clock;
  private readonly sleeper: Sleeper;

  constructor(private readonly config: AdaptiveThrottleConfig) {
    this.intervalMs = config.initialIntervalMs;
    this.clock = config.clock ?? Date.now;
    this.sleeper = config.sleep ?? sleep;
  }

  /**
   * Wait until the minimum interval since the previous call has passed
   */
  async wait(): Promise<void> {
    if (this.lastRequestTime !== null) {
      const elapsed = this.clock() - this.lastRequestTime;
      if (elapsed < this.intervalMs) {
        const waitMs = this.intervalMs - elapsed;
        logger.debug({ service: this.config.serviceName, waitMs }, 'Throttling outbound request');
        await this.sleeper(waitMs);
      }
    }
    this.lastRequestTime = this.clock();
  }

  recordRateLimit(): number {
    this.rateLimitHits++;
    this.intervalMs = Math.min(this.config.maxIntervalMs, this.intervalMs + this.config.stepMs);

    logger.warn({
      service: this.config.serviceName,
      intervalMs: this.intervalMs,
      hits: this.rateLimitHits,
    }, 'Rate limit observed, widening request interval');

    return this.intervalMs;
  }

  get currentIntervalMs(): number {
    return this.intervalMs;
  }
}
