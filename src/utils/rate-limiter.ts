import { delay } from './shared.js';

export interface RateLimiterOptions {
  requestsPerSecond?: number;
  /** Cooldown applied after the first 429/503 when the server sends no Retry-After */
  cooldownMs?: number;
  maxCooldownMs?: number;
  backoffMultiplier?: number;
}

export interface RateLimiterStats {
  totalRequests: number;
  cooldowns: number;
  currentCooldownMs: number;
}

/**
 * Politeness limiter for a single host.
 *
 * - Request starts are spaced at least `1000 / requestsPerSecond` ms apart.
 *   Slots are reserved synchronously, so concurrent callers queue up behind
 *   each other instead of bursting.
 * - A 429/503 response blocks the host for a cooldown (Retry-After when given,
 *   capped at `maxCooldownMs`), and consecutive throttling doubles the
 *   cooldown up to `maxCooldownMs`.
 * - A 2xx response resets the cooldown back to its initial value.
 */
export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly initialCooldownMs: number;
  private readonly maxCooldownMs: number;
  private readonly backoffMultiplier: number;

  private currentCooldownMs: number;
  private nextSlotAt = 0;
  private blockedUntil = 0;
  private totalRequests = 0;
  private cooldowns = 0;

  constructor(options: RateLimiterOptions = {}) {
    const rps = options.requestsPerSecond ?? 10;
    this.minIntervalMs = rps > 0 ? 1000 / rps : 0;
    this.initialCooldownMs = options.cooldownMs ?? 5000;
    this.maxCooldownMs = options.maxCooldownMs ?? 60_000;
    this.backoffMultiplier = options.backoffMultiplier ?? 2;
    this.currentCooldownMs = this.initialCooldownMs;
  }

  /**
   * Call before making a request. Resolves once this caller's slot arrives,
   * or as soon as `signal` aborts.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlotAt, this.blockedUntil);
    this.nextSlotAt = slot + this.minIntervalMs;
    this.totalRequests += 1;

    if (slot > now) {
      await delay(slot - now, signal);
    }
  }

  /**
   * Call after each response.
   * - 429 or 503: block the host for the cooldown, then grow it
   * - 2xx: reset the cooldown
   */
  recordResponse(status: number, retryAfterMs?: number): void {
    if (status === 429 || status === 503) {
      const wait = Math.min(retryAfterMs ?? this.currentCooldownMs, this.maxCooldownMs);
      this.blockedUntil = Math.max(this.blockedUntil, Date.now() + wait);
      this.currentCooldownMs = Math.min(
        this.currentCooldownMs * this.backoffMultiplier,
        this.maxCooldownMs,
      );
      this.cooldowns += 1;
    } else if (status >= 200 && status < 300) {
      this.currentCooldownMs = this.initialCooldownMs;
    }
  }

  /** Milliseconds until the host may be contacted again (0 when free). */
  remainingCooldownMs(): number {
    return Math.max(0, this.blockedUntil - Date.now());
  }

  getStats(): RateLimiterStats {
    return {
      totalRequests: this.totalRequests,
      cooldowns: this.cooldowns,
      currentCooldownMs: this.currentCooldownMs,
    };
  }

  reset(): void {
    this.currentCooldownMs = this.initialCooldownMs;
    this.nextSlotAt = 0;
    this.blockedUntil = 0;
    this.totalRequests = 0;
    this.cooldowns = 0;
  }
}
