import { RateLimiter, type RateLimiterOptions, type RateLimiterStats } from './rate-limiter.js';

/**
 * One politeness limiter per host, with per-host rate overrides.
 *
 * Config format in .urlscoutrc.json:
 * ```json
 * {
 *   "rate_limits": {
 *     "*.example.com": 2,
 *     "static.example.org": 20,
 *     "default": 5
 *   }
 * }
 * ```
 *
 * Pattern matching:
 * - Exact host match: "api.example.com" matches only api.example.com
 * - Wildcard prefix: "*.example.com" matches foo.example.com, bar.baz.example.com
 * - "default" key: fallback for unmatched hosts
 */
export class HostRateLimiter {
  private readonly hostPatterns: Map<string, number>;
  private readonly defaultRps: number;
  private readonly limiters = new Map<string, RateLimiter>();
  private readonly baseOptions: Omit<RateLimiterOptions, 'requestsPerSecond'>;

  constructor(
    rateLimits: Record<string, number> = {},
    baseOptions: Omit<RateLimiterOptions, 'requestsPerSecond'> = {},
  ) {
    this.hostPatterns = new Map();
    this.baseOptions = baseOptions;
    this.defaultRps = rateLimits['default'] ?? 10;

    for (const [pattern, rps] of Object.entries(rateLimits)) {
      if (pattern !== 'default') {
        this.hostPatterns.set(pattern.toLowerCase(), rps);
      }
    }
  }

  /** Requests per second allowed for the URL's host. */
  getRateLimit(url: string): number {
    const hostname = this.extractHostname(url);
    if (!hostname) return this.defaultRps;

    const exactMatch = this.hostPatterns.get(hostname);
    if (exactMatch !== undefined) return exactMatch;

    for (const [pattern, rps] of this.hostPatterns) {
      if (pattern.startsWith('*.')) {
        const suffix = pattern.slice(1); // ".example.com"
        if (hostname.endsWith(suffix) && hostname !== suffix.slice(1)) {
          return rps;
        }
      }
    }

    return this.defaultRps;
  }

  /** Get (or create) the limiter that owns the URL's host. */
  getLimiter(url: string): RateLimiter {
    const key = this.extractHostname(url) ?? '';

    let limiter = this.limiters.get(key);
    if (!limiter) {
      limiter = new RateLimiter({
        ...this.baseOptions,
        requestsPerSecond: this.getRateLimit(url),
      });
      this.limiters.set(key, limiter);
    }

    return limiter;
  }

  async acquire(url: string, signal?: AbortSignal): Promise<void> {
    await this.getLimiter(url).acquire(signal);
  }

  recordResponse(url: string, status: number, retryAfterMs?: number): void {
    this.getLimiter(url).recordResponse(status, retryAfterMs);
  }

  getDefaultRps(): number {
    return this.defaultRps;
  }

  /** Per-host limiter stats, keyed by hostname. */
  getStats(): Record<string, RateLimiterStats> {
    const stats: Record<string, RateLimiterStats> = {};
    for (const [host, limiter] of this.limiters) {
      stats[host] = limiter.getStats();
    }
    return stats;
  }

  private extractHostname(url: string): string | null {
    try {
      return new URL(url).hostname.toLowerCase();
    } catch {
      return null;
    }
  }
}
