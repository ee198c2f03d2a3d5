import { HostRateLimiter } from '../utils/host-rate-limiter.js';
import { WorkerPool } from '../utils/pool.js';
import { delay, errorMessage, hostOf } from '../utils/shared.js';
import type { RequestLogEntry } from '../utils/request-logger.js';
import { log } from '../utils/logger.js';
import {
  FetchError,
  PermanentFetchError,
  TransientFetchError,
  type FetchErrorCode,
} from '../discovery/errors.js';

export type FetchImpl = (url: string, init: RequestInit) => Promise<Response>;

export type FetchMethod = 'GET' | 'HEAD' | 'POST';

export interface FetchOptions {
  method?: FetchMethod;
  timeoutMs?: number;
  headers?: Record<string, string>;
  body?: string;
}

export interface FetchResponse {
  url: string;
  /** URL after redirects */
  finalUrl: string;
  status: number;
  headers: Record<string, string>;
  contentType: string;
  body: string;
}

export interface HostFetchStats {
  requests: number;
  retried: number;
  failures: number;
}

export interface FetchStats extends HostFetchStats {
  cooldowns: number;
  peakConcurrency: number;
  byHost: Record<string, HostFetchStats>;
}

export interface FetcherOptions {
  maxConcurrent: number;
  requestsPerSecond?: number;
  /** Per-host-pattern overrides, see HostRateLimiter */
  rateLimits?: Record<string, number>;
  retries?: number;
  backoffMs?: number;
  cooldownMs?: number;
  /** Upper bound on any host cooldown, Retry-After included */
  maxCooldownMs?: number;
  timeoutMs?: number;
  userAgent?: string;
  /** Bodies longer than this are truncated */
  maxBodyChars?: number;
  fetchImpl?: FetchImpl;
  /** Run-wide cancellation */
  signal?: AbortSignal;
  onRequest?: (entry: RequestLogEntry) => void;
}

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; urlscout/0.4; +https://www.npmjs.com/package/urlscout)';

const DNS_ERROR_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME', 'EAI_FAIL']);

type AttemptOutcome =
  | { ok: true; response: FetchResponse }
  | { ok: false; error: FetchError; retryable: boolean };

/**
 * Rate-limited HTTP client shared by every phase.
 *
 * Never throws: a failed request resolves to a FetchError. Transient failures
 * are retried with exponential backoff; a 429 also puts the host in cooldown.
 */
export class Fetcher {
  private readonly pool: WorkerPool;
  private readonly limiter: HostRateLimiter;
  private readonly retries: number;
  private readonly backoffMs: number;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly maxBodyChars: number;
  private readonly fetchImpl: FetchImpl;
  private readonly signal?: AbortSignal;
  private readonly onRequest?: (entry: RequestLogEntry) => void;

  private readonly totals: HostFetchStats = { requests: 0, retried: 0, failures: 0 };
  private readonly hosts = new Map<string, HostFetchStats>();

  constructor(options: FetcherOptions) {
    this.pool = new WorkerPool(options.maxConcurrent);
    this.limiter = new HostRateLimiter(
      { default: options.requestsPerSecond ?? 10, ...options.rateLimits },
      { cooldownMs: options.cooldownMs ?? 5000, maxCooldownMs: options.maxCooldownMs },
    );
    this.retries = options.retries ?? 2;
    this.backoffMs = options.backoffMs ?? 500;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.maxBodyChars = options.maxBodyChars ?? 5_000_000;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.signal = options.signal;
    this.onRequest = options.onRequest;
  }

  get cancelled(): boolean {
    return this.signal?.aborted ?? false;
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResponse | FetchError> {
    const host = hostOf(url);
    if (!host) {
      return new PermanentFetchError(`Invalid URL: ${url}`, url, 'network');
    }
    const hostStats = this.statsFor(host);

    let attempt = 0;
    for (;;) {
      if (this.cancelled) {
        return this.finish(hostStats, attempt, new TransientFetchError('Run cancelled', url, 'cancelled', undefined, attempt));
      }

      attempt += 1;
      // The host slot is taken once a pool slot is held, so time spent queued
      // for the pool never counts toward the host's spacing or cooldown.
      const outcome = await this.pool.run(async () => {
        await this.limiter.acquire(url, this.signal);
        if (this.cancelled) return null;
        return this.attempt(url, options, attempt);
      });
      if (!outcome) {
        return this.finish(hostStats, attempt - 1, new TransientFetchError('Run cancelled', url, 'cancelled', undefined, attempt - 1));
      }
      hostStats.requests += 1;
      this.totals.requests += 1;

      if (outcome.ok) {
        return this.finish(hostStats, attempt, outcome.response);
      }
      if (!outcome.retryable || attempt > this.retries || this.cancelled) {
        return this.finish(hostStats, attempt, outcome.error);
      }

      const wait = this.backoffMs * 2 ** (attempt - 1);
      log.debug(`Retrying ${url} in ${wait}ms (${outcome.error.code}, attempt ${attempt})`);
      await delay(wait, this.signal);
    }
  }

  getStats(): FetchStats {
    const byHost: Record<string, HostFetchStats> = {};
    for (const [host, stats] of this.hosts) byHost[host] = { ...stats };
    let cooldowns = 0;
    for (const stats of Object.values(this.limiter.getStats())) cooldowns += stats.cooldowns;
    return { ...this.totals, cooldowns, peakConcurrency: this.pool.peakActive, byHost };
  }

  private finish<T extends FetchResponse | FetchError>(stats: HostFetchStats, attempts: number, result: T): T {
    if (attempts > 1) {
      stats.retried += 1;
      this.totals.retried += 1;
    }
    if (result instanceof FetchError) {
      stats.failures += 1;
      this.totals.failures += 1;
    }
    return result;
  }

  private async attempt(url: string, options: FetchOptions, attempt: number): Promise<AttemptOutcome> {
    const method = options.method ?? 'GET';
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const started = Date.now();

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onRunAbort = (): void => controller.abort();
    this.signal?.addEventListener('abort', onRunAbort, { once: true });

    const record = (status?: number, error?: string): void => {
      this.onRequest?.({
        timestamp: new Date(started).toISOString(),
        method,
        url,
        attempt,
        status,
        error,
        durationMs: Date.now() - started,
      });
    };

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: { 'User-Agent': this.userAgent, Accept: '*/*', ...options.headers },
        body: options.body,
        redirect: 'follow',
        signal: controller.signal,
      });
      const body = method === 'HEAD' ? '' : (await response.text()).slice(0, this.maxBodyChars);
      const status = response.status;
      record(status);

      this.limiter.recordResponse(url, status, parseRetryAfter(response.headers.get('retry-after')));

      if (status === 429) {
        return {
          ok: false,
          retryable: true,
          error: new TransientFetchError(`Rate limited by ${url}`, url, 'rate-limited', status, attempt),
        };
      }
      if (status >= 500) {
        return {
          ok: false,
          retryable: true,
          error: new TransientFetchError(`HTTP ${status} from ${url}`, url, 'http', status, attempt),
        };
      }
      if (status >= 400) {
        return {
          ok: false,
          retryable: false,
          error: new PermanentFetchError(`HTTP ${status} from ${url}`, url, 'http', status, attempt),
        };
      }

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });
      return {
        ok: true,
        response: {
          url,
          finalUrl: response.url || url,
          status,
          headers,
          contentType: headers['content-type'] ?? '',
          body,
        },
      };
    } catch (err) {
      const code = classifyThrown(err, timedOut, this.cancelled);
      record(undefined, code);
      const message = `${code} fetching ${url}: ${errorMessage(err)}`;
      if (code === 'dns') {
        return { ok: false, retryable: false, error: new PermanentFetchError(message, url, code, undefined, attempt) };
      }
      return {
        ok: false,
        retryable: code !== 'cancelled',
        error: new TransientFetchError(message, url, code, undefined, attempt),
      };
    } finally {
      clearTimeout(timer);
      this.signal?.removeEventListener('abort', onRunAbort);
    }
  }

  private statsFor(host: string): HostFetchStats {
    let stats = this.hosts.get(host);
    if (!stats) {
      stats = { requests: 0, retried: 0, failures: 0 };
      this.hosts.set(host, stats);
    }
    return stats;
  }
}

/** Retry-After as milliseconds; accepts delta-seconds or an HTTP date. */
export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return parseInt(trimmed, 10) * 1000;
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - Date.now());
}

function classifyThrown(err: unknown, timedOut: boolean, cancelled: boolean): FetchErrorCode {
  if (cancelled) return 'cancelled';
  if (timedOut) return 'timeout';
  const code = systemErrorCode(err);
  if (code && DNS_ERROR_CODES.has(code)) return 'dns';
  return 'network';
}

/** Node puts the socket error code on `cause` for fetch failures. */
function systemErrorCode(err: unknown): string | undefined {
  if (!(err instanceof Error)) return undefined;
  const cause = err.cause;
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  if ('code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

export function isFetchError(value: FetchResponse | FetchError): value is FetchError {
  return value instanceof FetchError;
}
