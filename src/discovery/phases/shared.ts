import { randomBytes } from 'node:crypto';
import type { FetchOptions, FetchResponse } from '../../crawler/fetcher.js';
import type { Suggestion, SuggestOptions } from '../../ai/suggestions.js';
import { FetchError, HostUnreachableError, type ParseError } from '../errors.js';
import type { AdmitResult } from '../frontier.js';
import type { DiscoverySource, PhaseContext, PhaseName, PhaseStats, PhaseStatus } from '../types.js';
import { log } from '../../utils/logger.js';

/**
 * Per-phase bookkeeping. Every admit and fetch a phase makes goes through its
 * recorder so the returned stats are complete.
 */
export class PhaseRecorder {
  private readonly started = Date.now();
  private readonly requestsAtStart: number;
  private readonly suggestionErrorsAtStart: number;
  private readonly stats: PhaseStats;
  private networkFailures = 0;
  private responses = 0;

  constructor(
    readonly phase: PhaseName,
    private readonly ctx: PhaseContext,
  ) {
    this.requestsAtStart = ctx.fetcher.getStats().requests;
    this.suggestionErrorsAtStart = ctx.suggestions.getStats().errors;
    this.stats = {
      phase,
      status: 'completed',
      admitted: 0,
      duplicates: 0,
      outOfScope: 0,
      invalid: 0,
      requests: 0,
      errors: { transient: 0, permanent: 0, parse: 0, suggestion: 0 },
      durationMs: 0,
    };
  }

  /** Admit a candidate under this phase's tag (or `source` when given). */
  admit(raw: string, sourceUrl: string, source: DiscoverySource = this.phase): AdmitResult | null {
    const result = this.ctx.frontier.admit(raw, sourceUrl, source);
    if (!result) {
      if (!this.ctx.frontier.isFull) this.stats.invalid += 1;
      return null;
    }
    if (!result.isNew) this.stats.duplicates += 1;
    else if (result.record.inScope) this.stats.admitted += 1;
    else this.stats.outOfScope += 1;
    return result;
  }

  admitAll(raws: Iterable<string>, sourceUrl: string): number {
    let admitted = 0;
    for (const raw of raws) {
      if (this.stopped) break;
      const result = this.admit(raw, sourceUrl);
      if (result?.isNew && result.record.inScope) admitted += 1;
    }
    return admitted;
  }

  async fetch(url: string, options?: FetchOptions): Promise<FetchResponse | FetchError> {
    const result = await this.ctx.fetcher.fetch(url, options);
    if (result instanceof FetchError) {
      this.recordError(result);
    } else {
      this.responses += 1;
    }
    return result;
  }

  recordError(error: FetchError): void {
    if (error.code === 'cancelled') return;
    if (error.transient) this.stats.errors.transient += 1;
    else this.stats.errors.permanent += 1;
    if (error.code === 'timeout' || error.code === 'network' || error.code === 'dns') {
      this.networkFailures += 1;
    } else {
      // an HTTP error status still proves the host answered
      this.responses += 1;
    }
  }

  parseErrors(errors: readonly ParseError[]): void {
    for (const error of errors) log.debug(`${error.message} (${error.documentUrl})`);
    this.stats.errors.parse += errors.length;
  }

  suggest(prompt: string, options?: SuggestOptions): Promise<Suggestion> {
    return this.ctx.suggestions.suggest(prompt, options);
  }

  /** Every request this phase made failed before the host answered. */
  get hostUnreachable(): boolean {
    return this.networkFailures > 0 && this.responses === 0;
  }

  /** Throws HostUnreachableError when no request of this phase got an answer. */
  assertReachable(): void {
    if (this.hostUnreachable) {
      throw new HostUnreachableError(this.ctx.scope.host, this.networkFailures);
    }
  }

  /** Page ceiling reached or run cancelled: stop scheduling work. */
  get stopped(): boolean {
    return this.ctx.signal.aborted || this.ctx.frontier.isFull;
  }

  get admitted(): number {
    return this.stats.admitted;
  }

  finish(status: PhaseStatus = 'completed', error?: string): PhaseStats {
    return {
      ...this.stats,
      status: this.ctx.signal.aborted && status === 'completed' ? 'cancelled' : status,
      requests: this.ctx.fetcher.getStats().requests - this.requestsAtStart,
      errors: {
        ...this.stats.errors,
        suggestion: this.ctx.suggestions.getStats().errors - this.suggestionErrorsAtStart,
      },
      durationMs: Date.now() - this.started,
      ...(error ? { error } : {}),
    };
  }
}

/** Origin of the scope root plus its path prefix, e.g. "https://example.com/docs/". */
export function scopeRoot(ctx: PhaseContext): string {
  return new URL(ctx.scope.pathPrefix, ctx.scope.baseUrl).href;
}

export function origin(ctx: PhaseContext): string {
  return new URL(ctx.scope.baseUrl).origin;
}

export interface Soft404Baseline {
  finalPath: string;
  length: number;
}

/**
 * Request a path that cannot exist. A site that answers it with a success
 * serves soft 404s, and probe responses resembling this one are rejected.
 */
export async function soft404Baseline(rec: PhaseRecorder, ctx: PhaseContext): Promise<Soft404Baseline | null> {
  const token = randomBytes(6).toString('hex');
  const probeUrl = new URL(`urlscout-${token}-missing/`, scopeRoot(ctx)).href;
  const response = await rec.fetch(probeUrl);
  if (response instanceof FetchError) return null;
  return { finalPath: new URL(response.finalUrl).pathname, length: response.body.length };
}

export interface ProbeResult {
  exists: boolean;
  status?: number;
}

/** Statuses that prove a resource exists even though access is denied */
const GUARDED_STATUSES = new Set([401, 403]);

/**
 * Existence check. Without a soft-404 baseline a HEAD is enough (GET when the
 * server rejects HEAD); with one, the body is compared against the baseline.
 */
export async function probeExists(
  rec: PhaseRecorder,
  url: string,
  baseline: Soft404Baseline | null,
): Promise<ProbeResult> {
  let response = await rec.fetch(url, { method: baseline ? 'GET' : 'HEAD' });
  if (!baseline && response instanceof FetchError && (response.status === 405 || response.status === 501)) {
    response = await rec.fetch(url);
  }

  if (response instanceof FetchError) {
    const status = response.status;
    return status !== undefined && GUARDED_STATUSES.has(status) ? { exists: true, status } : { exists: false, status };
  }

  if (baseline && resemblesBaseline(url, response, baseline)) {
    return { exists: false, status: response.status };
  }
  return { exists: true, status: response.status };
}

function resemblesBaseline(url: string, response: FetchResponse, baseline: Soft404Baseline): boolean {
  const requestedPath = new URL(url).pathname;
  const finalPath = new URL(response.finalUrl).pathname;
  // Redirected to the same catch-all page the missing path landed on
  if (finalPath !== requestedPath && finalPath === baseline.finalPath) return true;
  const tolerance = Math.max(64, baseline.length * 0.05);
  return Math.abs(response.body.length - baseline.length) <= tolerance;
}

/**
 * Run `task` over `items` on `lanes` concurrent workers. Workers stop picking
 * up items once the phase is stopped.
 */
export async function forEachUntilStopped<T>(
  rec: PhaseRecorder,
  items: readonly T[],
  lanes: number,
  task: (item: T) => Promise<void>,
): Promise<void> {
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length && !rec.stopped) {
      const item = items[next];
      next += 1;
      await task(item);
    }
  };
  const count = Math.max(1, Math.min(lanes, items.length));
  await Promise.all(Array.from({ length: count }, () => worker()));
}
