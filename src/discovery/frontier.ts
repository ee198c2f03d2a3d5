import type { CandidateUrl, DiscoverySource, ExpansionKind, ScopeRule, UrlRecord } from './types.js';
import { normalizeUrl } from './normalize.js';
import { isInScope } from '../utils/scope.js';

export interface AdmitResult {
  isNew: boolean;
  record: UrlRecord;
}

export interface FrontierOptions {
  scope: ScopeRule;
  /** Ceiling on in-scope records */
  maxPages: number;
  /** Fired once, when the ceiling is first reached */
  onLimit?: () => void;
  now?: () => Date;
}

export interface FrontierStats {
  inScope: number;
  outOfScope: number;
  refused: number;
  failed: number;
  verified: number;
}

const EXPANSION_KINDS: readonly ExpansionKind[] = ['crawl', 'parent', 'deep'];

/**
 * The deduplicated set of every URL seen in a run, plus one pending queue per
 * expansion kind.
 *
 * All mutation is synchronous. Fetch continuations interleave only at await
 * points, so each admit's check-and-insert runs to completion before any
 * other admit starts: exactly one caller sees a canonical URL as new.
 */
export class Frontier {
  readonly scope: ScopeRule;
  readonly maxPages: number;

  private readonly records = new Map<string, UrlRecord>();
  /** In-scope canonical URLs in admission order; this is the pending queue */
  private readonly order: string[] = [];
  private readonly cursors: Record<ExpansionKind, number> = { crawl: 0, parent: 0, deep: 0 };
  private readonly claimed: Record<ExpansionKind, Set<string>> = {
    crawl: new Set(),
    parent: new Set(),
    deep: new Set(),
  };
  private readonly failed = new Set<string>();
  private readonly onLimit?: () => void;
  private readonly now: () => Date;
  private limitReached = false;
  private refused = 0;
  private outOfScopeCount = 0;

  constructor(options: FrontierOptions) {
    this.scope = options.scope;
    this.maxPages = options.maxPages;
    this.onLimit = options.onLimit;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Canonicalize a candidate and record it.
   *
   * Returns null when the candidate is not a usable http(s) URL, or when it
   * would be a new in-scope record past the page ceiling. Duplicates always
   * get the phase appended to their provenance.
   */
  admit(raw: string, sourceUrl: string, phase: DiscoverySource): AdmitResult | null {
    const url = normalizeUrl(raw, sourceUrl || undefined);
    if (!url) return null;

    const existing = this.records.get(url);
    if (existing) {
      if (!existing.phases.includes(phase)) existing.phases.push(phase);
      return { isNew: false, record: existing };
    }

    const inScope = isInScope(url, this.scope);
    if (inScope && this.order.length >= this.maxPages) {
      this.refused += 1;
      this.reachLimit();
      return null;
    }

    const sourceKey = sourceUrl ? normalizeUrl(sourceUrl) : null;
    const parent = sourceKey ? this.records.get(sourceKey) : undefined;
    const record: UrlRecord = {
      url,
      phases: [phase],
      firstSeenAt: this.now().toISOString(),
      inScope,
      depth: phase === 'seed' ? 0 : parent ? parent.depth + 1 : 1,
      sourceUrl,
    };
    this.records.set(url, record);

    if (inScope) {
      this.order.push(url);
      if (this.order.length >= this.maxPages) this.reachLimit();
    } else {
      this.outOfScopeCount += 1;
    }

    return { isNew: true, record };
  }

  admitCandidate(candidate: CandidateUrl): AdmitResult | null {
    return this.admit(candidate.raw, candidate.sourceUrl, candidate.phase);
  }

  /**
   * Dequeue up to `max` in-scope records not yet dispatched for `kind`.
   * A record is handed out at most once per kind over the whole run.
   */
  takePending(kind: ExpansionKind, max = Number.POSITIVE_INFINITY): UrlRecord[] {
    const batch: UrlRecord[] = [];
    while (this.cursors[kind] < this.order.length && batch.length < max) {
      const url = this.order[this.cursors[kind]];
      this.cursors[kind] += 1;
      if (this.failed.has(url) || this.claimed[kind].has(url)) continue;
      const record = this.records.get(url);
      if (!record) continue;
      this.claimed[kind].add(url);
      batch.push(record);
    }
    return batch;
  }

  hasPending(kind: ExpansionKind): boolean {
    return this.cursors[kind] < this.order.length;
  }

  /**
   * Claim a URL for an expansion kind outside the queue (e.g. a parent
   * directory that is not a record yet). Returns false when it was already
   * claimed or has failed permanently.
   */
  claim(url: string, kind: ExpansionKind): boolean {
    const key = normalizeUrl(url);
    if (!key || this.failed.has(key) || this.claimed[kind].has(key)) return false;
    this.claimed[kind].add(key);
    return true;
  }

  markExpanded(url: string, kind: ExpansionKind): void {
    this.claim(url, kind);
  }

  isExpanded(url: string, kind: ExpansionKind): boolean {
    const key = normalizeUrl(url);
    return key !== null && this.claimed[kind].has(key);
  }

  markVerified(url: string, status: number): void {
    const key = normalizeUrl(url);
    const record = key ? this.records.get(key) : undefined;
    if (record) record.status = status;
  }

  /** Permanently failed URLs are excluded from every further expansion. */
  markFailed(url: string): void {
    const key = normalizeUrl(url);
    if (!key) return;
    this.failed.add(key);
    for (const kind of EXPANSION_KINDS) this.claimed[kind].add(key);
  }

  isFailed(url: string): boolean {
    const key = normalizeUrl(url);
    return key !== null && this.failed.has(key);
  }

  has(url: string): boolean {
    const key = normalizeUrl(url);
    return key !== null && this.records.has(key);
  }

  get(url: string): UrlRecord | undefined {
    const key = normalizeUrl(url);
    return key ? this.records.get(key) : undefined;
  }

  get size(): number {
    return this.order.length;
  }

  get isFull(): boolean {
    return this.order.length >= this.maxPages;
  }

  /** In-scope records in admission order (live objects). */
  inScopeRecords(): UrlRecord[] {
    const out: UrlRecord[] = [];
    for (const url of this.order) {
      const record = this.records.get(url);
      if (record) out.push(record);
    }
    return out;
  }

  /** Detached copies of the in-scope records, for the final result. */
  snapshot(): UrlRecord[] {
    return this.inScopeRecords().map((r) => ({ ...r, phases: [...r.phases] }));
  }

  getStats(): FrontierStats {
    let verified = 0;
    for (const url of this.order) {
      if (this.records.get(url)?.status !== undefined) verified += 1;
    }
    return {
      inScope: this.order.length,
      outOfScope: this.outOfScopeCount,
      refused: this.refused,
      failed: this.failed.size,
      verified,
    };
  }

  /**
   * Throws when the queue and the record map disagree: a duplicate key, a
   * queued URL without a record, or an out-of-scope URL in the queue.
   */
  verifyIntegrity(): void {
    const seen = new Set<string>();
    for (const url of this.order) {
      if (seen.has(url)) throw new Error(`Frontier holds ${url} twice`);
      seen.add(url);
      const record = this.records.get(url);
      if (!record) throw new Error(`Frontier queue references missing record ${url}`);
      if (!record.inScope || !isInScope(url, this.scope)) {
        throw new Error(`Frontier queue holds out-of-scope URL ${url}`);
      }
      if (new Set(record.phases).size !== record.phases.length) {
        throw new Error(`Record ${url} has duplicate provenance entries`);
      }
    }
  }

  private reachLimit(): void {
    if (this.limitReached) return;
    this.limitReached = true;
    this.onLimit?.();
  }
}
