import type { SuggestionProvider } from './client.js';
import { parseJsonResponse } from './client.js';
import type { SuggestionBudget } from './budget.js';
import { fallbackSuggestions } from './fallback.js';
import { normalizePrompt, type AICache } from '../utils/ai-cache.js';
import { log } from '../utils/logger.js';
import { delay, errorMessage } from '../utils/shared.js';
import { SuggestionServiceError } from '../discovery/errors.js';

export type SuggestionOrigin = 'model' | 'cache' | 'fallback';

export interface Suggestion {
  items: string[];
  origin: SuggestionOrigin;
}

export interface SuggestionStats {
  requests: number;
  modelCalls: number;
  cacheHits: number;
  fallbacks: number;
  errors: number;
  budgetRemaining: number;
}

export interface SuggestionServiceOptions {
  provider: SuggestionProvider | null;
  budget: SuggestionBudget;
  /** false turns every request into a fallback without touching the budget */
  enabled?: boolean;
  /** Disk cache behind the in-memory one; null keeps responses in memory only */
  cache?: AICache | null;
  timeoutMs?: number;
  /** Static set returned on any failure */
  fallback?: () => string[];
  signal?: AbortSignal;
  maxItems?: number;
}

export interface SuggestOptions {
  /** Overrides the service-wide fallback for this request */
  fallback?: readonly string[];
}

const ITEM_PATTERN = /^[\p{L}\p{N}][\p{L}\p{N}_.-]*$/u;

/**
 * The only way phases reach the suggestion model.
 *
 * Cache hits are free. Everything else must win a budget reservation and
 * wait for its spacing slot. Any failure (quota, disabled, provider error,
 * timeout, unparseable text) resolves to the fallback list, so callers never
 * see an error and never need to know where the items came from.
 */
export class SuggestionService {
  private readonly provider: SuggestionProvider | null;
  private readonly budget: SuggestionBudget;
  private readonly enabled: boolean;
  private readonly cache: AICache | null;
  private readonly timeoutMs: number;
  private readonly fallback: () => string[];
  private readonly signal?: AbortSignal;
  private readonly maxItems: number;

  private readonly memory = new Map<string, string[]>();
  private readonly inflight = new Map<string, Promise<Suggestion>>();
  private readonly stats = { requests: 0, modelCalls: 0, cacheHits: 0, fallbacks: 0, errors: 0 };

  constructor(options: SuggestionServiceOptions) {
    this.provider = options.provider;
    this.budget = options.budget;
    this.enabled = options.enabled ?? true;
    this.cache = options.cache ?? null;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fallback = options.fallback ?? (() => fallbackSuggestions());
    this.signal = options.signal;
    this.maxItems = options.maxItems ?? 60;
  }

  async suggest(prompt: string, options: SuggestOptions = {}): Promise<Suggestion> {
    this.stats.requests += 1;
    const key = this.keyOf(prompt);

    const remembered = this.memory.get(key);
    if (remembered) {
      this.stats.cacheHits += 1;
      return { items: [...remembered], origin: 'cache' };
    }

    // Identical prompts in flight share one call
    const pending = this.inflight.get(key);
    if (pending) {
      const shared = await pending;
      return { items: [...shared.items], origin: shared.origin };
    }

    const request = this.resolve(key, prompt, options).finally(() => this.inflight.delete(key));
    this.inflight.set(key, request);
    return request;
  }

  getStats(): SuggestionStats {
    return { ...this.stats, budgetRemaining: this.budget.remaining };
  }

  private async resolve(key: string, prompt: string, options: SuggestOptions): Promise<Suggestion> {
    try {
      return await this.query(key, prompt);
    } catch (err) {
      if (err instanceof SuggestionServiceError) {
        if (err.reason !== 'disabled' && err.reason !== 'quota') this.stats.errors += 1;
        log.debug(`Suggestion fallback (${err.reason}): ${err.message}`);
      } else {
        this.stats.errors += 1;
        log.debug(`Suggestion fallback: ${errorMessage(err)}`);
      }
      this.stats.fallbacks += 1;
      return { items: [...(options.fallback ?? this.fallback())], origin: 'fallback' };
    }
  }

  private async query(key: string, prompt: string): Promise<Suggestion> {
    if (this.cache) {
      const stored = await this.cache.get(key);
      const items = stored ? parseSuggestionItems(stored, this.maxItems) : [];
      if (items.length > 0) {
        this.memory.set(key, items);
        this.stats.cacheHits += 1;
        return { items: [...items], origin: 'cache' };
      }
    }

    if (!this.enabled) {
      throw new SuggestionServiceError('Suggestion service disabled', 'disabled');
    }
    if (!this.provider) {
      throw new SuggestionServiceError('No suggestion provider configured', 'disabled');
    }

    const reservation = this.budget.reserve();
    if (!reservation.ok) {
      throw new SuggestionServiceError(`Daily suggestion budget of ${this.budget.dailyLimit} exhausted`, 'quota');
    }

    await delay(reservation.startAt - Date.now(), this.signal);
    if (this.signal?.aborted) {
      throw new SuggestionServiceError('Run cancelled before the model call', 'timeout');
    }

    this.stats.modelCalls += 1;
    const text = await this.callProvider(this.provider, prompt);

    const items = parseSuggestionItems(text, this.maxItems);
    if (items.length === 0) {
      throw new SuggestionServiceError('Model output contained no usable items', 'unparseable');
    }

    this.memory.set(key, items);
    if (this.cache) {
      try {
        await this.cache.set(key, JSON.stringify(items));
      } catch (err) {
        log.debug(`Could not write suggestion cache: ${errorMessage(err)}`);
      }
    }
    return { items: [...items], origin: 'model' };
  }

  private async callProvider(provider: SuggestionProvider, prompt: string): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onRunAbort = (): void => controller.abort();
    this.signal?.addEventListener('abort', onRunAbort, { once: true });

    try {
      return await provider(prompt, controller.signal);
    } catch (err) {
      if (timedOut) {
        throw new SuggestionServiceError(`Model call timed out after ${this.timeoutMs}ms`, 'timeout');
      }
      throw new SuggestionServiceError(`Model call failed: ${errorMessage(err)}`, 'upstream');
    } finally {
      clearTimeout(timer);
      this.signal?.removeEventListener('abort', onRunAbort);
    }
  }

  private keyOf(prompt: string): string {
    if (this.cache) return this.cache.generateKey(prompt);
    return normalizePrompt(prompt);
  }
}

/**
 * Items from model text: a JSON array (or an object holding one), else one
 * item per line or comma. Items are lower-cased, stripped of slashes and list
 * markers, and dropped unless they look like a single path segment.
 */
export function parseSuggestionItems(text: string, maxItems = 60): string[] {
  const parsed = parseJsonResponse(text);
  let raw: unknown[] = [];
  if (Array.isArray(parsed)) {
    raw = parsed;
  } else if (typeof parsed === 'object' && parsed !== null) {
    const list = Object.values(parsed).find((v) => Array.isArray(v));
    if (Array.isArray(list)) raw = list;
  } else {
    raw = text.split(/[\n,]/);
  }

  const items: string[] = [];
  for (const entry of raw) {
    if (typeof entry !== 'string') continue;
    const item = entry
      .trim()
      .toLowerCase()
      .replace(/^(?:[-*•]|\d+[.)])\s+/u, '')
      .replace(/^["'`]+|["'`]+$/g, '')
      .replace(/^\/+|\/+$/g, '');
    if (item.length < 2 || item.length > 60 || !ITEM_PATTERN.test(item)) continue;
    if (!items.includes(item)) items.push(item);
    if (items.length >= maxItems) break;
  }
  return items;
}
