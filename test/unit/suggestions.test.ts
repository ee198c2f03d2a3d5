import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SuggestionService, parseSuggestionItems } from '../../src/ai/suggestions.js';
import { SuggestionBudget } from '../../src/ai/budget.js';
import { fallbackSuggestions } from '../../src/ai/fallback.js';
import type { SuggestionProvider } from '../../src/ai/client.js';
import { AICache } from '../../src/utils/ai-cache.js';

vi.mock('../../src/utils/logger.js', () => ({
  log: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const FALLBACK = ['about', 'contact'];

function budget(dailyLimit = 10): SuggestionBudget {
  return new SuggestionBudget({ dailyLimit, minSpacingMs: 0 });
}

function service(provider: SuggestionProvider | null, extra: Partial<ConstructorParameters<typeof SuggestionService>[0]> = {}): SuggestionService {
  return new SuggestionService({ provider, budget: budget(), fallback: () => FALLBACK, ...extra });
}

describe('SuggestionService', () => {
  it('returns parsed model items', async () => {
    const provider = vi.fn<SuggestionProvider>(async () => '["Admin", "/docs/", "news"]');
    const svc = service(provider);
    expect(await svc.suggest('keywords please')).toEqual({ items: ['admin', 'docs', 'news'], origin: 'model' });
    expect(svc.getStats()).toEqual({
      requests: 1,
      modelCalls: 1,
      cacheHits: 0,
      fallbacks: 0,
      errors: 0,
      budgetRemaining: 9,
    });
  });

  it('answers a repeated prompt from memory', async () => {
    const provider = vi.fn<SuggestionProvider>(async () => '["news"]');
    const svc = service(provider);
    await svc.suggest('Keywords  please');
    expect(await svc.suggest('keywords please')).toEqual({ items: ['news'], origin: 'cache' });
    expect(provider).toHaveBeenCalledTimes(1);
    expect(svc.getStats().cacheHits).toBe(1);
  });

  it('shares one call between identical prompts in flight', async () => {
    const provider = vi.fn<SuggestionProvider>(async () => '["news"]');
    const svc = service(provider);
    const [a, b] = await Promise.all([svc.suggest('same'), svc.suggest('same')]);
    expect(a.items).toEqual(['news']);
    expect(b.items).toEqual(['news']);
    expect(provider).toHaveBeenCalledTimes(1);
  });

  it('makes at most the budgeted number of model calls and falls back for the rest', async () => {
    const provider = vi.fn<SuggestionProvider>(async (prompt) => `["${prompt}"]`);
    const svc = new SuggestionService({ provider, budget: budget(2), fallback: () => FALLBACK });
    const results = await Promise.all(['p1', 'p2', 'p3', 'p4', 'p5'].map((p) => svc.suggest(p)));

    expect(provider).toHaveBeenCalledTimes(2);
    expect(results.filter((r) => r.origin === 'model')).toHaveLength(2);
    expect(results.filter((r) => r.origin === 'fallback').map((r) => r.items)).toEqual([FALLBACK, FALLBACK, FALLBACK]);
    expect(svc.getStats()).toEqual({
      requests: 5,
      modelCalls: 2,
      cacheHits: 0,
      fallbacks: 3,
      errors: 0,
      budgetRemaining: 0,
    });
  });

  it('falls back without touching the budget when disabled', async () => {
    const provider = vi.fn<SuggestionProvider>(async () => '["news"]');
    const svc = service(provider, { enabled: false });
    expect(await svc.suggest('prompt')).toEqual({ items: FALLBACK, origin: 'fallback' });
    expect(provider).not.toHaveBeenCalled();
    expect(svc.getStats().budgetRemaining).toBe(10);
    expect(svc.getStats().errors).toBe(0);
  });

  it('falls back when no provider is configured', async () => {
    expect(await service(null).suggest('prompt')).toEqual({ items: FALLBACK, origin: 'fallback' });
  });

  it('falls back and counts an error when the provider rejects', async () => {
    const svc = service(async () => {
      throw new Error('upstream 500');
    });
    expect(await svc.suggest('prompt')).toEqual({ items: FALLBACK, origin: 'fallback' });
    expect(svc.getStats().errors).toBe(1);
    expect(svc.getStats().fallbacks).toBe(1);
  });

  it('falls back when the reply has no usable items', async () => {
    const svc = service(async () => 'I cannot help with that.');
    expect(await svc.suggest('prompt')).toEqual({ items: FALLBACK, origin: 'fallback' });
    expect(svc.getStats().errors).toBe(1);
  });

  it('falls back when the provider times out', async () => {
    const slow: SuggestionProvider = (_prompt, signal) => new Promise((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(new Error('aborted')));
    });
    const svc = service(slow, { timeoutMs: 20 });
    expect(await svc.suggest('prompt')).toEqual({ items: FALLBACK, origin: 'fallback' });
  });

  it('uses a per-request fallback when given', async () => {
    expect(await service(null).suggest('prompt', { fallback: ['admin'] })).toEqual({ items: ['admin'], origin: 'fallback' });
  });

  it('returns copies the caller may mutate', async () => {
    const svc = service(async () => '["news"]');
    const first = await svc.suggest('prompt');
    first.items.push('mutated');
    expect((await svc.suggest('prompt')).items).toEqual(['news']);
  });

  describe('disk cache', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'urlscout-suggest-test-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('serves a later run from the disk cache', async () => {
      const cache = new AICache({ cacheDir: dir });
      await service(async () => '["events"]', { cache }).suggest('prompt');

      const failing = vi.fn<SuggestionProvider>(async () => {
        throw new Error('should not be called');
      });
      const later = service(failing, { cache: new AICache({ cacheDir: dir }) });
      expect(await later.suggest('prompt')).toEqual({ items: ['events'], origin: 'cache' });
      expect(failing).not.toHaveBeenCalled();
    });
  });
});

describe('parseSuggestionItems', () => {
  it('reads a JSON array inside a code block', () => {
    expect(parseSuggestionItems('```json\n["about", "Contact-Us", "/news/"]\n```')).toEqual(['about', 'contact-us', 'news']);
  });

  it('reads the first array of a JSON object', () => {
    expect(parseSuggestionItems('{"keywords": ["a1", "b2"]}')).toEqual(['a1', 'b2']);
  });

  it('reads list lines and comma-separated text', () => {
    expect(parseSuggestionItems('1. about\n2) contact\n- news\n* events')).toEqual(['about', 'contact', 'news', 'events']);
    expect(parseSuggestionItems('about, contact')).toEqual(['about', 'contact']);
  });

  it('drops short, long, spaced, non-string and duplicate items', () => {
    const text = JSON.stringify(['a', 'ok', 'has space', 'x'.repeat(61), 5, 'ok']);
    expect(parseSuggestionItems(text)).toEqual(['ok']);
  });

  it('keeps non-latin path segments', () => {
    expect(parseSuggestionItems('["会社概要"]')).toEqual(['会社概要']);
  });

  it('caps the number of items', () => {
    expect(parseSuggestionItems('["aa", "bb", "cc"]', 2)).toEqual(['aa', 'bb']);
  });
});

describe('fallbackSuggestions', () => {
  it('adds the meaningful labels of the site domain', () => {
    const items = fallbackSuggestions('https://www.city-library.example.co.uk/');
    expect(items).toContain('city-library');
    expect(items).toContain('example');
    expect(items).not.toContain('uk');
    expect(items).not.toContain('www');
  });

  it('is the static list without a base URL', () => {
    const items = fallbackSuggestions();
    expect(items.length).toBeGreaterThan(0);
    expect(new Set(items).size).toBe(items.length);
  });
});
