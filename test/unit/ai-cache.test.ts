import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AICache, normalizePrompt } from '../../src/utils/ai-cache.js';
import { mkdtempSync, rmSync, existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

vi.mock('../../src/utils/logger.js', () => ({
  log: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

let tempDir: string;
let cache: AICache;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'urlscout-cache-test-'));
  cache = new AICache({ cacheDir: tempDir, ttlMs: 60_000 });
});

afterEach(() => {
  vi.useRealTimers();
  rmSync(tempDir, { recursive: true, force: true });
});

describe('AICache', () => {
  describe('set/get round-trip', () => {
    it('returns the cached value after set', async () => {
      const key = cache.generateKey('keywords for example.com');
      await cache.set(key, '["about","news"]');
      expect(await cache.get(key)).toBe('["about","news"]');
    });

    it('creates the cache directory on first write', async () => {
      const nested = new AICache({ cacheDir: join(tempDir, 'a', 'b') });
      await nested.set('k', 'v');
      expect(existsSync(join(tempDir, 'a', 'b', 'k.json'))).toBe(true);
    });
  });

  describe('expiration', () => {
    it('returns null for expired entries and deletes the file', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2025-01-01T00:00:00Z'));
      const key = cache.generateKey('prompt');
      await cache.set(key, 'value');
      vi.setSystemTime(new Date('2025-01-01T00:01:00.001Z'));
      expect(await cache.get(key)).toBeNull();
      expect(existsSync(join(tempDir, `${key}.json`))).toBe(false);
    });

    it('keeps entries inside their TTL', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2025-01-01T00:00:00Z'));
      const key = cache.generateKey('prompt');
      await cache.set(key, 'value');
      vi.setSystemTime(new Date('2025-01-01T00:00:59Z'));
      expect(await cache.get(key)).toBe('value');
    });
  });

  describe('missing and corrupt entries', () => {
    it('returns null for a missing key', async () => {
      expect(await cache.get('nonexistent')).toBeNull();
    });

    it('returns null for corrupt files', async () => {
      writeFileSync(join(tempDir, 'bad.json'), 'not json');
      writeFileSync(join(tempDir, 'shape.json'), JSON.stringify({ value: 1 }));
      expect(await cache.get('bad')).toBeNull();
      expect(await cache.get('shape')).toBeNull();
    });
  });

  describe('generateKey', () => {
    it('produces a 64-char hex key', () => {
      expect(cache.generateKey('prompt')).toMatch(/^[0-9a-f]{64}$/);
    });

    it('ignores case and whitespace differences', () => {
      expect(cache.generateKey('  Keywords for\n  Example.com ')).toBe(cache.generateKey('keywords for example.com'));
    });

    it('differs for different prompts', () => {
      expect(cache.generateKey('a prompt')).not.toBe(cache.generateKey('another prompt'));
    });
  });
});

describe('normalizePrompt', () => {
  it('trims, collapses whitespace and lower-cases', () => {
    expect(normalizePrompt('  Hello\t\tWORLD \n')).toBe('hello world');
  });
});
