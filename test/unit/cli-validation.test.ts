import { describe, it, expect } from 'vitest';
import { validateCliOptions, VALID_PROFILES, VALID_FORMATS } from '../../src/utils/cli-validation.js';

const URL_OK = 'https://example.com/';

describe('validateCliOptions', () => {
  it('returns no errors for an empty option set', () => {
    expect(validateCliOptions(URL_OK, {})).toEqual([]);
  });

  // ─── URL ───────────────────────────────────────────────────────

  describe('<url>', () => {
    it('accepts http and https', () => {
      expect(validateCliOptions('http://localhost:3000', {})).toEqual([]);
      expect(validateCliOptions('https://example.com/docs/', {})).toEqual([]);
    });

    it('rejects other schemes and unparseable input', () => {
      for (const url of ['ftp://example.com/', 'example.com', 'not a url']) {
        const errors = validateCliOptions(url, {});
        expect(errors).toHaveLength(1);
        expect(errors[0].field).toBe('<url>');
        expect(errors[0].message).toBe(`Invalid URL "${url}". Only http and https URLs are supported.`);
      }
    });

    it('skips the URL check when none is given', () => {
      expect(validateCliOptions(undefined, {})).toEqual([]);
    });
  });

  // ─── Profile ───────────────────────────────────────────────────

  describe('--profile', () => {
    it('accepts valid profiles', () => {
      for (const profile of VALID_PROFILES) {
        expect(validateCliOptions(URL_OK, { profile })).toEqual([]);
      }
    });

    it('rejects an unknown profile', () => {
      const errors = validateCliOptions(URL_OK, { profile: 'turbo' });
      expect(errors).toEqual([
        { field: '--profile', message: 'Invalid profile "turbo". Must be one of: quick, standard, deep' },
      ]);
    });
  });

  // ─── Integers ──────────────────────────────────────────────────

  describe('integer options', () => {
    it('accepts valid values', () => {
      const errors = validateCliOptions(URL_OK, {
        maxPages: '500',
        maxDepth: '0',
        maxConcurrent: '4',
        timeout: '10000',
        deadline: '0',
        dailyLlmBudget: '0',
      });
      expect(errors).toEqual([]);
    });

    it('rejects zero where a positive integer is required', () => {
      const errors = validateCliOptions(URL_OK, { maxPages: '0' });
      expect(errors).toEqual([
        { field: '--max-pages', message: 'Invalid value "0" for --max-pages. Must be a positive integer.' },
      ]);
    });

    it('rejects negatives where a non-negative integer is required', () => {
      const errors = validateCliOptions(URL_OK, { maxDepth: '-1' });
      expect(errors).toEqual([
        { field: '--max-depth', message: 'Invalid value "-1" for --max-depth. Must be a non-negative integer.' },
      ]);
    });

    it('rejects fractions and words', () => {
      const errors = validateCliOptions(URL_OK, { maxConcurrent: '2.5', timeout: 'soon' });
      expect(errors.map((e) => e.field)).toEqual(['--max-concurrent', '--timeout']);
    });
  });

  // ─── LLM spacing ───────────────────────────────────────────────

  describe('--llm-spacing', () => {
    it('accepts fractional seconds', () => {
      expect(validateCliOptions(URL_OK, { llmSpacing: '1.5' })).toEqual([]);
    });

    it('rejects negative values', () => {
      const errors = validateCliOptions(URL_OK, { llmSpacing: '-2' });
      expect(errors).toHaveLength(1);
      expect(errors[0].field).toBe('--llm-spacing');
    });
  });

  // ─── Phases ────────────────────────────────────────────────────

  describe('--phases', () => {
    it('accepts known phase names', () => {
      expect(validateCliOptions(URL_OK, { phases: 'sitemap_discovery, recursive_crawl' })).toEqual([]);
    });

    it('names the unknown phases', () => {
      const errors = validateCliOptions(URL_OK, { phases: 'sitemap_discovery,spider,brute' });
      expect(errors).toHaveLength(1);
      expect(errors[0].field).toBe('--phases');
      expect(errors[0].message.startsWith('Unknown phase name(s): spider, brute.')).toBe(true);
    });

    it('rejects an empty list', () => {
      const errors = validateCliOptions(URL_OK, { phases: ' , ' });
      expect(errors).toHaveLength(1);
      expect(errors[0].message.startsWith('Unknown phase name(s): (none given).')).toBe(true);
    });
  });

  // ─── Format ────────────────────────────────────────────────────

  describe('--format', () => {
    it('accepts every valid format together', () => {
      expect(validateCliOptions(URL_OK, { format: VALID_FORMATS.join(',') })).toEqual([]);
    });

    it('rejects unknown formats', () => {
      const errors = validateCliOptions(URL_OK, { format: 'json,html' });
      expect(errors).toEqual([
        { field: '--format', message: 'Unknown format(s): html. Valid formats: terminal, json, txt' },
      ]);
    });
  });

  // ─── Path prefix ───────────────────────────────────────────────

  describe('--path-prefix', () => {
    it('accepts a plain path', () => {
      expect(validateCliOptions(URL_OK, { pathPrefix: '/docs/' })).toEqual([]);
    });

    it('rejects query strings, fragments and whitespace', () => {
      for (const pathPrefix of ['/docs?x=1', '/docs#a', '/my docs']) {
        const errors = validateCliOptions(URL_OK, { pathPrefix });
        expect(errors).toHaveLength(1);
        expect(errors[0].field).toBe('--path-prefix');
      }
    });
  });

  it('collects multiple errors at once', () => {
    const errors = validateCliOptions('ftp://x', { profile: 'nope', maxPages: 'x', format: 'pdf' });
    expect(errors.map((e) => e.field)).toEqual(['<url>', '--profile', '--max-pages', '--format']);
  });
});
