import { describe, it, expect } from 'vitest';
import {
  registrableDomain,
  parseHostPatterns,
  normalizePathPrefix,
  buildScopeRule,
  pathMatchesPrefix,
  isInScope,
  matchesGlob,
} from '../../src/utils/scope.js';

describe('registrableDomain', () => {
  it('keeps the last two labels for ordinary suffixes', () => {
    expect(registrableDomain('news.example.com')).toBe('example.com');
    expect(registrableDomain('Example.COM')).toBe('example.com');
  });

  it('keeps three labels for two-label public suffixes', () => {
    expect(registrableDomain('www.city.example.co.uk')).toBe('example.co.uk');
    expect(registrableDomain('shop.example.com.ar')).toBe('example.com.ar');
    expect(registrableDomain('blog.example.com.au')).toBe('example.com.au');
  });

  it('treats private suffixes as public ones', () => {
    expect(registrableDomain('alice.github.io')).toBe('alice.github.io');
    expect(registrableDomain('docs.alice.github.io')).toBe('alice.github.io');
  });

  it('returns IP addresses and single-label hosts unchanged', () => {
    expect(registrableDomain('192.168.0.1')).toBe('192.168.0.1');
    expect(registrableDomain('localhost')).toBe('localhost');
  });
});

describe('parseHostPatterns', () => {
  it('splits, trims, lower-cases and drops a leading "-"', () => {
    expect(parseHostPatterns(' cdn.example.com, -Admin.example.com ,,')).toEqual([
      'cdn.example.com',
      'admin.example.com',
    ]);
  });

  it('handles empty input', () => {
    expect(parseHostPatterns('')).toEqual([]);
  });
});

describe('normalizePathPrefix', () => {
  it('produces "/segment/" form', () => {
    expect(normalizePathPrefix('docs')).toBe('/docs/');
    expect(normalizePathPrefix('/docs')).toBe('/docs/');
    expect(normalizePathPrefix('/docs/')).toBe('/docs/');
    expect(normalizePathPrefix('')).toBe('/');
    expect(normalizePathPrefix(undefined)).toBe('/');
  });
});

describe('pathMatchesPrefix', () => {
  it('matches whole segments only', () => {
    expect(pathMatchesPrefix('/docs', '/docs/')).toBe(true);
    expect(pathMatchesPrefix('/docs/x', '/docs/')).toBe(true);
    expect(pathMatchesPrefix('/docsets', '/docs/')).toBe(false);
    expect(pathMatchesPrefix('/anything', '/')).toBe(true);
  });
});

describe('buildScopeRule', () => {
  it('derives host, registrable domain and prefix', () => {
    const rule = buildScopeRule('https://www.example.com/docs/intro', { pathPrefix: '/docs' });
    expect(rule.host).toBe('www.example.com');
    expect(rule.registrableDomain).toBe('example.com');
    expect(rule.pathPrefix).toBe('/docs/');
    expect(Object.isFrozen(rule)).toBe(true);
  });

  it('throws when the base URL is outside its own path prefix', () => {
    expect(() => buildScopeRule('https://example.com/blog', { pathPrefix: '/docs' })).toThrow(RangeError);
  });

  it('throws on an unparseable base URL', () => {
    expect(() => buildScopeRule('not a url')).toThrow();
  });

  it('includePdfs moves .pdf from the deny list to the allow list', () => {
    const rule = buildScopeRule('https://example.com/', { includePdfs: true });
    expect(rule.allowExtensions).toContain('.pdf');
    expect(rule.denyExtensions).not.toContain('.pdf');
  });
});

describe('isInScope', () => {
  const scope = buildScopeRule('https://www.example.com/');

  it('accepts any host sharing the registrable domain', () => {
    expect(isInScope('https://www.example.com/a', scope)).toBe(true);
    expect(isInScope('https://blog.example.com/x', scope)).toBe(true);
    expect(isInScope('http://example.com/', scope)).toBe(true);
  });

  it('rejects other domains and non-http schemes', () => {
    expect(isInScope('https://example.org/', scope)).toBe(false);
    expect(isInScope('https://notexample.com/', scope)).toBe(false);
    expect(isInScope('ftp://www.example.com/', scope)).toBe(false);
    expect(isInScope('garbage', scope)).toBe(false);
  });

  it('keeps sites under a shared hosting suffix apart', () => {
    const pages = buildScopeRule('https://alice.github.io/');
    expect(isInScope('https://alice.github.io/posts/', pages)).toBe(true);
    expect(isInScope('https://bob.github.io/', pages)).toBe(false);
  });

  it('rejects denied extensions but keeps pages', () => {
    expect(isInScope('https://www.example.com/logo.png', scope)).toBe(false);
    expect(isInScope('https://www.example.com/report.pdf', scope)).toBe(false);
    expect(isInScope('https://www.example.com/page.html', scope)).toBe(true);
  });

  it('honours includePdfs, includeImages and allowExtensions', () => {
    const wide = buildScopeRule('https://www.example.com/', {
      includePdfs: true,
      includeImages: true,
      allowExtensions: ['json'],
    });
    expect(isInScope('https://www.example.com/report.pdf', wide)).toBe(true);
    expect(isInScope('https://www.example.com/logo.png', wide)).toBe(true);
    expect(isInScope('https://www.example.com/data.json', wide)).toBe(true);
  });

  it('honours denyExtensions', () => {
    const narrow = buildScopeRule('https://www.example.com/', { denyExtensions: ['.php'] });
    expect(isInScope('https://www.example.com/index.php', narrow)).toBe(false);
  });

  it('excludes hosts matching an exclusion glob', () => {
    const rule = buildScopeRule('https://www.example.com/', { excludeHosts: ['*.cdn.example.com', 'admin.example.com'] });
    expect(isInScope('https://img.cdn.example.com/x', rule)).toBe(false);
    expect(isInScope('https://admin.example.com/', rule)).toBe(false);
    expect(isInScope('https://www.example.com/', rule)).toBe(true);
  });

  it('confines URLs to the path prefix', () => {
    const rule = buildScopeRule('https://example.com/docs/', { pathPrefix: '/docs/' });
    expect(isInScope('https://example.com/docs', rule)).toBe(true);
    expect(isInScope('https://example.com/docs/guide', rule)).toBe(true);
    expect(isInScope('https://example.com/docsets', rule)).toBe(false);
    expect(isInScope('https://example.com/', rule)).toBe(false);
  });
});

describe('matchesGlob', () => {
  it('matches exact hosts and wildcard suffixes', () => {
    expect(matchesGlob('cdn.example.com', 'cdn.example.com')).toBe(true);
    expect(matchesGlob('a.example.com', '*.example.com')).toBe(true);
    expect(matchesGlob('example.com', '*.example.com')).toBe(true);
    expect(matchesGlob('badexample.com', '*.example.com')).toBe(false);
  });
});
