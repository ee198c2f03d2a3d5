import { describe, it, expect, vi } from 'vitest';
import { hierarchicalPhase, isChildOf, parentDirectories } from '../../src/discovery/phases/hierarchical.js';
import { createTestContext, frontierUrls } from '../fixtures/context.js';
import { links, type FakeSite } from '../fixtures/fake-site.js';

vi.mock('../../src/utils/logger.js', () => ({
  log: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe('parentDirectories', () => {
  it('lists parents nearest first', () => {
    expect(parentDirectories('https://example.com/a/b/c', '/')).toEqual([
      'https://example.com/a/b/',
      'https://example.com/a/',
    ]);
  });

  it('stops at the path prefix', () => {
    expect(parentDirectories('https://example.com/docs/a/b', '/docs/')).toEqual(['https://example.com/docs/a/']);
  });

  it('has no parents for top-level paths', () => {
    expect(parentDirectories('https://example.com/about', '/')).toEqual([]);
    expect(parentDirectories('https://example.com/', '/')).toEqual([]);
  });
});

describe('isChildOf', () => {
  it('matches whole segments in segment mode', () => {
    expect(isChildOf('https://example.com/blog/post', 'https://example.com/blog/', 'segment')).toBe(true);
    expect(isChildOf('https://example.com/blogroll', 'https://example.com/blog/', 'segment')).toBe(false);
    expect(isChildOf('https://example.com/blog/', 'https://example.com/blog/', 'segment')).toBe(false);
  });

  it('accepts shared text in prefix mode', () => {
    expect(isChildOf('https://example.com/blogroll', 'https://example.com/blog/', 'prefix')).toBe(true);
    expect(isChildOf('https://example.com/about', 'https://example.com/blog/', 'prefix')).toBe(false);
  });

  it('rejects other hosts', () => {
    expect(isChildOf('https://cdn.example.com/blog/x', 'https://example.com/blog/', 'segment')).toBe(false);
  });
});

const SITE: FakeSite = {
  '/blog/2024/': links('/blog/2024/other', '/blog/2023/x', '/about'),
  '/blog/': links('/blog/2023/x', '/about', '/blogroll'),
};

describe('hierarchical_crawl', () => {
  it('fetches parent directories and admits their children', async () => {
    const { ctx, requests } = createTestContext({ site: SITE });
    ctx.frontier.admit('https://example.com/blog/2024/post', 'https://example.com/', 'sitemap_discovery');

    const stats = await hierarchicalPhase.run(ctx);

    expect(frontierUrls(ctx)).toEqual([
      'https://example.com/',
      'https://example.com/blog',
      'https://example.com/blog/2023/x',
      'https://example.com/blog/2024',
      'https://example.com/blog/2024/other',
      'https://example.com/blog/2024/post',
    ]);
    expect(stats.admitted).toBe(4);
    expect([...requests].sort()).toEqual([
      'GET https://example.com/blog/',
      'GET https://example.com/blog/2023/',
      'GET https://example.com/blog/2024/',
    ]);
    expect(ctx.frontier.get('https://example.com/blog/2024')?.status).toBe(200);
    expect(ctx.frontier.get('https://example.com/blog/2024')?.phases).toEqual(['hierarchical_crawl']);
  });

  it('also takes sibling paths in prefix mode', async () => {
    const { ctx } = createTestContext({ site: SITE, config: { parentMatch: 'prefix' } });
    ctx.frontier.admit('https://example.com/blog/2024/post', 'https://example.com/', 'sitemap_discovery');

    const stats = await hierarchicalPhase.run(ctx);

    expect(ctx.frontier.has('https://example.com/blogroll')).toBe(true);
    expect(ctx.frontier.has('https://example.com/about')).toBe(false);
    expect(stats.admitted).toBe(5);
  });
});
