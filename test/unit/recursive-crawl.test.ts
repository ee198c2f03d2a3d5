import { describe, it, expect, vi } from 'vitest';
import robotsParser from 'robots-parser';
import { recursivePhase } from '../../src/discovery/phases/recursive.js';
import { HostUnreachableError } from '../../src/discovery/errors.js';
import { createTestContext, frontierUrls } from '../fixtures/context.js';
import { html, links, type FakeSite } from '../fixtures/fake-site.js';

vi.mock('../../src/utils/logger.js', () => ({
  log: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const SITE: FakeSite = {
  '/': links('/a', '/b', 'https://other.org/'),
  '/a': links('/a/deep', '/b'),
  '/b': links('/c'),
  '/a/deep': links('/a/deeper'),
  '/c': html('no links here'),
};

describe('recursive_crawl', () => {
  it('expands breadth-first down to maxDepth', async () => {
    const { ctx, requests } = createTestContext({ site: SITE, config: { maxDepth: 2 } });

    const stats = await recursivePhase.run(ctx);

    expect(frontierUrls(ctx)).toEqual([
      'https://example.com/',
      'https://example.com/a',
      'https://example.com/a/deep',
      'https://example.com/b',
      'https://example.com/c',
    ]);
    expect(stats.admitted).toBe(4);
    expect(stats.outOfScope).toBe(1);
    expect(stats.duplicates).toBe(1);
    expect(requests).toHaveLength(3);
    expect(ctx.frontier.get('https://example.com/a/deep')?.depth).toBe(2);
    expect(ctx.frontier.get('https://example.com/')?.status).toBe(200);
  });

  it('does not expand pages robots.txt disallows', async () => {
    const { ctx, requests } = createTestContext({ site: SITE, config: { maxDepth: 2 } });
    const robotsUrl = 'https://example.com/robots.txt';
    ctx.hints.setRobots(robotsParser(robotsUrl, 'User-agent: *\nDisallow: /a\n'), ['/a']);

    await recursivePhase.run(ctx);

    expect(frontierUrls(ctx)).toEqual([
      'https://example.com/',
      'https://example.com/a',
      'https://example.com/b',
      'https://example.com/c',
    ]);
    expect(requests).not.toContain('GET https://example.com/a');
  });

  it('ignores robots.txt when respectRobots is off', async () => {
    const { ctx } = createTestContext({ site: SITE, config: { maxDepth: 2, respectRobots: false } });
    const robotsUrl = 'https://example.com/robots.txt';
    ctx.hints.setRobots(robotsParser(robotsUrl, 'User-agent: *\nDisallow: /a\n'), ['/a']);

    await recursivePhase.run(ctx);

    expect(ctx.frontier.has('https://example.com/a/deep')).toBe(true);
  });

  it('marks pages that fail permanently', async () => {
    const { ctx } = createTestContext({
      site: { '/': links('/a', '/b'), '/a': html('leaf') },
    });

    const stats = await recursivePhase.run(ctx);

    expect(ctx.frontier.isFailed('https://example.com/b')).toBe(true);
    expect(ctx.frontier.get('https://example.com/b')?.status).toBe(404);
    expect(ctx.frontier.isFailed('https://example.com/a')).toBe(false);
    expect(stats.errors.permanent).toBe(1);
  });

  it('stops admitting at the page ceiling', async () => {
    const { ctx } = createTestContext({
      site: { '/': links('/1', '/2', '/3', '/4') },
      config: { maxPages: 3 },
    });

    const stats = await recursivePhase.run(ctx);

    expect(ctx.frontier.size).toBe(3);
    expect(stats.admitted).toBe(2);
    expect(stats.status).toBe('completed');
  });

  it('fails when the seed cannot be reached', async () => {
    const { ctx } = createTestContext({ site: { '*': { fail: 'network' } } });
    await expect(recursivePhase.run(ctx)).rejects.toThrow(HostUnreachableError);
  });
});
