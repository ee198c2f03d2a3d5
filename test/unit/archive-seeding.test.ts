import { describe, it, expect, vi } from 'vitest';
import { archivePhase } from '../../src/discovery/phases/archive.js';
import { PermanentFetchError } from '../../src/discovery/errors.js';
import type { ArchivePage, ArchiveSource } from '../../src/crawler/archive.js';
import { createTestContext, frontierUrls } from '../fixtures/context.js';

vi.mock('../../src/utils/logger.js', () => ({
  log: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

function source(name: string, pages: ArchivePage[], seen: string[] = []): ArchiveSource {
  return {
    name,
    async *pages(domain) {
      seen.push(domain);
      for (const page of pages) yield page;
    },
  };
}

describe('archive_seeding', () => {
  it('admits captured URLs from every source', async () => {
    const domains: string[] = [];
    const { ctx } = createTestContext({
      site: {},
      baseUrl: 'https://www.example.com/',
      config: { useArchives: true },
      archives: [
        source('wayback', [{ urls: ['https://www.example.com/old', 'https://blog.example.com/post'] }], domains),
        source('commoncrawl', [{ urls: ['https://www.example.com/old', 'https://other.org/'] }], domains),
      ],
    });

    const stats = await archivePhase.run(ctx);

    expect(domains).toEqual(['example.com', 'example.com']);
    expect(frontierUrls(ctx)).toEqual([
      'https://blog.example.com/post',
      'https://www.example.com/',
      'https://www.example.com/old',
    ]);
    expect(stats.admitted).toBe(2);
    expect(stats.duplicates).toBe(1);
    expect(stats.outOfScope).toBe(1);
    expect(stats.requests).toBe(0);
  });

  it('stops consuming at archiveMaxUrls', async () => {
    const later = vi.fn();
    const { ctx } = createTestContext({
      site: {},
      config: { useArchives: true, archiveMaxUrls: 3 },
      archives: [
        source('wayback', [
          { urls: ['https://example.com/1', 'https://example.com/2'] },
          { urls: ['https://example.com/3', 'https://example.com/4', 'https://example.com/5'] },
        ]),
        { name: 'commoncrawl', pages: later },
      ],
    });

    const stats = await archivePhase.run(ctx);

    expect(stats.admitted).toBe(3);
    expect(ctx.frontier.has('https://example.com/4')).toBe(false);
    expect(later).not.toHaveBeenCalled();
  });

  it('counts failed index requests and moves on after a broken source', async () => {
    const broken: ArchiveSource = {
      name: 'broken',
      async *pages() {
        throw new Error('index offline');
      },
    };
    const { ctx } = createTestContext({
      site: {},
      config: { useArchives: true },
      archives: [
        source('wayback', [{ urls: [], error: new PermanentFetchError('HTTP 403', 'http://web.archive.org/cdx', 'http', 403) }]),
        broken,
        source('commoncrawl', [{ urls: ['https://example.com/kept'] }]),
      ],
    });

    const stats = await archivePhase.run(ctx);

    expect(stats.errors.permanent).toBe(1);
    expect(stats.admitted).toBe(1);
    expect(stats.status).toBe('completed');
  });

  it('does nothing when archives are disabled', async () => {
    const pages = vi.fn();
    const { ctx } = createTestContext({
      site: {},
      config: { useArchives: false },
      archives: [{ name: 'wayback', pages }],
    });

    const stats = await archivePhase.run(ctx);

    expect(stats.admitted).toBe(0);
    expect(pages).not.toHaveBeenCalled();
  });
});
