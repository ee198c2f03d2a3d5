import type { DiscoveryPhase, PhaseContext } from '../types.js';
import { FetchError } from '../errors.js';
import { normalizeUrl } from '../normalize.js';
import { log } from '../../utils/logger.js';
import { PhaseRecorder, origin, scopeRoot } from './shared.js';

/** Well-known sitemap locations, relative to the site root. */
export const SITEMAP_PATHS = [
  'sitemap.xml',
  'sitemap_index.xml',
  'sitemaps.xml',
  'wp-sitemap.xml',
  'sitemap.html',
  'sitemap/',
];

interface SitemapTask {
  url: string;
  depth: number;
}

/**
 * Read sitemap documents breadth-first from `roots`, following sitemap
 * indexes down to `sitemapMaxDepth`. Listed pages are admitted; the sitemap
 * documents themselves never are. Returns the number of documents read.
 */
export async function walkSitemaps(rec: PhaseRecorder, ctx: PhaseContext, roots: string[]): Promise<number> {
  let level: SitemapTask[] = roots.map((url) => ({ url, depth: 0 }));
  let read = 0;

  while (level.length > 0 && !rec.stopped) {
    const next: SitemapTask[] = [];

    await Promise.all(
      level.map(async (task) => {
        const key = normalizeUrl(task.url);
        if (!key || !ctx.hints.claimSitemap(key) || rec.stopped) return;

        const response = await rec.fetch(task.url);
        if (response instanceof FetchError) {
          log.debug(`No sitemap at ${task.url} (${response.status ?? response.code})`);
          return;
        }
        read += 1;

        if (looksLikeSitemapXml(response.body, response.contentType)) {
          const sitemap = ctx.extractor.parseSitemap(response.body, response.finalUrl);
          rec.parseErrors(sitemap.parseErrors);
          if (sitemap.kind === 'index') {
            if (task.depth < ctx.config.sitemapMaxDepth) {
              for (const loc of sitemap.locs) next.push({ url: loc, depth: task.depth + 1 });
            } else {
              log.debug(`Sitemap index ${task.url} is deeper than ${ctx.config.sitemapMaxDepth}, not followed`);
            }
            return;
          }
          rec.admitAll(sitemap.locs, response.finalUrl);
          return;
        }

        // HTML sitemap page
        const extracted = ctx.extractor.extract(response.body, response.contentType, response.finalUrl);
        rec.parseErrors(extracted.parseErrors);
        rec.admitAll(extracted.links, response.finalUrl);
      }),
    );

    level = next;
  }

  return read;
}

function looksLikeSitemapXml(body: string, contentType: string): boolean {
  if (contentType.toLowerCase().includes('xml')) return true;
  const head = body.trimStart().slice(0, 500).toLowerCase();
  return head.startsWith('<?xml') || head.includes('<urlset') || head.includes('<sitemapindex');
}

export const sitemapPhase: DiscoveryPhase = {
  name: 'sitemap_discovery',
  async run(ctx) {
    const rec = new PhaseRecorder('sitemap_discovery', ctx);

    const bases = new Set([`${origin(ctx)}/`, scopeRoot(ctx)]);
    const roots = [...bases].flatMap((base) => SITEMAP_PATHS.map((path) => new URL(path, base).href));

    const read = await walkSitemaps(rec, ctx, roots);
    rec.assertReachable();
    log.info(`Sitemaps: ${read} documents read, ${rec.admitted} new URLs`);

    return rec.finish();
  },
};
