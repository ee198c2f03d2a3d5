import type { DiscoveryPhase, ParentMatch, PhaseContext, UrlRecord } from '../types.js';
import { FetchError } from '../errors.js';
import { pathMatchesPrefix } from '../../utils/scope.js';
import { log } from '../../utils/logger.js';
import { PhaseRecorder, forEachUntilStopped } from './shared.js';

/**
 * Parent directories of a URL strictly below the scope root, nearest first:
 * "/a/b/c" under "/" gives "/a/b/" and "/a/".
 */
export function parentDirectories(url: string, pathPrefix: string): string[] {
  const u = new URL(url);
  const segments = u.pathname.split('/').filter(Boolean);
  const parents: string[] = [];
  for (let i = segments.length - 1; i >= 1; i--) {
    const path = `/${segments.slice(0, i).join('/')}/`;
    if (path.length <= pathPrefix.length || !pathMatchesPrefix(path, pathPrefix)) break;
    parents.push(new URL(path, u.origin).href);
  }
  return parents;
}

/**
 * Whether `link` is a child of the parent directory. Segment matching wants
 * whole path segments ("/a/" contains "/a/x"); prefix matching also accepts
 * siblings sharing the text ("/a" contains "/ab").
 */
export function isChildOf(link: string, parentUrl: string, mode: ParentMatch): boolean {
  let child: URL;
  let parent: URL;
  try {
    child = new URL(link);
    parent = new URL(parentUrl);
  } catch {
    return false;
  }
  if (child.host !== parent.host) return false;
  const parentPath = parent.pathname.endsWith('/') ? parent.pathname : `${parent.pathname}/`;
  if (mode === 'segment') return child.pathname.startsWith(parentPath) && child.pathname !== parentPath;
  return child.pathname.startsWith(parentPath.slice(0, -1)) && child.pathname.length >= parentPath.length;
}

async function expandParent(rec: PhaseRecorder, ctx: PhaseContext, parentUrl: string, child: UrlRecord): Promise<void> {
  const response = await rec.fetch(parentUrl);
  if (response instanceof FetchError) return;

  const admitted = rec.admit(parentUrl, child.url);
  if (admitted) ctx.frontier.markVerified(admitted.record.url, response.status);

  const extracted = ctx.extractor.extract(response.body, response.contentType, response.finalUrl);
  rec.parseErrors(extracted.parseErrors);
  for (const link of extracted.links) {
    if (rec.stopped) break;
    if (isChildOf(link, parentUrl, ctx.config.parentMatch)) rec.admit(link, parentUrl);
  }
}

export const hierarchicalPhase: DiscoveryPhase = {
  name: 'hierarchical_crawl',
  async run(ctx) {
    const rec = new PhaseRecorder('hierarchical_crawl', ctx);
    let parentsFetched = 0;

    while (!rec.stopped) {
      const batch = ctx.frontier.takePending('parent', ctx.config.maxConcurrent * 4);
      if (batch.length === 0) break;

      // Claim synchronously so each directory is fetched once per run
      const work: Array<{ parentUrl: string; child: UrlRecord }> = [];
      for (const record of batch) {
        for (const parentUrl of parentDirectories(record.url, ctx.scope.pathPrefix)) {
          if (ctx.frontier.claim(parentUrl, 'parent')) work.push({ parentUrl, child: record });
        }
      }
      parentsFetched += work.length;

      await forEachUntilStopped(rec, work, ctx.config.maxConcurrent, ({ parentUrl, child }) =>
        expandParent(rec, ctx, parentUrl, child),
      );
    }

    rec.assertReachable();
    log.info(`Hierarchical crawl: ${parentsFetched} parent directories, ${rec.admitted} new URLs`);
    return rec.finish();
  },
};
