import type { DiscoveryPhase, PhaseContext, UrlRecord } from '../types.js';
import { FetchError } from '../errors.js';
import { isInScope } from '../../utils/scope.js';
import { log } from '../../utils/logger.js';
import { PhaseRecorder, forEachUntilStopped } from './shared.js';

/**
 * Fetch a record and admit every link on it. Permanent failures are marked
 * on the frontier so no other expansion retries them.
 */
export async function expandRecord(
  rec: PhaseRecorder,
  ctx: PhaseContext,
  record: UrlRecord,
  aggressive: boolean,
): Promise<void> {
  const response = await rec.fetch(record.url);
  if (response instanceof FetchError) {
    if (!response.transient) ctx.frontier.markFailed(record.url);
    if (response.status !== undefined) ctx.frontier.markVerified(record.url, response.status);
    return;
  }
  ctx.frontier.markVerified(record.url, response.status);

  // A redirect target inside the scope is a page in its own right
  if (response.finalUrl !== record.url && isInScope(response.finalUrl, ctx.scope)) {
    rec.admit(response.finalUrl, record.url);
  }

  const extracted = ctx.extractor.extract(response.body, response.contentType, response.finalUrl, { aggressive });
  rec.parseErrors(extracted.parseErrors);
  for (const link of extracted.links) {
    if (rec.stopped) break;
    rec.admit(link, record.url);
  }
}

export const recursivePhase: DiscoveryPhase = {
  name: 'recursive_crawl',
  async run(ctx) {
    const rec = new PhaseRecorder('recursive_crawl', ctx);
    const { maxDepth, maxConcurrent, respectRobots, userAgent } = ctx.config;
    let depthLimited = 0;
    let robotsBlocked = 0;
    let wave = 0;

    // Each batch is the next slice of the queue; links found while it runs
    // land behind it, so expansion proceeds breadth-first.
    while (!rec.stopped) {
      const batch = ctx.frontier.takePending('crawl', maxConcurrent * 4);
      if (batch.length === 0) break;
      wave += 1;

      const expandable = batch.filter((record) => {
        if (record.depth >= maxDepth) {
          depthLimited += 1;
          return false;
        }
        if (respectRobots && !ctx.hints.isAllowed(record.url, userAgent)) {
          robotsBlocked += 1;
          return false;
        }
        return true;
      });

      await forEachUntilStopped(rec, expandable, maxConcurrent, (record) => expandRecord(rec, ctx, record, false));
      log.debug(`Crawl batch ${wave}: ${expandable.length} pages, frontier at ${ctx.frontier.size}`);
    }

    rec.assertReachable();
    log.info(
      `Recursive crawl: ${rec.admitted} new URLs` +
      (depthLimited ? `, ${depthLimited} at max depth` : '') +
      (robotsBlocked ? `, ${robotsBlocked} blocked by robots.txt` : ''),
    );
    return rec.finish();
  },
};
