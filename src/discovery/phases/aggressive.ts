import type { DiscoveryPhase } from '../types.js';
import { log } from '../../utils/logger.js';
import { PhaseRecorder, forEachUntilStopped } from './shared.js';
import { expandRecord } from './recursive.js';

/**
 * Re-reads every in-scope page not yet deep-expanded, including pages the
 * cheaper phases already fetched, with the superset extractor.
 */
export const aggressivePhase: DiscoveryPhase = {
  name: 'aggressive_crawl',
  async run(ctx) {
    const rec = new PhaseRecorder('aggressive_crawl', ctx);
    const { aggressiveMaxPages, maxConcurrent, respectRobots, userAgent } = ctx.config;
    let pages = 0;

    while (!rec.stopped && pages < aggressiveMaxPages) {
      const batch = ctx.frontier
        .takePending('deep', Math.min(maxConcurrent * 4, aggressiveMaxPages - pages))
        .filter((record) => !respectRobots || ctx.hints.isAllowed(record.url, userAgent));
      if (batch.length === 0 && !ctx.frontier.hasPending('deep')) break;
      pages += batch.length;

      await forEachUntilStopped(rec, batch, maxConcurrent, (record) => expandRecord(rec, ctx, record, true));
    }

    rec.assertReachable();
    log.info(`Aggressive crawl: ${pages} pages re-read, ${rec.admitted} new URLs`);
    return rec.finish();
  },
};
