import type { DiscoveryPhase } from '../types.js';
import { log } from '../../utils/logger.js';
import { errorMessage } from '../../utils/shared.js';
import { PhaseRecorder } from './shared.js';

export const archivePhase: DiscoveryPhase = {
  name: 'archive_seeding',
  async run(ctx) {
    const rec = new PhaseRecorder('archive_seeding', ctx);
    if (!ctx.config.useArchives || ctx.archives.length === 0) {
      log.debug('Archive seeding disabled');
      return rec.finish();
    }

    const domain = ctx.scope.registrableDomain;
    const cap = ctx.config.archiveMaxUrls;
    let consumed = 0;

    for (const source of ctx.archives) {
      if (consumed >= cap || rec.stopped) break;
      let fromSource = 0;
      try {
        for await (const page of source.pages(domain)) {
          if (page.error) rec.recordError(page.error);
          for (const url of page.urls) {
            if (consumed >= cap || rec.stopped) break;
            consumed += 1;
            const result = rec.admit(url, `archive:${source.name}`);
            if (result?.isNew && result.record.inScope) fromSource += 1;
          }
          if (consumed >= cap || rec.stopped) break;
        }
      } catch (err) {
        log.warn(`Archive source ${source.name} failed: ${errorMessage(err)}`);
      }
      log.info(`Archive ${source.name}: ${fromSource} new URLs`);
    }

    return rec.finish();
  },
};
