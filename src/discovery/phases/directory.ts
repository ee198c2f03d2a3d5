import type { DiscoveryPhase, PhaseContext } from '../types.js';
import { FetchError } from '../errors.js';
import { buildKeywordPrompt } from '../../ai/prompts.js';
import { fallbackSuggestions } from '../../ai/fallback.js';
import { loadDirectoryWordlist } from '../../config/wordlists.js';
import { log } from '../../utils/logger.js';
import { PhaseRecorder, forEachUntilStopped, probeExists, scopeRoot, soft404Baseline } from './shared.js';

/**
 * Ask for site keywords based on the home page. The answer (model, cache or
 * the static list) is stored on the hints for the result summary.
 */
export async function generateKeywords(rec: PhaseRecorder, ctx: PhaseContext): Promise<string[]> {
  if (ctx.hints.keywords.length > 0) return [...ctx.hints.keywords];

  const home = await rec.fetch(ctx.scope.baseUrl);
  const page = home instanceof FetchError
    ? { title: '', description: '', headings: [] }
    : ctx.extractor.extractPageText(home.body);

  const suggestion = await rec.suggest(buildKeywordPrompt(ctx.scope.baseUrl, page), {
    fallback: fallbackSuggestions(ctx.scope.baseUrl),
  });
  ctx.hints.setKeywords(suggestion.items);
  return [...ctx.hints.keywords];
}

/** Robots-derived names first, then keywords, then the built-in list. */
export function directoryCandidates(
  suggested: readonly string[],
  keywords: readonly string[],
  wordlist: readonly string[],
  max: number,
): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const name of [...suggested, ...keywords, ...wordlist]) {
    const clean = name.trim().toLowerCase().replace(/^\/+|\/+$/g, '');
    if (!clean || clean.includes('/') || seen.has(clean)) continue;
    seen.add(clean);
    out.push(clean);
    if (out.length >= max) break;
  }
  return out;
}

export const directoryPhase: DiscoveryPhase = {
  name: 'directory_probing',
  async run(ctx) {
    const rec = new PhaseRecorder('directory_probing', ctx);

    const keywords = await generateKeywords(rec, ctx);
    const candidates = directoryCandidates(
      ctx.hints.suggestedDirectories,
      keywords,
      loadDirectoryWordlist(),
      ctx.config.maxDirectoryProbes,
    );

    const root = scopeRoot(ctx);
    const baseline = await soft404Baseline(rec, ctx);
    if (baseline) log.debug(`Soft 404 detected on ${ctx.scope.host}; comparing probe bodies`);

    let found = 0;
    const urls = candidates
      .map((name) => new URL(`${encodeURIComponent(name)}/`, root).href)
      .filter((url) => !ctx.frontier.has(url));

    await forEachUntilStopped(rec, urls, ctx.config.maxConcurrent, async (url) => {
      const probe = await probeExists(rec, url, baseline);
      if (!probe.exists) return;
      const admitted = rec.admit(url, ctx.scope.baseUrl);
      if (admitted && probe.status !== undefined) ctx.frontier.markVerified(admitted.record.url, probe.status);
      found += 1;
    });

    rec.assertReachable();
    log.info(`Directory probing: ${keywords.length} keywords, ${urls.length} probes, ${found} directories found`);
    return rec.finish();
  },
};
