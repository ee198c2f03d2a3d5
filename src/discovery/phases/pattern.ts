import type { DiscoveryPhase, PhaseContext } from '../types.js';
import { log } from '../../utils/logger.js';
import { isInScope } from '../../utils/scope.js';
import { PhaseRecorder, forEachUntilStopped, probeExists, scopeRoot, soft404Baseline, type Soft404Baseline } from './shared.js';
import { explorationCandidates } from './path-variants.js';

export type SlotKind = 'number' | 'year' | 'year-month';

/** A URL with one variable slot, e.g. "https://x.test/news/{}.html". */
export interface UrlTemplate {
  key: string;
  kind: SlotKind;
  prefix: string;
  suffix: string;
  /** Zero-padded width of the slot, 0 when unpadded */
  width: number;
  /** Distinct observed slot values, ascending */
  values: number[];
}

interface SlotMatch {
  key: string;
  kind: SlotKind;
  prefix: string;
  suffix: string;
  width: number;
  value: number;
}

const YEAR_MONTH = /(?<!\d)((?:19|20)\d{2})\/(0[1-9]|1[0-2])(?=\/|$)/g;
const DIGITS = /\d+/g;
const MIN_YEAR = 1990;
const MAX_TEMPLATES = 20;

/**
 * The variable slot of a URL path: a year/month pair when there is one,
 * otherwise the last run of digits. Query strings are ignored.
 */
export function slotOf(url: string): SlotMatch | null {
  let u: URL;
  try {
    u = new URL(url);
  } catch {
    return null;
  }
  const path = u.pathname;

  const yearMonth = [...path.matchAll(YEAR_MONTH)].pop();
  if (yearMonth?.index !== undefined) {
    const prefix = u.origin + path.slice(0, yearMonth.index);
    const suffix = path.slice(yearMonth.index + yearMonth[0].length);
    const value = parseInt(yearMonth[1], 10) * 12 + parseInt(yearMonth[2], 10) - 1;
    return { key: `year-month|${prefix}{}${suffix}|0`, kind: 'year-month', prefix, suffix, width: 0, value };
  }

  const digits = [...path.matchAll(DIGITS)].pop();
  if (digits?.index === undefined || digits[0].length > 9) return null;
  const run = digits[0];
  const value = parseInt(run, 10);
  const kind: SlotKind = run.length === 4 && value >= MIN_YEAR && value <= 2099 ? 'year' : 'number';
  const width = run.length > 1 && run.startsWith('0') ? run.length : 0;
  const prefix = u.origin + path.slice(0, digits.index);
  const suffix = path.slice(digits.index + run.length);
  return { key: `${kind}|${prefix}{}${suffix}|${width}`, kind, prefix, suffix, width, value };
}

/** Templates seen with at least `minSamples` distinct values, most-sampled first. */
export function inferTemplates(urls: Iterable<string>, minSamples: number): UrlTemplate[] {
  const groups = new Map<string, UrlTemplate>();
  for (const url of urls) {
    const slot = slotOf(url);
    if (!slot) continue;
    let template = groups.get(slot.key);
    if (!template) {
      template = { key: slot.key, kind: slot.kind, prefix: slot.prefix, suffix: slot.suffix, width: slot.width, values: [] };
      groups.set(slot.key, template);
    }
    if (!template.values.includes(slot.value)) template.values.push(slot.value);
  }

  return [...groups.values()]
    .filter((t) => t.values.length >= minSamples)
    .map((t) => ({ ...t, values: [...t.values].sort((a, b) => a - b) }))
    .sort((a, b) => b.values.length - a.values.length);
}

export function renderTemplate(template: UrlTemplate, value: number): string {
  let slot: string;
  if (template.kind === 'year-month') {
    slot = `${Math.floor(value / 12)}/${String((value % 12) + 1).padStart(2, '0')}`;
  } else {
    slot = template.width > 0 ? String(value).padStart(template.width, '0') : String(value);
  }
  return `${template.prefix}${slot}${template.suffix}`;
}

function bounds(kind: SlotKind, now: Date): { min: number; max: number } {
  const nextYear = now.getFullYear() + 1;
  if (kind === 'year') return { min: MIN_YEAR, max: nextYear };
  if (kind === 'year-month') return { min: MIN_YEAR * 12, max: nextYear * 12 + 11 };
  return { min: 0, max: Number.MAX_SAFE_INTEGER };
}

/** Missing values between the smallest and largest observed ones. */
export function gapValues(values: readonly number[], limit: number): number[] {
  const known = new Set(values);
  const gaps: number[] = [];
  const first = values[0];
  const last = values[values.length - 1];
  for (let v = first + 1; v < last && gaps.length < limit; v++) {
    if (!known.has(v)) gaps.push(v);
  }
  return gaps;
}

class TemplateProber {
  private variants = 0;
  found = 0;

  constructor(
    private readonly rec: PhaseRecorder,
    private readonly ctx: PhaseContext,
    private readonly template: UrlTemplate,
    private readonly baseline: Soft404Baseline | null,
  ) {}

  get exhausted(): boolean {
    return this.variants >= this.ctx.config.patternMaxVariants || this.rec.stopped;
  }

  /** true when the variant exists (already known or verified now) */
  async probe(value: number): Promise<boolean> {
    const url = renderTemplate(this.template, value);
    if (this.ctx.frontier.has(url)) return true;
    if (this.exhausted) return false;
    this.variants += 1;

    const result = await probeExists(this.rec, url, this.baseline);
    if (!result.exists) return false;
    const admitted = this.rec.admit(url, this.template.prefix);
    if (admitted && result.status !== undefined) this.ctx.frontier.markVerified(admitted.record.url, result.status);
    this.found += 1;
    return true;
  }

  /** Walk away from the observed range until `patternFailureRun` misses in a row. */
  async extend(start: number, step: 1 | -1, min: number, max: number): Promise<void> {
    let misses = 0;
    for (let v = start; v >= min && v <= max; v += step) {
      if (this.exhausted || misses >= this.ctx.config.patternFailureRun) return;
      misses = (await this.probe(v)) ? 0 : misses + 1;
    }
  }
}

/** Probe spelling, structure and filename variants of known paths. */
async function explorePaths(
  rec: PhaseRecorder,
  ctx: PhaseContext,
  candidates: readonly string[],
  baseline: Soft404Baseline | null,
): Promise<number> {
  const root = scopeRoot(ctx);
  let found = 0;
  await forEachUntilStopped(rec, candidates, ctx.config.maxConcurrent, async (url) => {
    if (ctx.frontier.has(url)) return;
    const result = await probeExists(rec, url, baseline);
    if (!result.exists) return;
    const admitted = rec.admit(url, root);
    if (admitted && result.status !== undefined) ctx.frontier.markVerified(admitted.record.url, result.status);
    if (admitted?.isNew) found += 1;
  });
  return found;
}

export const patternPhase: DiscoveryPhase = {
  name: 'pattern_generation',
  async run(ctx) {
    const rec = new PhaseRecorder('pattern_generation', ctx);
    const known = ctx.frontier.inScopeRecords().map((r) => r.url);
    const templates = inferTemplates(known, ctx.config.patternMinSamples).slice(0, MAX_TEMPLATES);

    const variants = explorationCandidates(
      known,
      scopeRoot(ctx),
      ctx.config.patternMinSamples,
      ctx.config.patternMaxVariants,
    );
    const exploration = [...new Set([...variants.segments, ...variants.structures, ...variants.files])]
      .filter((url) => isInScope(url, ctx.scope) && !ctx.frontier.has(url));

    if (templates.length === 0 && exploration.length === 0) {
      log.info('Pattern generation: no template with enough samples and no path to explore');
      return rec.finish();
    }

    const baseline = await soft404Baseline(rec, ctx);
    const now = new Date();
    let found = 0;

    for (const template of templates) {
      if (rec.stopped) break;
      const prober = new TemplateProber(rec, ctx, template, baseline);
      const { min, max } = bounds(template.kind, now);

      const gaps = gapValues(template.values, ctx.config.patternMaxVariants);
      await forEachUntilStopped(rec, gaps, ctx.config.maxConcurrent, async (value) => {
        await prober.probe(value);
      });

      const lowest = template.values[0];
      const highest = template.values[template.values.length - 1];
      await Promise.all([
        prober.extend(highest + 1, 1, min, max),
        prober.extend(lowest - 1, -1, min, max),
      ]);

      log.debug(`Template ${renderTemplate(template, highest)} (${template.kind}): ${prober.found} new`);
      found += prober.found;
    }

    const explored = rec.stopped ? 0 : await explorePaths(rec, ctx, exploration, baseline);

    rec.assertReachable();
    log.info(
      `Pattern generation: ${templates.length} templates, ${found} new URLs; ` +
      `${exploration.length} path variants, ${explored} found`,
    );
    return rec.finish();
  },
};
