import robotsParser from 'robots-parser';
import type { DiscoveryPhase } from '../types.js';
import { FetchError } from '../errors.js';
import { buildRobotsPrompt } from '../../ai/prompts.js';
import { log } from '../../utils/logger.js';
import { PhaseRecorder, origin } from './shared.js';
import { walkSitemaps } from './sitemap.js';

export interface RobotsRules {
  allow: string[];
  disallow: string[];
  sitemaps: string[];
}

type RuleKind = 'allow' | 'disallow' | 'sitemap';

const ROBOTS_DIRECTIVES = new Map<string, RuleKind>([
  ['allow', 'allow'],
  ['disallow', 'disallow'],
  ['sitemap', 'sitemap'],
]);

/** ai.txt takes the robots.txt directives plus its AI-specific ones. */
const AI_TXT_DIRECTIVES = new Map<string, RuleKind>([
  ...ROBOTS_DIRECTIVES,
  ['ai-allow', 'allow'],
  ['training-data', 'allow'],
  ['ai-disallow', 'disallow'],
  ['gpt-disallow', 'disallow'],
  ['claude-disallow', 'disallow'],
  ['gemini-disallow', 'disallow'],
]);

function parseRuleLines(body: string, directives: Map<string, RuleKind>): RobotsRules {
  const allow = new Set<string>();
  const disallow = new Set<string>();
  const sitemaps: string[] = [];

  for (const rawLine of body.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    const colon = line.indexOf(':');
    if (colon === -1) continue;
    const kind = directives.get(line.slice(0, colon).trim().toLowerCase());
    const value = line.slice(colon + 1).trim();
    if (!kind || !value) continue;

    if (kind === 'sitemap') {
      sitemaps.push(value);
      continue;
    }

    const literal = value.split('*')[0].replace(/\$$/, '');
    if (!literal.startsWith('/') || literal === '/') continue;
    (kind === 'allow' ? allow : disallow).add(literal);
  }

  return { allow: [...allow], disallow: [...disallow], sitemaps };
}

/**
 * Literal paths from Allow and Disallow lines, for every user-agent group.
 * Wildcard rules are cut at their first `*`; an end anchor `$` is dropped.
 */
export function parseRobotsRules(body: string): RobotsRules {
  return parseRuleLines(body, ROBOTS_DIRECTIVES);
}

/**
 * Rules from an ai.txt file. AI-Allow and Training-Data count as allow lines;
 * AI-Disallow and the per-model disallow lines count as disallow lines.
 */
export function parseAiTxtRules(body: string): RobotsRules {
  return parseRuleLines(body, AI_TXT_DIRECTIVES);
}

/** First path segment of each rule, e.g. "/admin/tools/" → "admin". */
function ruleDirectories(paths: string[]): string[] {
  const dirs = new Set<string>();
  for (const path of paths) {
    const first = path.split('/').filter(Boolean)[0];
    if (first && !first.includes('.') && !first.includes('?')) dirs.add(first.toLowerCase());
  }
  return [...dirs];
}

const NO_RULES: RobotsRules = { allow: [], disallow: [], sitemaps: [] };

export const robotsPhase: DiscoveryPhase = {
  name: 'robots_analysis',
  async run(ctx) {
    const rec = new PhaseRecorder('robots_analysis', ctx);
    const robotsUrl = `${origin(ctx)}/robots.txt`;
    const aiTxtUrl = `${origin(ctx)}/ai.txt`;

    let rules = NO_RULES;
    let declaredSitemaps: string[] = [];
    const response = await rec.fetch(robotsUrl);
    if (response instanceof FetchError) {
      log.info(`No robots.txt (${response.status ?? response.code})`);
    } else {
      const robots = robotsParser(robotsUrl, response.body);
      rules = parseRobotsRules(response.body);
      declaredSitemaps = robots.getSitemaps();
      ctx.hints.setRobots(robots, rules.disallow);
      for (const path of rules.allow) {
        rec.admit(new URL(path, robotsUrl).href, robotsUrl);
      }
    }

    // ai.txt paths name content the site opted out of AI use for, so its
    // disallow lines are admitted along with its allow lines.
    let aiRules = NO_RULES;
    if (!rec.stopped) {
      const aiTxt = await rec.fetch(aiTxtUrl);
      if (aiTxt instanceof FetchError) {
        log.debug(`No ai.txt (${aiTxt.status ?? aiTxt.code})`);
      } else {
        aiRules = parseAiTxtRules(aiTxt.body);
        for (const path of [...aiRules.allow, ...aiRules.disallow]) {
          rec.admit(new URL(path, aiTxtUrl).href, aiTxtUrl);
        }
      }
    }
    rec.assertReachable();

    const sitemapUrls = [...new Set([...declaredSitemaps, ...rules.sitemaps, ...aiRules.sitemaps])];
    if (sitemapUrls.length > 0 && !rec.stopped) {
      await walkSitemaps(rec, ctx, sitemapUrls);
    }

    if (rules.disallow.length > 0 && !rec.stopped) {
      const suggestion = await rec.suggest(buildRobotsPrompt(ctx.scope.baseUrl, rules.disallow), {
        fallback: ruleDirectories([...rules.disallow, ...rules.allow]),
      });
      ctx.hints.setSuggestedDirectories([...ruleDirectories(rules.disallow), ...suggestion.items]);
    }

    log.info(
      `robots.txt: ${rules.allow.length} allow, ${rules.disallow.length} disallow; ` +
      `ai.txt: ${aiRules.allow.length + aiRules.disallow.length} paths; ` +
      `${sitemapUrls.length} sitemaps, ${rec.admitted} new URLs`,
    );
    return rec.finish();
  },
};
