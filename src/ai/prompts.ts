import type { PageText } from '../crawler/extractor.js';

// ─── System Prompt ──────────────────────────────────────────────────

export const SYSTEM_PROMPT = `You help a web crawler find pages on a website it is mapping.
You only ever answer with a JSON array of short lowercase strings that could appear as path segments in the site's URLs.
No explanations, no URLs, no leading or trailing slashes.`;

// ─── Keyword Generation ─────────────────────────────────────────────

const MAX_HEADINGS = 15;

/** Prompt for path keywords, built from the home page's title and headings. */
export function buildKeywordPrompt(baseUrl: string, page: PageText, count = 40): string {
  const headings = page.headings.slice(0, MAX_HEADINGS).map((h) => `- ${h}`).join('\n');
  return `Website: ${baseUrl}
Title: ${page.title || '(none)'}
Description: ${page.description || '(none)'}
Headings:
${headings || '- (none)'}

Generate ${count} keywords likely to appear as URL path segments on this site: content categories,
common site sections (about, contact, news, support) and domain-specific terms. Use URL-friendly forms
(lowercase, hyphens instead of spaces, romanized where the site is not in English).

Respond with a JSON array of strings.`;
}

// ─── Robots Analysis ────────────────────────────────────────────────

const MAX_RULES = 40;

/** Prompt for sibling directories worth probing, given the site's Disallow rules. */
export function buildRobotsPrompt(baseUrl: string, disallowedPaths: readonly string[], count = 20): string {
  const rules = disallowedPaths.slice(0, MAX_RULES).map((p) => `Disallow: ${p}`).join('\n');
  return `Website: ${baseUrl}
robots.txt excludes these paths:
${rules}

Site owners often hide directories that sit next to public ones. Suggest up to ${count} directory names
that probably exist on this site and are not listed above.

Respond with a JSON array of strings.`;
}
