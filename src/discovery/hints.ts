import type robotsParser from 'robots-parser';

export type Robot = ReturnType<typeof robotsParser>;

/**
 * Facts earlier phases learn about the site that later phases read.
 * Each field is filled once; later writes are ignored.
 */
export class DiscoveryHints {
  private robotsRules: Robot | null = null;
  private disallowed: readonly string[] = [];
  private suggested: readonly string[] = [];
  private keywordList: readonly string[] = [];
  private readonly written = new Set<string>();
  private readonly sitemaps = new Set<string>();

  get robots(): Robot | null {
    return this.robotsRules;
  }

  get disallowedPaths(): readonly string[] {
    return this.disallowed;
  }

  /** Directory names derived from robots rules; probed, never queued directly */
  get suggestedDirectories(): readonly string[] {
    return this.suggested;
  }

  /** Site keywords from the home page, used as directory candidates */
  get keywords(): readonly string[] {
    return this.keywordList;
  }

  setRobots(robots: Robot, disallowedPaths: string[]): boolean {
    if (!this.claim('robots')) return false;
    this.robotsRules = robots;
    this.disallowed = Object.freeze([...new Set(disallowedPaths)]);
    return true;
  }

  setSuggestedDirectories(dirs: string[]): boolean {
    if (!this.claim('suggested')) return false;
    this.suggested = Object.freeze(dedupe(dirs));
    return true;
  }

  setKeywords(keywords: string[]): boolean {
    if (!this.claim('keywords')) return false;
    this.keywordList = Object.freeze(dedupe(keywords));
    return true;
  }

  /** Robots check for the recursive crawl. Unknown rules allow everything. */
  isAllowed(url: string, userAgent: string): boolean {
    if (!this.robotsRules) return true;
    return this.robotsRules.isAllowed(url, userAgent) !== false;
  }

  /** Sitemap documents are read once per run, whichever phase finds them first. */
  claimSitemap(url: string): boolean {
    if (this.sitemaps.has(url)) return false;
    this.sitemaps.add(url);
    return true;
  }

  get sitemapsRead(): number {
    return this.sitemaps.size;
  }

  private claim(field: string): boolean {
    if (this.written.has(field)) return false;
    this.written.add(field);
    return true;
  }
}

function dedupe(items: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const item of items) {
    const key = item.trim().toLowerCase();
    if (key && !seen.has(key)) {
      seen.add(key);
      out.push(key);
    }
  }
  return out;
}
