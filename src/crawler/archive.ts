import type { Fetcher } from './fetcher.js';
import { isFetchError } from './fetcher.js';
import type { FetchError } from '../discovery/errors.js';
import { log } from '../utils/logger.js';

export interface ArchivePage {
  urls: string[];
  /** Set when the page request failed; the source stops after it */
  error?: FetchError;
}

/** A historical index of URLs captured for a domain. */
export interface ArchiveSource {
  readonly name: string;
  /** Pages of captured URLs for the domain and its subdomains, in index order. */
  pages(domain: string): AsyncGenerator<ArchivePage>;
}

const WAYBACK_CDX = 'http://web.archive.org/cdx/search/cdx';
const COMMON_CRAWL_INDEX = 'https://index.commoncrawl.org/collinfo.json';

/**
 * Wayback Machine CDX server. Paginated with resume keys: with
 * `showResumeKey=true` the last row of a page is the key for the next one,
 * separated from the data by an empty row.
 */
export class WaybackSource implements ArchiveSource {
  readonly name = 'wayback';

  constructor(
    private readonly fetcher: Fetcher,
    private readonly pageSize = 1000,
  ) {}

  /**
   * Stops after the last page, and also when the server repeats a resume key
   * or returns a page with no URL not already yielded.
   */
  async *pages(domain: string): AsyncGenerator<ArchivePage> {
    const usedKeys = new Set<string>();
    const seen = new Set<string>();
    let resumeKey: string | null = null;
    do {
      const params = new URLSearchParams({
        url: `${domain}/*`,
        output: 'json',
        fl: 'original',
        collapse: 'urlkey',
        filter: 'statuscode:200',
        limit: String(this.pageSize),
        showResumeKey: 'true',
      });
      if (resumeKey) params.set('resumeKey', resumeKey);

      const response = await this.fetcher.fetch(`${WAYBACK_CDX}?${params.toString()}`, { timeoutMs: 30_000 });
      if (isFetchError(response)) {
        log.debug(`Wayback CDX request failed: ${response.message}`);
        yield { urls: [], error: response };
        return;
      }

      const page = parseWaybackPage(response.body);
      const fresh = page.urls.filter((url) => !seen.has(url));
      for (const url of fresh) seen.add(url);
      yield { urls: fresh };

      if (resumeKey) usedKeys.add(resumeKey);
      resumeKey = page.resumeKey;
      if (resumeKey && (usedKeys.has(resumeKey) || fresh.length === 0)) {
        log.debug(`Wayback CDX pagination stalled at resume key ${resumeKey}`);
        resumeKey = null;
      }
    } while (resumeKey);
  }
}

export function parseWaybackPage(body: string): { urls: string[]; resumeKey: string | null } {
  let rows: unknown;
  try {
    rows = JSON.parse(body);
  } catch {
    return { urls: [], resumeKey: null };
  }
  if (!Array.isArray(rows)) return { urls: [], resumeKey: null };

  const urls: string[] = [];
  let resumeKey: string | null = null;
  let afterSeparator = false;

  // First row is the field header
  for (const row of rows.slice(1)) {
    if (!Array.isArray(row)) continue;
    if (row.length === 0) {
      afterSeparator = true;
      continue;
    }
    const first: unknown = row[0];
    if (typeof first !== 'string') continue;
    if (afterSeparator) resumeKey = first;
    else urls.push(first);
  }

  return { urls, resumeKey };
}

/**
 * Common Crawl URL index. Uses the newest crawl listed in collinfo.json and
 * walks its result pages until they run out.
 */
export class CommonCrawlSource implements ArchiveSource {
  readonly name = 'commoncrawl';

  constructor(
    private readonly fetcher: Fetcher,
    private readonly maxIndexPages = 5,
  ) {}

  async *pages(domain: string): AsyncGenerator<ArchivePage> {
    const info = await this.fetcher.fetch(COMMON_CRAWL_INDEX, { timeoutMs: 30_000 });
    if (isFetchError(info)) {
      yield { urls: [], error: info };
      return;
    }
    const api = latestIndexApi(info.body);
    if (!api) {
      log.debug('Common Crawl collinfo.json listed no index');
      return;
    }

    const query = (extra: Record<string, string>): string =>
      `${api}?${new URLSearchParams({ url: `*.${domain}`, output: 'json', fl: 'url', ...extra }).toString()}`;

    const count = await this.fetcher.fetch(query({ showNumPages: 'true' }), { timeoutMs: 30_000 });
    if (isFetchError(count)) {
      yield { urls: [], error: count };
      return;
    }
    const total = Math.min(parseNumPages(count.body), this.maxIndexPages);

    for (let page = 0; page < total; page++) {
      const response = await this.fetcher.fetch(query({ page: String(page) }), { timeoutMs: 60_000 });
      if (isFetchError(response)) {
        yield { urls: [], error: response };
        return;
      }
      yield { urls: parseNdjsonUrls(response.body) };
    }
  }
}

export function latestIndexApi(body: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed)) return null;
  for (const entry of parsed) {
    if (typeof entry === 'object' && entry !== null && 'cdx-api' in entry && typeof entry['cdx-api'] === 'string') {
      return entry['cdx-api'];
    }
  }
  return null;
}

function parseNumPages(body: string): number {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'number') return parsed;
    if (typeof parsed === 'object' && parsed !== null && 'pages' in parsed && typeof parsed.pages === 'number') {
      return parsed.pages;
    }
  } catch {
    return 0;
  }
  return 0;
}

/** One JSON object per line, each with a `url` field. */
export function parseNdjsonUrls(body: string): string[] {
  const urls: string[] = [];
  for (const line of body.split('\n')) {
    if (!line.trim()) continue;
    try {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed === 'object' && parsed !== null && 'url' in parsed && typeof parsed.url === 'string') {
        urls.push(parsed.url);
      }
    } catch {
      continue;
    }
  }
  return urls;
}

export function createArchiveSources(fetcher: Fetcher, pageSize: number): ArchiveSource[] {
  return [new WaybackSource(fetcher, pageSize), new CommonCrawlSource(fetcher)];
}
