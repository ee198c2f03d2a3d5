import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { log } from '../utils/logger.js';
import { errorMessage } from '../utils/shared.js';
import { ParseError } from '../discovery/errors.js';

export interface ExtractOptions {
  /** Also follow <link>, <area>, frames and root-relative paths quoted in scripts */
  aggressive?: boolean;
}

export interface ExtractResult {
  /** Absolute http(s) URLs, deduplicated, in document order */
  links: string[];
  parseErrors: ParseError[];
}

export type SitemapKind = 'urlset' | 'index' | 'unknown';

export interface SitemapParseResult {
  kind: SitemapKind;
  locs: string[];
  parseErrors: ParseError[];
}

export interface FormInput {
  name: string;
  type: string;
  value: string;
}

export interface FormInfo {
  action: string;
  method: 'GET' | 'POST';
  inputs: FormInput[];
  pageUrl: string;
}

export interface PageText {
  title: string;
  description: string;
  headings: string[];
}

const SKIPPED_SCHEMES = /^(javascript|mailto|tel|data|sms|ftp|file|about|blob):/i;
const CSS_URL = /url\(\s*['"]?([^'")\s]+)['"]?\s*\)/gi;
const ABSOLUTE_URL = /https?:\/\/[^\s"'<>`\\)]+/gi;
const QUOTED_ROOT_PATH = /["'](\/[A-Za-z0-9_\-.~%/]+(?:\?[A-Za-z0-9_\-.~%=&]*)?)["']/g;
const XML_ENTITIES: Record<string, string> = { amp: '&', lt: '<', gt: '>', quot: '"', apos: "'" };

const LOC_TAG = /<(?:[\w-]+:)?loc>\s*(?:<!\[CDATA\[)?\s*(.*?)\s*(?:\]\]>)?\s*<\/(?:[\w-]+:)?loc>/gis;

/**
 * Turns fetched documents into candidate URLs. Never throws; malformed input
 * is reported in `parseErrors` and whatever could be read is returned.
 */
export class LinkExtractor {
  private readonly parser = new XMLParser({
    ignoreAttributes: true,
    removeNSPrefix: true,
    parseTagValue: false,
    trimValues: true,
  });

  extract(body: string, contentType: string, baseUrl: string, options: ExtractOptions = {}): ExtractResult {
    if (isXml(body, contentType)) {
      const sitemap = this.parseSitemap(body, baseUrl);
      return { links: sitemap.locs, parseErrors: sitemap.parseErrors };
    }
    if (!isHtml(body, contentType)) {
      return { links: [], parseErrors: [] };
    }

    const links = new LinkSet();
    try {
      const $ = cheerio.load(body);
      const base = resolveReference($('base[href]').first().attr('href'), baseUrl) ?? baseUrl;

      this.collectDefault($, base, links);
      if (options.aggressive) this.collectAggressive($, base, links);

      return { links: links.values(), parseErrors: [] };
    } catch (err) {
      return { links: links.values(), parseErrors: [new ParseError(`HTML parse failed: ${errorMessage(err)}`, baseUrl)] };
    }
  }

  /**
   * Read a sitemap or sitemap index. Malformed XML falls back to scanning
   * for <loc> elements with a regex.
   */
  parseSitemap(body: string, baseUrl: string): SitemapParseResult {
    const links = new LinkSet();
    const looksLikeIndex = /<(?:[\w-]+:)?sitemapindex[\s>]/i.test(body);

    const validation = XMLValidator.validate(body);
    if (validation !== true) {
      for (const match of body.matchAll(LOC_TAG)) {
        links.add(decodeXmlEntities(match[1]), baseUrl);
      }
      const kind: SitemapKind = looksLikeIndex ? 'index' : links.size > 0 ? 'urlset' : 'unknown';
      const error = new ParseError(`Malformed XML at line ${validation.err.line}: ${validation.err.msg}`, baseUrl);
      return { kind, locs: links.values(), parseErrors: [error] };
    }

    let parsed: unknown;
    try {
      parsed = this.parser.parse(body);
    } catch (err) {
      return { kind: 'unknown', locs: [], parseErrors: [new ParseError(`Sitemap parse failed: ${errorMessage(err)}`, baseUrl)] };
    }

    const index = field(parsed, 'sitemapindex');
    if (index !== undefined) {
      for (const entry of asArray(field(index, 'sitemap'))) {
        links.add(locOf(entry), baseUrl);
      }
      return { kind: 'index', locs: links.values(), parseErrors: [] };
    }

    const urlset = field(parsed, 'urlset');
    if (urlset !== undefined) {
      for (const entry of asArray(field(urlset, 'url'))) {
        links.add(locOf(entry), baseUrl);
      }
      return { kind: 'urlset', locs: links.values(), parseErrors: [] };
    }

    return { kind: 'unknown', locs: [], parseErrors: [] };
  }

  extractForms(body: string, pageUrl: string): FormInfo[] {
    const forms: FormInfo[] = [];
    try {
      const $ = cheerio.load(body);
      const base = resolveReference($('base[href]').first().attr('href'), pageUrl) ?? pageUrl;
      $('form').each((_, el) => {
        const $form = $(el);
        const action = resolveReference($form.attr('action') || pageUrl, base);
        if (!action) return;
        const inputs: FormInput[] = [];
        $form.find('input[name], textarea[name], select[name]').each((_, input) => {
          const $input = $(input);
          inputs.push({
            name: $input.attr('name') ?? '',
            type: ($input.attr('type') ?? input.tagName).toLowerCase(),
            value: $input.attr('value') ?? '',
          });
        });
        forms.push({
          action,
          method: ($form.attr('method') ?? 'GET').toUpperCase() === 'POST' ? 'POST' : 'GET',
          inputs,
          pageUrl,
        });
      });
    } catch (err) {
      log.debug(`Form extraction failed for ${pageUrl}: ${errorMessage(err)}`);
    }
    return forms;
  }

  /** Title, meta description and top headings, used to prompt for keywords. */
  extractPageText(body: string): PageText {
    try {
      const $ = cheerio.load(body);
      const headings: string[] = [];
      $('h1, h2, h3').each((_, el) => {
        const text = $(el).text().replace(/\s+/g, ' ').trim();
        if (text && headings.length < 30) headings.push(text);
      });
      return {
        title: $('title').first().text().trim(),
        description: ($('meta[name="description"]').attr('content') ?? '').trim(),
        headings,
      };
    } catch (err) {
      log.debug(`Page text extraction failed: ${errorMessage(err)}`);
      return { title: '', description: '', headings: [] };
    }
  }

  private collectDefault($: CheerioAPI, base: string, links: LinkSet): void {
    $('a[href]').each((_, el) => links.add($(el).attr('href'), base));
    $('form[action]').each((_, el) => links.add($(el).attr('action'), base));

    $('meta[http-equiv]').each((_, el) => {
      const $el = $(el);
      if (($el.attr('http-equiv') ?? '').toLowerCase() !== 'refresh') return;
      const match = ($el.attr('content') ?? '').match(/url\s*=\s*['"]?([^'";]+)/i);
      if (match) links.add(match[1], base);
    });

    $('style').each((_, el) => collectCssUrls($(el).text(), base, links));
    $('[style]').each((_, el) => collectCssUrls($(el).attr('style') ?? '', base, links));

    $('script:not([src])').each((_, el) => {
      const text = $(el).text();
      collectCssUrls(text, base, links);
      for (const match of text.matchAll(ABSOLUTE_URL)) links.add(match[0], base);
    });
  }

  private collectAggressive($: CheerioAPI, base: string, links: LinkSet): void {
    $('link[href]').each((_, el) => links.add($(el).attr('href'), base));
    $('area[href]').each((_, el) => links.add($(el).attr('href'), base));
    $('iframe[src], frame[src]').each((_, el) => links.add($(el).attr('src'), base));

    $('script:not([src])').each((_, el) => {
      for (const match of $(el).text().matchAll(QUOTED_ROOT_PATH)) {
        if (!match[1].startsWith('//')) links.add(match[1], base);
      }
    });
  }
}

/** Ordered set of resolved absolute URLs. */
class LinkSet {
  private readonly seen = new Set<string>();

  add(ref: string | undefined, base: string): void {
    const resolved = resolveReference(ref, base);
    if (resolved) this.seen.add(resolved);
  }

  get size(): number {
    return this.seen.size;
  }

  values(): string[] {
    return [...this.seen];
  }
}

/** Resolve a reference against a base, or null for non-navigable references. */
export function resolveReference(ref: string | undefined, base: string): string | null {
  const trimmed = ref?.trim();
  if (!trimmed || trimmed.startsWith('#') || SKIPPED_SCHEMES.test(trimmed)) return null;
  try {
    const u = new URL(trimmed, base);
    if (u.protocol !== 'http:' && u.protocol !== 'https:') return null;
    return u.href;
  } catch {
    return null;
  }
}

function collectCssUrls(text: string, base: string, links: LinkSet): void {
  for (const match of text.matchAll(CSS_URL)) links.add(match[1], base);
}

/** Decode the predefined XML entities and numeric character references. */
export function decodeXmlEntities(text: string): string {
  return text.replace(/&(?:#(\d+)|#x([0-9a-f]+)|(amp|lt|gt|quot|apos));/gi, (
    match: string,
    dec: string | undefined,
    hex: string | undefined,
    name: string | undefined,
  ) => {
    const code = dec ? parseInt(dec, 10) : hex ? parseInt(hex, 16) : undefined;
    if (code !== undefined) return code <= 0x10ffff ? String.fromCodePoint(code) : match;
    if (name) return XML_ENTITIES[name.toLowerCase()] ?? match;
    return match;
  });
}

function isXml(body: string, contentType: string): boolean {
  const type = contentType.toLowerCase();
  if (type.includes('xml') && !type.includes('xhtml')) return true;
  const head = body.trimStart().slice(0, 200).toLowerCase();
  return head.startsWith('<?xml') && !head.includes('<html');
}

function isHtml(body: string, contentType: string): boolean {
  const type = contentType.toLowerCase();
  if (type.includes('html')) return true;
  if (type && !type.startsWith('text/plain')) return false;
  return /<(html|body|a\s|head|!doctype)/i.test(body.slice(0, 2000));
}

function field(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  const result: unknown = Reflect.get(value, key);
  return result;
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function locOf(entry: unknown): string | undefined {
  if (typeof entry === 'string') return entry;
  const loc = field(entry, 'loc');
  return typeof loc === 'string' ? loc : undefined;
}
