import { getDomain } from 'tldts';
import type { ScopeRule } from '../discovery/types.js';
import { fileExtension } from '../discovery/normalize.js';

export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.svg', '.ico', '.bmp', '.webp', '.avif', '.tif', '.tiff'];

export const DOCUMENT_EXTENSIONS = ['.pdf', '.doc', '.docx', '.xls', '.xlsx', '.ppt', '.pptx', '.odt', '.ods', '.rtf'];

/** Extensions kept out of the result unless explicitly allowed. */
export const DEFAULT_DENY_EXTENSIONS = [
  ...IMAGE_EXTENSIONS,
  ...DOCUMENT_EXTENSIONS,
  '.css', '.js', '.mjs', '.map',
  '.woff', '.woff2', '.ttf', '.eot', '.otf',
  '.mp3', '.mp4', '.avi', '.mov', '.wmv', '.flv', '.wav', '.ogg', '.webm',
  '.zip', '.rar', '.7z', '.tar', '.gz', '.tgz', '.exe', '.dmg', '.iso',
  '.xml', '.json', '.rss', '.atom', '.csv', '.txt',
];

export interface ScopeOptions {
  includePdfs?: boolean;
  includeImages?: boolean;
  allowExtensions?: string[];
  denyExtensions?: string[];
  pathPrefix?: string;
  excludeHosts?: string[];
}

/**
 * Registrable domain of a hostname per the Public Suffix List, private
 * suffixes included ("alice.github.io" stays "alice.github.io").
 * IP addresses and hosts without a public suffix are returned unchanged.
 */
export function registrableDomain(hostname: string): string {
  const host = hostname.toLowerCase().replace(/\.+$/, '');
  return getDomain(host, { allowPrivateDomains: true }) ?? host;
}

/**
 * Parse a host list such as "admin.example.com, *.cdn.example.com".
 * A leading `-` is accepted and ignored so exclusion lists read naturally.
 */
export function parseHostPatterns(input: string): string[] {
  return input
    .split(',')
    .map((s) => s.trim().replace(/^-/, '').toLowerCase())
    .filter(Boolean);
}

/** Normalize a path prefix to "/segment/…/" form. */
export function normalizePathPrefix(prefix: string | undefined): string {
  const trimmed = (prefix ?? '').trim();
  if (!trimmed || trimmed === '/') return '/';
  const withLeading = trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
  return withLeading.endsWith('/') ? withLeading : `${withLeading}/`;
}

function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Build the immutable scope rule for a run. Throws on a base URL that cannot
 * be parsed or that falls outside its own path prefix.
 */
export function buildScopeRule(baseUrl: string, options: ScopeOptions = {}): ScopeRule {
  const base = new URL(baseUrl);
  const pathPrefix = normalizePathPrefix(options.pathPrefix);

  const allow = new Set((options.allowExtensions ?? []).map(normalizeExtension));
  if (options.includePdfs) allow.add('.pdf');
  if (options.includeImages) IMAGE_EXTENSIONS.forEach((ext) => allow.add(ext));

  const deny = new Set([...DEFAULT_DENY_EXTENSIONS, ...(options.denyExtensions ?? []).map(normalizeExtension)]);

  const rule: ScopeRule = {
    baseUrl: base.href,
    host: base.hostname.toLowerCase(),
    registrableDomain: registrableDomain(base.hostname),
    pathPrefix,
    allowExtensions: Object.freeze([...allow]),
    denyExtensions: Object.freeze([...deny].filter((ext) => !allow.has(ext))),
    excludeHosts: Object.freeze((options.excludeHosts ?? []).map((h) => h.toLowerCase())),
  };

  if (!pathMatchesPrefix(base.pathname, pathPrefix)) {
    throw new RangeError(`Base URL path ${base.pathname} is outside the path prefix ${pathPrefix}`);
  }

  return Object.freeze(rule);
}

/** Segment-aware prefix match: "/docs" and "/docs/x" are under "/docs/", "/docsets" is not. */
export function pathMatchesPrefix(pathname: string, prefix: string): boolean {
  if (prefix === '/') return true;
  const path = pathname.endsWith('/') ? pathname : `${pathname}/`;
  return path.startsWith(prefix);
}

/**
 * Check if a URL is within the run's scope: http(s), same registrable domain,
 * host not excluded, under the path prefix, and not a denied file type.
 */
export function isInScope(url: string, scope: ScopeRule): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return false;

  const hostname = parsed.hostname.toLowerCase();
  if (registrableDomain(hostname) !== scope.registrableDomain) return false;

  for (const pattern of scope.excludeHosts) {
    if (matchesGlob(hostname, pattern)) return false;
  }

  if (!pathMatchesPrefix(parsed.pathname, scope.pathPrefix)) return false;

  const ext = fileExtension(parsed.pathname);
  if (ext) {
    if (scope.allowExtensions.includes(ext)) return true;
    if (scope.denyExtensions.includes(ext)) return false;
  }

  return true;
}

/** Simple glob matching for hostnames. Supports `*` as wildcard prefix. */
export function matchesGlob(hostname: string, pattern: string): boolean {
  if (hostname === pattern) return true;

  // *.example.com matches sub.example.com and example.com
  if (pattern.startsWith('*.')) {
    const suffix = pattern.slice(2);
    return hostname === suffix || hostname.endsWith('.' + suffix);
  }

  return false;
}
