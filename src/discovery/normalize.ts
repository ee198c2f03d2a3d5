/**
 * Query parameters that only carry attribution or click tracking. They never
 * change what a page serves, so they are dropped from canonical URLs.
 * Any parameter starting with `utm_` is dropped as well.
 */
export const TRACKING_PARAMS: ReadonlySet<string> = new Set([
  'gclid',
  'gclsrc',
  'dclid',
  'gbraid',
  'wbraid',
  'fbclid',
  'msclkid',
  'yclid',
  'twclid',
  'igshid',
  'mc_cid',
  'mc_eid',
  '_ga',
  '_gl',
  '_hsenc',
  '_hsmi',
  'mkt_tok',
  'oly_anon_id',
  'oly_enc_id',
  'vero_id',
]);

export function isTrackingParam(name: string): boolean {
  const key = name.toLowerCase();
  return key.startsWith('utm_') || TRACKING_PARAMS.has(key);
}

/**
 * Canonical form used as the frontier key.
 *
 * scheme + lower-case host (default port, credentials and trailing dot removed)
 * + path without trailing slashes (root keeps its "/") + query without tracking
 * parameters, sorted by name then value. Fragments are dropped.
 *
 * Returns null for anything that is not an http(s) URL.
 */
export function normalizeUrl(raw: string, base?: string): string | null {
  const input = raw.trim();
  if (!input) return null;

  let u: URL;
  try {
    u = base ? new URL(input, base) : new URL(input);
  } catch {
    return null;
  }

  if (u.protocol !== 'http:' && u.protocol !== 'https:') return null;
  if (!u.hostname) return null;

  u.username = '';
  u.password = '';
  u.hash = '';
  if (u.hostname.endsWith('.')) {
    u.hostname = u.hostname.replace(/\.+$/, '');
  }

  if (u.pathname.length > 1) {
    u.pathname = u.pathname.replace(/\/+$/, '') || '/';
  }

  const params = [...u.searchParams]
    .filter(([name]) => !isTrackingParam(name))
    .sort(([ak, av], [bk, bv]) => (ak === bk ? compare(av, bv) : compare(ak, bk)));
  const query = new URLSearchParams(params).toString();
  u.search = query ? `?${query}` : '';

  return u.href;
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Path segments of a URL, without empty segments. */
export function pathSegments(url: string): string[] {
  try {
    return new URL(url).pathname.split('/').filter(Boolean);
  } catch {
    return [];
  }
}

/** Lower-case file extension of the last path segment, with its dot ("" when none). */
export function fileExtension(pathname: string): string {
  const last = pathname.split('/').pop() ?? '';
  const dot = last.lastIndexOf('.');
  if (dot <= 0 || dot === last.length - 1) return '';
  return last.slice(dot).toLowerCase();
}
