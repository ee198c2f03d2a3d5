import type { FetchImpl, FetchMethod } from '../../src/crawler/fetcher.js';

export interface FakeRoute {
  status?: number;
  body?: string;
  contentType?: string;
  /** Reported as the final URL, as if the server had redirected there */
  redirectTo?: string;
  /** Methods the route answers; others get 405 */
  methods?: FetchMethod[];
  /** Throw like fetch does when the connection fails */
  fail?: 'network' | 'dns';
}

/**
 * Routes keyed by absolute URL, or by path plus query string. The "*" route
 * answers everything else; without it unknown URLs get a 404.
 */
export type FakeSite = Record<string, FakeRoute | string>;

export interface FakeFetch {
  impl: FetchImpl;
  /** "METHOD url" for every request, in order */
  requests: string[];
}

function defaultContentType(body: string): string {
  return body.trimStart().startsWith('<?xml') ? 'application/xml' : 'text/html; charset=utf-8';
}

function thrownFor(kind: 'network' | 'dns'): Error {
  const code = kind === 'dns' ? 'ENOTFOUND' : 'ECONNREFUSED';
  return new TypeError('fetch failed', { cause: Object.assign(new Error(code), { code }) });
}

/** In-process stand-in for a web site, served through the Fetcher's fetchImpl hook. */
export function fakeFetch(site: FakeSite): FakeFetch {
  const requests: string[] = [];

  const impl: FetchImpl = async (url, init) => {
    const method = init.method ?? 'GET';
    requests.push(`${method} ${url}`);

    const u = new URL(url);
    const entry = site[u.href] ?? site[u.pathname + u.search] ?? site['*'];
    const route: FakeRoute = typeof entry === 'string' ? { body: entry } : entry ?? { status: 404, body: 'Not Found' };

    if (route.fail) throw thrownFor(route.fail);
    if (route.methods && !route.methods.some((m) => m === method)) {
      return new Response(null, { status: 405 });
    }

    const body = route.body ?? '';
    const response = new Response(method === 'HEAD' ? null : body, {
      status: route.status ?? 200,
      headers: { 'content-type': route.contentType ?? defaultContentType(body) },
    });
    if (route.redirectTo) {
      Object.defineProperty(response, 'url', { value: new URL(route.redirectTo, url).href });
    }
    return response;
  };

  return { impl, requests };
}

export function html(body: string, title = 'Test page'): string {
  return `<!doctype html><html><head><title>${title}</title></head><body>${body}</body></html>`;
}

export function links(...paths: string[]): string {
  return html(paths.map((p) => `<a href="${p}">${p}</a>`).join('\n'));
}

export function urlset(...urls: string[]): string {
  const entries = urls.map((u) => `<url><loc>${u}</loc></url>`).join('');
  return `<?xml version="1.0" encoding="UTF-8"?><urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">${entries}</urlset>`;
}

export function sitemapIndex(...urls: string[]): string {
  const entries = urls.map((u) => `<sitemap><loc>${u}</loc></sitemap>`).join('');
  return `<?xml version="1.0" encoding="UTF-8"?><sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">${entries}</sitemapindex>`;
}
