import { fileExtension } from '../normalize.js';

/** Filenames tried with every extension the site already uses. */
export const COMMON_FILENAMES = [
  'index', 'default', 'main', 'home', 'about', 'contact',
  'info', 'help', 'search', 'sitemap', 'news', 'blog',
];

const MAX_EXTENSIONS = 3;

export interface PathCandidates {
  /** Spelling variants of frequently used directories */
  segments: string[];
  /** Directory names moved under sibling parents */
  structures: string[];
  /** Common filenames with the site's own extensions */
  files: string[];
}

/**
 * Directory paths ("/a/", "/a/b/") above each URL, with how many of the URLs
 * sit somewhere below them. The last segment of a URL is its page, never a
 * directory.
 */
export function knownDirectories(urls: Iterable<string>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const url of urls) {
    let pathname: string;
    try {
      pathname = new URL(url).pathname;
    } catch {
      continue;
    }
    const segments = pathname.split('/').filter(Boolean);
    let dir = '/';
    for (const segment of segments.slice(0, -1)) {
      dir += `${segment}/`;
      counts.set(dir, (counts.get(dir) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Plural/singular, separator and case spellings of one path segment.
 * Mixed-case segments get their lower-case form; lower-case ones are not
 * capitalized, since case-insensitive servers answer those with the same page.
 */
export function segmentVariants(segment: string): string[] {
  if (/^\d+$/.test(segment)) return [];
  const lower = segment.toLowerCase();
  const out = new Set<string>();

  if (lower.endsWith('ies') && segment.length > 4) {
    out.add(`${segment.slice(0, -3)}y`);
  } else if (lower.endsWith('s') && !lower.endsWith('ss') && segment.length > 2) {
    out.add(segment.slice(0, -1));
  } else if (/[^aeiou]y$/.test(lower)) {
    out.add(`${segment.slice(0, -1)}ies`);
  } else if (!lower.endsWith('s')) {
    out.add(`${segment}s`);
  }

  if (/[-_]/.test(segment)) {
    out.add(segment.replace(/_/g, '-'));
    out.add(segment.replace(/-/g, '_'));
    out.add(segment.replace(/[-_]/g, ''));
  }

  if (segment !== lower) out.add(lower);

  out.delete(segment);
  return [...out];
}

/**
 * Directory names seen under one parent, tried under every other parent at
 * the same depth: "/en/news/" and "/fr/events/" give "/en/events/" and
 * "/fr/news/".
 */
export function recombineDirectories(dirs: Iterable<string>): string[] {
  const known = new Set(dirs);
  const byDepth = new Map<number, { parents: string[]; names: string[] }>();

  for (const dir of known) {
    const segments = dir.split('/').filter(Boolean);
    if (segments.length < 2) continue;
    const parent = `/${segments.slice(0, -1).join('/')}/`;
    const name = segments[segments.length - 1];
    let group = byDepth.get(segments.length);
    if (!group) {
      group = { parents: [], names: [] };
      byDepth.set(segments.length, group);
    }
    if (!group.parents.includes(parent)) group.parents.push(parent);
    if (!group.names.includes(name)) group.names.push(name);
  }

  const out: string[] = [];
  for (const { parents, names } of byDepth.values()) {
    if (parents.length < 2) continue;
    for (const parent of parents) {
      for (const name of names) {
        const candidate = `${parent}${name}/`;
        if (!known.has(candidate) && !out.includes(candidate)) out.push(candidate);
      }
    }
  }
  return out;
}

/** File extensions in use, most frequent first, ties in first-seen order. */
export function seenExtensions(urls: Iterable<string>, limit = MAX_EXTENSIONS): string[] {
  const counts = new Map<string, number>();
  for (const url of urls) {
    let pathname: string;
    try {
      pathname = new URL(url).pathname;
    } catch {
      continue;
    }
    const ext = fileExtension(pathname);
    if (ext) counts.set(ext, (counts.get(ext) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([ext]) => ext);
}

/**
 * Exploration candidates from the URLs found so far, as absolute URLs.
 * Segment variants come only from directories holding at least `minSamples`
 * URLs; each generator yields at most `perGenerator` candidates.
 */
export function explorationCandidates(
  urls: readonly string[],
  root: string,
  minSamples: number,
  perGenerator: number,
): PathCandidates {
  const dirs = knownDirectories(urls);
  const resolve = (path: string): string => new URL(path, root).href;

  const segments: string[] = [];
  for (const [dir, count] of dirs) {
    if (count < minSamples) continue;
    const parts = dir.split('/').filter(Boolean);
    const parent = `/${parts.slice(0, -1).map((p) => `${p}/`).join('')}`;
    for (const variant of segmentVariants(parts[parts.length - 1])) {
      const candidate = resolve(`${parent}${variant}/`);
      if (!segments.includes(candidate)) segments.push(candidate);
    }
  }

  const structures = recombineDirectories(dirs.keys()).map(resolve);

  const files: string[] = [];
  for (const ext of seenExtensions(urls)) {
    for (const name of COMMON_FILENAMES) files.push(new URL(`${name}${ext}`, root).href);
  }

  return {
    segments: segments.slice(0, perGenerator),
    structures: structures.slice(0, perGenerator),
    files: files.slice(0, perGenerator),
  };
}
