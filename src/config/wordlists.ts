import { readFileSync } from 'node:fs';

export interface SearchEndpoint {
  path: string;
  param: string;
}

export interface SearchWordlist {
  endpoints: SearchEndpoint[];
  queries: string[];
}

const cache = new Map<string, unknown>();

function readData(file: string): unknown {
  const hit = cache.get(file);
  if (hit !== undefined) return hit;
  const parsed: unknown = JSON.parse(readFileSync(new URL(`../../data/${file}`, import.meta.url), 'utf-8'));
  cache.set(file, parsed);
  return parsed;
}

function stringList(value: unknown, key: string): string[] {
  if (typeof value !== 'object' || value === null || !(key in value)) return [];
  const list: unknown = Reflect.get(value, key);
  return Array.isArray(list) ? list.filter((v): v is string => typeof v === 'string') : [];
}

/** Directory names probed by directory_probing, without slashes. */
export function loadDirectoryWordlist(): string[] {
  return stringList(readData('directories.json'), 'directories');
}

/** Static keyword list used whenever the suggestion model is unavailable. */
export function loadFallbackKeywords(): string[] {
  return stringList(readData('fallback-keywords.json'), 'keywords');
}

export function loadSearchWordlist(): SearchWordlist {
  const data = readData('search.json');
  const endpoints: SearchEndpoint[] = [];
  const raw: unknown = typeof data === 'object' && data !== null ? Reflect.get(data, 'endpoints') : undefined;
  if (Array.isArray(raw)) {
    for (const entry of raw) {
      const path: unknown = typeof entry === 'object' && entry !== null ? Reflect.get(entry, 'path') : undefined;
      const param: unknown = typeof entry === 'object' && entry !== null ? Reflect.get(entry, 'param') : undefined;
      if (typeof path === 'string' && typeof param === 'string') endpoints.push({ path, param });
    }
  }
  return { endpoints, queries: stringList(data, 'queries') };
}
