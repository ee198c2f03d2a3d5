import { loadFallbackKeywords } from '../config/wordlists.js';
import { registrableDomain } from '../utils/scope.js';

const GENERIC_LABELS = new Set(['www', 'com', 'net', 'org', 'co', 'ac', 'go', 'or', 'ne', 'lg', 'gov', 'edu']);

/**
 * Deterministic suggestion set used whenever the model is unavailable:
 * the static keyword list plus the meaningful labels of the site's domain.
 */
export function fallbackSuggestions(baseUrl?: string): string[] {
  const items = [...loadFallbackKeywords()];
  if (baseUrl) {
    for (const label of domainLabels(baseUrl)) {
      if (!items.includes(label)) items.push(label);
    }
  }
  return items;
}

function domainLabels(baseUrl: string): string[] {
  let hostname: string;
  try {
    hostname = new URL(baseUrl).hostname.toLowerCase();
  } catch {
    return [];
  }
  const domain = registrableDomain(hostname);
  return hostname
    .split('.')
    .filter((label) => label.length > 1 && !GENERIC_LABELS.has(label) && !domain.endsWith(`.${label}`));
}
