import type { DiscoveryPhase, PhaseContext } from '../types.js';
import type { FormInfo } from '../../crawler/extractor.js';
import { FetchError } from '../errors.js';
import { loadSearchWordlist } from '../../config/wordlists.js';
import { isInScope } from '../../utils/scope.js';
import { log } from '../../utils/logger.js';
import { PhaseRecorder, forEachUntilStopped, origin } from './shared.js';

/** A GET form reduced to what is needed to submit it. */
export interface SearchForm {
  action: string;
  /** Field that receives the query */
  queryField: string;
  /** Fields sent unchanged (hidden inputs, preselected values) */
  fixed: Array<[string, string]>;
}

const TEXT_TYPES = new Set(['text', 'search', 'input', 'textarea']);
const FIXED_TYPES = new Set(['hidden', 'select', 'radio', 'checkbox']);
const SEARCH_LIKE = /search|find|query|suche|recherche|busca|kensaku/i;
const MAX_SEARCH_PAGES = 10;

/** GET forms with a text or search input. POST forms are never submitted. */
export function searchForms(forms: readonly FormInfo[]): SearchForm[] {
  const out: SearchForm[] = [];
  for (const form of forms) {
    if (form.method !== 'GET') continue;
    const text = form.inputs.find((i) => i.name && TEXT_TYPES.has(i.type));
    if (!text) continue;
    const fixed: Array<[string, string]> = form.inputs
      .filter((i) => i !== text && i.name && FIXED_TYPES.has(i.type) && i.value)
      .map((i) => [i.name, i.value]);
    out.push({ action: form.action, queryField: text.name, fixed });
  }
  return out;
}

/** The URL a browser would request when submitting `query` through the form. */
export function submissionUrl(form: SearchForm, query: string): string {
  const u = new URL(form.action);
  u.hash = '';
  const params = new URLSearchParams();
  for (const [name, value] of form.fixed) params.append(name, value);
  params.set(form.queryField, query);
  u.search = params.toString();
  return u.href;
}

/** Configured queries plus the site's own name, e.g. "example" for example.co.uk. */
export function searchQueries(ctx: PhaseContext): string[] {
  const label = ctx.scope.registrableDomain.split('.')[0];
  const queries = [...ctx.config.formQueries];
  if (label && !queries.includes(label)) queries.push(label);
  return queries;
}

async function collectForms(rec: PhaseRecorder, ctx: PhaseContext): Promise<SearchForm[]> {
  const pages = [
    ctx.scope.baseUrl,
    ...ctx.frontier
      .inScopeRecords()
      .map((r) => r.url)
      .filter((url) => url !== ctx.scope.baseUrl && SEARCH_LIKE.test(new URL(url).pathname))
      .slice(0, MAX_SEARCH_PAGES),
  ];

  const found = new Map<string, SearchForm>();
  await forEachUntilStopped(rec, pages, ctx.config.maxConcurrent, async (page) => {
    const response = await rec.fetch(page);
    if (response instanceof FetchError) return;
    for (const form of searchForms(ctx.extractor.extractForms(response.body, response.finalUrl))) {
      if (!isInScope(form.action, ctx.scope)) continue;
      found.set(`${form.action}|${form.queryField}`, form);
    }
  });

  for (const endpoint of loadSearchWordlist().endpoints) {
    const action = new URL(endpoint.path, origin(ctx)).href;
    const key = `${action}|${endpoint.param}`;
    if (!found.has(key) && isInScope(action, ctx.scope)) {
      found.set(key, { action, queryField: endpoint.param, fixed: [] });
    }
  }
  return [...found.values()];
}

export const formsPhase: DiscoveryPhase = {
  name: 'form_probing',
  async run(ctx) {
    const rec = new PhaseRecorder('form_probing', ctx);
    const forms = await collectForms(rec, ctx);
    const queries = searchQueries(ctx);

    const submissions = forms.flatMap((form) => queries.map((query) => submissionUrl(form, query)));
    let answered = 0;

    await forEachUntilStopped(rec, submissions, ctx.config.maxConcurrent, async (url) => {
      const response = await rec.fetch(url);
      if (response instanceof FetchError) return;
      answered += 1;
      // Result links only; the query URL itself is not a page of the site
      const extracted = ctx.extractor.extract(response.body, response.contentType, response.finalUrl);
      rec.parseErrors(extracted.parseErrors);
      rec.admitAll(extracted.links.filter((link) => link !== url), url);
    });

    rec.assertReachable();
    log.info(`Form probing: ${forms.length} search forms, ${answered}/${submissions.length} result pages, ${rec.admitted} new URLs`);
    return rec.finish();
  },
};
