import type { DiscoveryConfig, PhaseName, ScanProfile } from '../discovery/types.js';
import { PHASE_ORDER } from '../discovery/types.js';
import { DEFAULT_USER_AGENT } from '../crawler/fetcher.js';
import { DEFAULT_CACHE_DIR } from '../utils/ai-cache.js';
import { loadSearchWordlist } from './wordlists.js';

type ProfileSettings = Pick<
  DiscoveryConfig,
  | 'maxPages'
  | 'maxDepth'
  | 'maxConcurrent'
  | 'timeoutMs'
  | 'maxDirectoryProbes'
  | 'patternMaxVariants'
  | 'aggressiveMaxPages'
  | 'archiveMaxUrls'
  | 'phases'
>;

const QUICK_PHASES: PhaseName[] = [
  'sitemap_discovery',
  'robots_analysis',
  'recursive_crawl',
  'hierarchical_crawl',
  'directory_probing',
];

export const PROFILE_SETTINGS: Record<ScanProfile, ProfileSettings> = {
  quick: {
    maxPages: 100,
    maxDepth: 2,
    maxConcurrent: 4,
    timeoutMs: 10_000,
    maxDirectoryProbes: 60,
    patternMaxVariants: 20,
    aggressiveMaxPages: 50,
    archiveMaxUrls: 500,
    phases: QUICK_PHASES,
  },
  standard: {
    maxPages: 1000,
    maxDepth: 4,
    maxConcurrent: 8,
    timeoutMs: 15_000,
    maxDirectoryProbes: 200,
    patternMaxVariants: 50,
    aggressiveMaxPages: 300,
    archiveMaxUrls: 5000,
    phases: [...PHASE_ORDER],
  },
  deep: {
    maxPages: 10_000,
    maxDepth: 8,
    maxConcurrent: 16,
    timeoutMs: 20_000,
    maxDirectoryProbes: 400,
    patternMaxVariants: 200,
    aggressiveMaxPages: 2000,
    archiveMaxUrls: 50_000,
    phases: [...PHASE_ORDER],
  },
};

export function isScanProfile(value: unknown): value is ScanProfile {
  return value === 'quick' || value === 'standard' || value === 'deep';
}

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = parseInt(env[name] ?? '', 10);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

/**
 * Resolve the run configuration. `overrides` (CLI flags merged over the
 * config file) win over the environment, which wins over the profile.
 */
export function buildConfig(
  baseUrl: string,
  overrides: Partial<DiscoveryConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): DiscoveryConfig {
  const profile = overrides.profile ?? 'standard';
  const profileDefaults = PROFILE_SETTINGS[profile];

  return {
    baseUrl,
    profile,
    ...profileDefaults,
    phases: [...profileDefaults.phases],
    maxPages: envInt(env, 'URLSCOUT_MAX_PAGES') ?? profileDefaults.maxPages,
    timeoutMs: envInt(env, 'URLSCOUT_TIMEOUT') ?? profileDefaults.timeoutMs,
    deadlineMs: 0,
    requestsPerSecond: 10,
    rateLimits: {},
    retries: 2,
    backoffMs: 500,
    cooldownMs: 5000,
    userAgent: DEFAULT_USER_AGENT,
    includePdfs: false,
    includeImages: false,
    allowExtensions: [],
    denyExtensions: [],
    pathPrefix: '/',
    excludeHosts: [],
    respectRobots: true,
    useArchives: true,
    sitemapMaxDepth: 3,
    parentMatch: 'segment',
    patternMinSamples: 3,
    patternFailureRun: 3,
    formQueries: loadSearchWordlist().queries,
    useLlmKeywords: true,
    dailyLlmBudget: 50,
    minLlmSpacingMs: 1500,
    llmTimeoutMs: 30_000,
    cacheDir: DEFAULT_CACHE_DIR,
    ...overrides,
  };
}
