import type { Fetcher, FetchStats } from '../crawler/fetcher.js';
import type { LinkExtractor } from '../crawler/extractor.js';
import type { ArchiveSource } from '../crawler/archive.js';
import type { SuggestionService, SuggestionStats } from '../ai/suggestions.js';
import type { Frontier } from './frontier.js';
import type { DiscoveryHints } from './hints.js';

export const PHASE_ORDER = [
  'sitemap_discovery',
  'robots_analysis',
  'archive_seeding',
  'recursive_crawl',
  'hierarchical_crawl',
  'directory_probing',
  'pattern_generation',
  'aggressive_crawl',
  'form_probing',
] as const;

export type PhaseName = (typeof PHASE_ORDER)[number];

/** Provenance tag: a phase, or the orchestrator seeding the base URL. */
export type DiscoverySource = PhaseName | 'seed';

export type ScanProfile = 'quick' | 'standard' | 'deep';

export type ExpansionKind = 'crawl' | 'parent' | 'deep';

export type ParentMatch = 'segment' | 'prefix';

export interface CandidateUrl {
  raw: string;
  sourceUrl: string;
  phase: DiscoverySource;
  discoveredAt: string;
}

export interface UrlRecord {
  /** Canonical URL, unique across the frontier */
  url: string;
  /** Every source that found this URL, in arrival order. Append-only. */
  phases: DiscoverySource[];
  firstSeenAt: string;
  inScope: boolean;
  /** HTTP status when a fetch or probe verified the URL */
  status?: number;
  /** Link distance from the base URL (base = 0) */
  depth: number;
  sourceUrl: string;
}

export interface ScopeRule {
  readonly baseUrl: string;
  readonly host: string;
  readonly registrableDomain: string;
  /** Path the run is confined to, always starting and ending with "/" */
  readonly pathPrefix: string;
  /** Extensions (with dot, lower-case) always admitted */
  readonly allowExtensions: readonly string[];
  /** Extensions (with dot, lower-case) never admitted unless allowed */
  readonly denyExtensions: readonly string[];
  /** Host globs excluded even when they share the registrable domain */
  readonly excludeHosts: readonly string[];
}

export interface DiscoveryConfig {
  baseUrl: string;
  profile: ScanProfile;
  maxPages: number;
  maxDepth: number;
  maxConcurrent: number;
  /** Per-request timeout */
  timeoutMs: number;
  /** Overall wall-clock deadline for the run; 0 disables it */
  deadlineMs: number;
  requestsPerSecond: number;
  rateLimits: Record<string, number>;
  retries: number;
  backoffMs: number;
  cooldownMs: number;
  userAgent: string;
  includePdfs: boolean;
  includeImages: boolean;
  allowExtensions: string[];
  denyExtensions: string[];
  pathPrefix: string;
  excludeHosts: string[];
  respectRobots: boolean;
  useArchives: boolean;
  archiveMaxUrls: number;
  sitemapMaxDepth: number;
  parentMatch: ParentMatch;
  maxDirectoryProbes: number;
  patternMinSamples: number;
  patternFailureRun: number;
  patternMaxVariants: number;
  aggressiveMaxPages: number;
  formQueries: string[];
  useLlmKeywords: boolean;
  dailyLlmBudget: number;
  minLlmSpacingMs: number;
  llmTimeoutMs: number;
  /** Directory for the suggestion response cache and budget ledger; null keeps both in memory */
  cacheDir: string | null;
  /** Subset of phases to run, always executed in canonical order */
  phases: PhaseName[];
}

export interface ErrorCounts {
  transient: number;
  permanent: number;
  parse: number;
  suggestion: number;
}

export type PhaseStatus = 'completed' | 'failed' | 'skipped' | 'cancelled';

export interface PhaseStats {
  phase: PhaseName;
  status: PhaseStatus;
  /** New in-scope records this phase created */
  admitted: number;
  /** Admits that hit an existing record */
  duplicates: number;
  outOfScope: number;
  invalid: number;
  requests: number;
  errors: ErrorCounts;
  durationMs: number;
  error?: string;
}

export interface PhaseContext {
  frontier: Frontier;
  fetcher: Fetcher;
  extractor: LinkExtractor;
  suggestions: SuggestionService;
  config: DiscoveryConfig;
  scope: ScopeRule;
  hints: DiscoveryHints;
  archives: ArchiveSource[];
  signal: AbortSignal;
}

/** A discovery strategy. Its only output is admit calls on the frontier. */
export interface DiscoveryPhase {
  name: PhaseName;
  run(ctx: PhaseContext): Promise<PhaseStats>;
}

export type TerminationReason = 'exhausted' | 'max-pages' | 'deadline' | 'cancelled';

export interface DiscoveryResult {
  readonly baseUrl: string;
  readonly baseDomain: string;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly durationSeconds: number;
  readonly totalUrls: number;
  readonly urls: readonly string[];
  readonly records: readonly Readonly<UrlRecord>[];
  readonly phaseStats: readonly Readonly<PhaseStats>[];
  /** New URLs per phase */
  readonly discoveryStats: Readonly<Partial<Record<PhaseName, number>>>;
  readonly llmKeywordsGenerated: number;
  readonly outOfScopeCount: number;
  readonly termination: TerminationReason;
  readonly fetchStats: Readonly<FetchStats>;
  readonly suggestionStats: Readonly<SuggestionStats>;
}
