import { join } from 'node:path';
import type {
  DiscoveryConfig,
  DiscoveryPhase,
  DiscoveryResult,
  PhaseContext,
  PhaseName,
  PhaseStats,
  ScopeRule,
  TerminationReason,
} from './types.js';
import { PHASE_ORDER } from './types.js';
import { OrchestrationFatalError } from './errors.js';
import { Frontier } from './frontier.js';
import { DiscoveryHints } from './hints.js';
import { PHASE_REGISTRY } from './phases/index.js';
import { Fetcher, type FetchImpl } from '../crawler/fetcher.js';
import { LinkExtractor } from '../crawler/extractor.js';
import { createArchiveSources, type ArchiveSource } from '../crawler/archive.js';
import { SuggestionService } from '../ai/suggestions.js';
import { SuggestionBudget } from '../ai/budget.js';
import { createAnthropicProvider, TokenCounter, type SuggestionProvider } from '../ai/client.js';
import { fallbackSuggestions } from '../ai/fallback.js';
import { AICache } from '../utils/ai-cache.js';
import type { RequestLogger } from '../utils/request-logger.js';
import { buildScopeRule } from '../utils/scope.js';
import { errorMessage } from '../utils/shared.js';
import { log } from '../utils/logger.js';

export type OrchestratorState = 'idle' | 'running' | 'completed' | 'aborted';

/** Collaborators a caller (usually a test) can replace. */
export interface OrchestratorDeps {
  fetchImpl?: FetchImpl;
  /** null disables the model; undefined builds the Anthropic provider from the environment */
  provider?: SuggestionProvider | null;
  archives?: ArchiveSource[];
  phases?: DiscoveryPhase[];
  requestLogger?: RequestLogger;
  onPhaseComplete?: (stats: PhaseStats) => void;
}

/**
 * Runs the configured phases against one shared frontier, in canonical
 * order, and assembles the result.
 *
 * idle → running → completed, or aborted on an OrchestrationFatalError.
 * Hitting the page ceiling, the deadline or cancel() lets the current phase
 * drain and marks every later phase skipped.
 */
export class DiscoveryOrchestrator {
  private runState: OrchestratorState = 'idle';
  private activePhase: PhaseName | null = null;
  private termination: TerminationReason | null = null;
  private readonly controller = new AbortController();
  /** Tokens spent by the model provider this orchestrator creates */
  readonly tokens = new TokenCounter();

  constructor(
    private readonly config: DiscoveryConfig,
    private readonly deps: OrchestratorDeps = {},
  ) {}

  get state(): OrchestratorState {
    return this.runState;
  }

  get currentPhase(): PhaseName | null {
    return this.activePhase;
  }

  /** Stop dispatching work. run() still resolves with what was found. */
  cancel(): void {
    this.terminate('cancelled');
    this.controller.abort();
  }

  async run(): Promise<DiscoveryResult> {
    if (this.runState !== 'idle') {
      throw new OrchestrationFatalError(`Orchestrator already ${this.runState}`);
    }
    this.runState = 'running';
    const startedAt = new Date();

    let scope: ScopeRule;
    try {
      scope = this.buildScope();
    } catch (err) {
      this.runState = 'aborted';
      throw err;
    }

    const ctx = this.createContext(scope);
    if (!ctx.frontier.admit(scope.baseUrl, '', 'seed')) {
      this.runState = 'aborted';
      throw new OrchestrationFatalError(`Base URL ${scope.baseUrl} is not admissible under its own scope`);
    }

    const deadline = this.config.deadlineMs > 0
      ? setTimeout(() => {
          this.terminate('deadline');
          this.controller.abort();
        }, this.config.deadlineMs)
      : undefined;

    const phaseStats: PhaseStats[] = [];
    try {
      for (const phase of this.selectPhases()) {
        if (this.termination) {
          phaseStats.push(skippedStats(phase.name));
          log.phase(phase.name, 'skipped', `(${this.termination})`);
          continue;
        }

        const stats = await this.runPhase(phase, ctx);
        phaseStats.push(stats);
        this.deps.onPhaseComplete?.(stats);

        try {
          ctx.frontier.verifyIntegrity();
        } catch (err) {
          this.runState = 'aborted';
          throw new OrchestrationFatalError(`Frontier integrity check failed after ${phase.name}: ${errorMessage(err)}`);
        }
      }
    } finally {
      if (deadline) clearTimeout(deadline);
      this.activePhase = null;
      this.deps.requestLogger?.flush();
    }

    this.runState = 'completed';
    return buildResult({
      scope,
      frontier: ctx.frontier,
      hints: ctx.hints,
      fetcher: ctx.fetcher,
      suggestions: ctx.suggestions,
      phaseStats,
      startedAt,
      completedAt: new Date(),
      termination: this.termination ?? 'exhausted',
    });
  }

  private buildScope(): ScopeRule {
    const { baseUrl } = this.config;
    let parsed: URL;
    try {
      parsed = new URL(baseUrl);
    } catch {
      throw new OrchestrationFatalError(`Invalid base URL: ${baseUrl}`);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new OrchestrationFatalError(`Only http and https base URLs are supported: ${baseUrl}`);
    }
    try {
      return buildScopeRule(baseUrl, {
        includePdfs: this.config.includePdfs,
        includeImages: this.config.includeImages,
        allowExtensions: this.config.allowExtensions,
        denyExtensions: this.config.denyExtensions,
        pathPrefix: this.config.pathPrefix,
        excludeHosts: this.config.excludeHosts,
      });
    } catch (err) {
      throw new OrchestrationFatalError(`Scope misconfigured: ${errorMessage(err)}`);
    }
  }

  private createContext(scope: ScopeRule): PhaseContext {
    const { config, deps } = this;
    const signal = this.controller.signal;
    const requestLogger = deps.requestLogger;

    const fetcher = new Fetcher({
      maxConcurrent: config.maxConcurrent,
      requestsPerSecond: config.requestsPerSecond,
      rateLimits: config.rateLimits,
      retries: config.retries,
      backoffMs: config.backoffMs,
      cooldownMs: config.cooldownMs,
      timeoutMs: config.timeoutMs,
      userAgent: config.userAgent,
      fetchImpl: deps.fetchImpl,
      signal,
      onRequest: requestLogger ? (entry) => requestLogger.log(entry) : undefined,
    });

    const provider = deps.provider === undefined ? createAnthropicProvider({ tokens: this.tokens }) : deps.provider;
    const suggestions = new SuggestionService({
      provider,
      budget: new SuggestionBudget({
        dailyLimit: config.dailyLlmBudget,
        minSpacingMs: config.minLlmSpacingMs,
        statePath: config.cacheDir ? join(config.cacheDir, 'suggestion-budget.json') : null,
      }),
      enabled: config.useLlmKeywords,
      cache: config.cacheDir ? new AICache({ cacheDir: config.cacheDir }) : null,
      timeoutMs: config.llmTimeoutMs,
      fallback: () => fallbackSuggestions(scope.baseUrl),
      signal,
    });

    const frontier = new Frontier({
      scope,
      maxPages: config.maxPages,
      onLimit: () => {
        log.warn(`Page ceiling of ${config.maxPages} reached; finishing current phase`);
        this.terminate('max-pages');
      },
    });

    return {
      frontier,
      fetcher,
      extractor: new LinkExtractor(),
      suggestions,
      config,
      scope,
      hints: new DiscoveryHints(),
      archives: deps.archives ?? createArchiveSources(fetcher, Math.min(1000, config.archiveMaxUrls)),
      signal,
    };
  }

  /** Configured phases, always in canonical order. */
  private selectPhases(): DiscoveryPhase[] {
    const wanted = new Set(this.config.phases);
    return (this.deps.phases ?? PHASE_REGISTRY)
      .filter((phase) => wanted.has(phase.name))
      .sort((a, b) => PHASE_ORDER.indexOf(a.name) - PHASE_ORDER.indexOf(b.name));
  }

  private async runPhase(phase: DiscoveryPhase, ctx: PhaseContext): Promise<PhaseStats> {
    this.activePhase = phase.name;
    const started = Date.now();
    const requestsBefore = ctx.fetcher.getStats().requests;

    try {
      const stats = await phase.run(ctx);
      log.phase(phase.name, stats.status, `+${stats.admitted} URLs, ${stats.requests} requests (${formatMs(stats.durationMs)})`);
      return stats;
    } catch (err) {
      const message = errorMessage(err);
      log.phase(phase.name, 'failed', message);
      return {
        ...skippedStats(phase.name),
        status: 'failed',
        requests: ctx.fetcher.getStats().requests - requestsBefore,
        durationMs: Date.now() - started,
        error: message,
      };
    }
  }

  private terminate(reason: TerminationReason): void {
    this.termination ??= reason;
  }
}

function skippedStats(phase: PhaseName): PhaseStats {
  return {
    phase,
    status: 'skipped',
    admitted: 0,
    duplicates: 0,
    outOfScope: 0,
    invalid: 0,
    requests: 0,
    errors: { transient: 0, permanent: 0, parse: 0, suggestion: 0 },
    durationMs: 0,
  };
}

function formatMs(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

interface ResultInput {
  scope: ScopeRule;
  frontier: Frontier;
  hints: DiscoveryHints;
  fetcher: Fetcher;
  suggestions: SuggestionService;
  phaseStats: PhaseStats[];
  startedAt: Date;
  completedAt: Date;
  termination: TerminationReason;
}

/** Immutable result from the final frontier snapshot. */
export function buildResult(input: ResultInput): DiscoveryResult {
  const records = input.frontier.snapshot();
  for (const record of records) {
    Object.freeze(record.phases);
    Object.freeze(record);
  }
  const discoveryStats: Partial<Record<PhaseName, number>> = {};
  for (const stats of input.phaseStats) {
    if (stats.status !== 'skipped') discoveryStats[stats.phase] = stats.admitted;
  }

  return Object.freeze({
    baseUrl: input.scope.baseUrl,
    baseDomain: input.scope.host,
    startedAt: input.startedAt.toISOString(),
    completedAt: input.completedAt.toISOString(),
    durationSeconds: Math.round((input.completedAt.getTime() - input.startedAt.getTime()) / 10) / 100,
    totalUrls: records.length,
    urls: Object.freeze(records.map((r) => r.url)),
    records: Object.freeze(records),
    phaseStats: Object.freeze(input.phaseStats.map((s) => Object.freeze({ ...s }))),
    discoveryStats: Object.freeze(discoveryStats),
    llmKeywordsGenerated: input.hints.keywords.length,
    outOfScopeCount: input.frontier.getStats().outOfScope,
    termination: input.termination,
    fetchStats: Object.freeze(input.fetcher.getStats()),
    suggestionStats: Object.freeze(input.suggestions.getStats()),
  });
}

/** One-shot helper: build an orchestrator and run it. */
export function discover(config: DiscoveryConfig, deps: OrchestratorDeps = {}): Promise<DiscoveryResult> {
  return new DiscoveryOrchestrator(config, deps).run();
}
