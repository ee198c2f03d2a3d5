import { writeFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { DiscoveryResult, PhaseName } from '../discovery/types.js';
import { log } from '../utils/logger.js';

export interface PhaseArtifact {
  timestamp: string;
  source_module: PhaseName | 'consolidated';
  base_domain: string;
  total_urls: number;
  urls: string[];
}

export interface ConsolidatedArtifact extends PhaseArtifact {
  source_module: 'consolidated';
  discovery_time_seconds: number;
  llm_keywords_generated: number;
  discovery_stats: Partial<Record<PhaseName, number>>;
  termination: DiscoveryResult['termination'];
  phases: Array<{
    phase: PhaseName;
    status: string;
    admitted: number;
    requests: number;
    errors: { transient: number; permanent: number; parse: number; suggestion: number };
    duration_ms: number;
    error?: string;
  }>;
  records: Array<{ url: string; phases: string[]; first_seen_at: string; depth: number; status?: number }>;
}

/** Every URL the phase found, including ones another phase found first. */
export function buildPhaseArtifact(result: DiscoveryResult, phase: PhaseName): PhaseArtifact {
  const urls = result.records.filter((r) => r.phases.includes(phase)).map((r) => r.url);
  return {
    timestamp: result.completedAt,
    source_module: phase,
    base_domain: result.baseDomain,
    total_urls: urls.length,
    urls,
  };
}

export function buildConsolidatedArtifact(result: DiscoveryResult): ConsolidatedArtifact {
  return {
    timestamp: result.completedAt,
    source_module: 'consolidated',
    base_domain: result.baseDomain,
    total_urls: result.totalUrls,
    urls: [...result.urls],
    discovery_time_seconds: result.durationSeconds,
    llm_keywords_generated: result.llmKeywordsGenerated,
    discovery_stats: { ...result.discoveryStats },
    termination: result.termination,
    phases: result.phaseStats.map((s) => ({
      phase: s.phase,
      status: s.status,
      admitted: s.admitted,
      requests: s.requests,
      errors: { ...s.errors },
      duration_ms: s.durationMs,
      ...(s.error ? { error: s.error } : {}),
    })),
    records: result.records.map((r) => ({
      url: r.url,
      phases: [...r.phases],
      first_seen_at: r.firstSeenAt,
      depth: r.depth,
      ...(r.status !== undefined ? { status: r.status } : {}),
    })),
  };
}

/** Directory name for one run's artifacts, e.g. "example.com-20240501T101500". */
export function runId(baseDomain: string, startedAt: string): string {
  const stamp = startedAt.replace(/[-:]/g, '').replace(/\.\d+Z$/, '');
  return `${baseDomain}-${stamp}`;
}

/** Write consolidated.json plus one file per phase that ran. Returns the paths written. */
export function writeJsonReport(result: DiscoveryResult, dir: string): string[] {
  mkdirSync(dir, { recursive: true });
  const written: string[] = [];

  const consolidatedPath = join(dir, 'consolidated.json');
  writeFileSync(consolidatedPath, JSON.stringify(buildConsolidatedArtifact(result), null, 2), 'utf-8');
  written.push(consolidatedPath);

  for (const stats of result.phaseStats) {
    if (stats.status === 'skipped') continue;
    const path = join(dir, `${stats.phase}.json`);
    writeFileSync(path, JSON.stringify(buildPhaseArtifact(result, stats.phase), null, 2), 'utf-8');
    written.push(path);
  }

  log.info(`JSON report written to: ${dir}`);
  return written;
}
