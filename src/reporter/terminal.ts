import chalk from 'chalk';
import type { DiscoveryResult, PhaseStatus } from '../discovery/types.js';
import { formatDuration } from '../utils/shared.js';

const TERMINATION_LABELS: Record<DiscoveryResult['termination'], string> = {
  exhausted: 'all phases finished',
  'max-pages': 'page ceiling reached',
  deadline: 'deadline reached',
  cancelled: 'cancelled',
};

export function printTerminalReport(result: DiscoveryResult): void {
  console.log();
  console.log(chalk.bold('═══════════════════════════════════════════════'));
  console.log(chalk.bold('  urlscout Discovery Report'));
  console.log(chalk.bold('═══════════════════════════════════════════════'));
  console.log();

  console.log(chalk.bold.underline('Summary'));
  console.log(`  Base URL:     ${result.baseUrl}`);
  console.log(`  Domain:       ${result.baseDomain}`);
  console.log(`  Duration:     ${formatDuration(result.startedAt, result.completedAt)}`);
  console.log(`  URLs:         ${chalk.bold(String(result.totalUrls))}`);
  console.log(`  Out of scope: ${result.outOfScopeCount}`);
  console.log(`  Requests:     ${result.fetchStats.requests} (${result.fetchStats.retried} retried, ${result.fetchStats.failures} failed)`);
  console.log(`  Keywords:     ${result.llmKeywordsGenerated}`);
  console.log(`  Stopped:      ${TERMINATION_LABELS[result.termination]}`);
  console.log();

  console.log(chalk.bold.underline('Phases'));
  for (const stats of result.phaseStats) {
    const color = statusColor(stats.status);
    const name = stats.phase.padEnd(20);
    if (stats.status === 'skipped') {
      console.log(`  ${color(stats.status.padEnd(10))} ${chalk.dim(name)}`);
      continue;
    }
    const errors = stats.errors.transient + stats.errors.permanent;
    console.log(
      `  ${color(stats.status.padEnd(10))} ${name} ` +
      `+${String(stats.admitted).padStart(5)}  ${chalk.dim(`${stats.requests} req, ${errors} err`)}`,
    );
    if (stats.error) console.log(`             ${chalk.red(stats.error)}`);
  }
  console.log();

  const { suggestionStats } = result;
  if (suggestionStats.requests > 0) {
    console.log(chalk.bold.underline('Suggestions'));
    console.log(
      `  ${suggestionStats.modelCalls} model calls, ${suggestionStats.cacheHits} cached, ` +
      `${suggestionStats.fallbacks} fallback, ${suggestionStats.budgetRemaining} left today`,
    );
    console.log();
  }

  if (result.totalUrls === 0) {
    console.log(chalk.yellow('  No URLs discovered.'));
    console.log();
  }
}

function statusColor(status: PhaseStatus): (text: string) => string {
  switch (status) {
    case 'completed': return chalk.green;
    case 'failed': return chalk.red;
    case 'cancelled': return chalk.yellow;
    case 'skipped': return chalk.gray;
  }
}
