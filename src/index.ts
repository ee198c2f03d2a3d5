#!/usr/bin/env node
import { config as loadEnv } from 'dotenv';
loadEnv({ path: '.env.local', override: false });
loadEnv({ override: false }); // fallback to .env

import { program, type Command } from 'commander';
import chalk from 'chalk';
import { resolve, join } from 'node:path';
import { readFileSync } from 'node:fs';
import { DiscoveryOrchestrator } from './discovery/orchestrator.js';
import { OrchestrationFatalError } from './discovery/errors.js';
import type { DiscoveryConfig, PhaseName } from './discovery/types.js';
import { PHASE_ORDER } from './discovery/types.js';
import { buildConfig, isScanProfile } from './config/defaults.js';
import { loadConfigFile, configFileOverrides } from './config/file.js';
import { printTerminalReport } from './reporter/terminal.js';
import { writeJsonReport, runId } from './reporter/json.js';
import { writeUrlList } from './reporter/text.js';
import { validateCliOptions, type CliOptions } from './utils/cli-validation.js';
import { parseHostPatterns } from './utils/scope.js';
import { RequestLogger } from './utils/request-logger.js';
import { errorMessage } from './utils/shared.js';
import { log, setLogLevel } from './utils/logger.js';

const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
  ? pkg.version
  : '0.0.0';

interface DiscoverOptions extends CliOptions {
  includePdfs?: boolean;
  includeImages?: boolean;
  excludeHosts?: string;
  llm: boolean;
  archives: boolean;
  ignoreRobots?: boolean;
  output?: string;
  logRequests?: boolean;
  verbose?: boolean;
}

function splitList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

function isPhaseName(value: string): value is PhaseName {
  return PHASE_ORDER.some((phase) => phase === value);
}

/** Overrides for the flags actually given on the command line. */
function cliOverrides(options: DiscoverOptions, command: Command): Partial<DiscoveryConfig> {
  const fromCli = (name: string): boolean => command.getOptionValueSource(name) === 'cli';
  const out: Partial<DiscoveryConfig> = {};

  if (options.profile !== undefined && isScanProfile(options.profile)) out.profile = options.profile;
  if (options.maxPages !== undefined) out.maxPages = parseInt(options.maxPages, 10);
  if (options.maxDepth !== undefined) out.maxDepth = parseInt(options.maxDepth, 10);
  if (options.maxConcurrent !== undefined) out.maxConcurrent = parseInt(options.maxConcurrent, 10);
  if (options.timeout !== undefined) out.timeoutMs = parseInt(options.timeout, 10);
  if (options.deadline !== undefined) out.deadlineMs = parseInt(options.deadline, 10) * 1000;
  if (options.phases !== undefined) out.phases = splitList(options.phases).filter(isPhaseName);
  if (options.pathPrefix !== undefined) out.pathPrefix = options.pathPrefix;
  if (options.excludeHosts !== undefined) out.excludeHosts = parseHostPatterns(options.excludeHosts);
  if (options.dailyLlmBudget !== undefined) out.dailyLlmBudget = parseInt(options.dailyLlmBudget, 10);
  if (options.llmSpacing !== undefined) out.minLlmSpacingMs = Math.round(Number(options.llmSpacing) * 1000);
  if (options.includePdfs) out.includePdfs = true;
  if (options.includeImages) out.includeImages = true;
  if (options.ignoreRobots) out.respectRobots = false;
  if (fromCli('llm')) out.useLlmKeywords = options.llm;
  if (fromCli('archives')) out.useArchives = options.archives;
  return out;
}

program
  .name('urlscout')
  .description('Multi-phase URL discovery for a single site')
  .version(version);

program
  .command('discover')
  .description('Discover every reachable URL of a site')
  .argument('[url]', 'Base URL (defaults to base_url from the config file)')
  .option('-p, --profile <profile>', 'Discovery profile: quick, standard, deep')
  .option('--max-pages <n>', 'Maximum in-scope URLs')
  .option('--max-depth <n>', 'Maximum link depth for the recursive crawl')
  .option('--max-concurrent <n>', 'Concurrent requests across the whole run')
  .option('--timeout <ms>', 'Per-request timeout in milliseconds')
  .option('--deadline <seconds>', 'Stop the run after this many seconds (0 = none)')
  .option('--phases <names>', `Phases to run (comma-separated): ${PHASE_ORDER.join(',')}`)
  .option('--include-pdfs', 'Keep PDF documents in scope')
  .option('--include-images', 'Keep images in scope')
  .option('--path-prefix <path>', 'Confine discovery to this path, e.g. /docs/')
  .option('--exclude-hosts <hosts>', 'Host globs to leave out: "cdn.example.com,*.static.example.com"')
  .option('--no-llm', 'Use the static keyword list instead of the model')
  .option('--daily-llm-budget <n>', 'Model calls allowed per day')
  .option('--llm-spacing <seconds>', 'Minimum seconds between model calls')
  .option('--ignore-robots', 'Ignore robots.txt restrictions', false)
  .option('--no-archives', 'Skip Wayback Machine and Common Crawl seeding')
  .option('-f, --format <formats>', 'Output formats: terminal,json,txt (comma-separated)', 'terminal')
  .option('-o, --output <path>', 'Output directory for results', './urlscout-results')
  .option('--log-requests', 'Log all HTTP requests to requests.jsonl', false)
  .option('--verbose', 'Enable verbose logging', false)
  .action(async (url: string | undefined, options: DiscoverOptions, command: Command) => {
    if (options.verbose) {
      setLogLevel('debug');
    }

    const fileConfig = loadConfigFile();
    const baseUrl = url ?? fileConfig?.base_url;
    if (!baseUrl) {
      console.error(chalk.red('No base URL given (argument or base_url in the config file)'));
      process.exit(1);
    }

    const errors = validateCliOptions(baseUrl, options);
    if (errors.length > 0) {
      for (const error of errors) console.error(chalk.red(`  ${error.field}: ${error.message}`));
      process.exit(1);
    }

    log.banner();

    const config = buildConfig(baseUrl, {
      ...(fileConfig ? configFileOverrides(fileConfig) : {}),
      ...cliOverrides(options, command),
    });
    const formats = splitList(
      command.getOptionValueSource('format') === 'cli' ? (options.format ?? 'terminal') : (fileConfig?.format ?? options.format ?? 'terminal'),
    );
    const outputDir = resolve(
      command.getOptionValueSource('output') === 'cli' ? (options.output ?? '.') : (fileConfig?.output ?? options.output ?? '.'),
    );
    const id = runId(new URL(baseUrl).hostname, new Date().toISOString());
    const requestLogger = options.logRequests || fileConfig?.log_requests
      ? new RequestLogger(outputDir, id)
      : undefined;

    const orchestrator = new DiscoveryOrchestrator(config, { requestLogger });
    let interrupted = false;
    const onSignal = (): void => {
      if (interrupted) process.exit(130);
      interrupted = true;
      log.warn('Interrupted; finishing in-flight requests and writing partial results (Ctrl+C again to quit)');
      orchestrator.cancel();
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    log.info(`Discovering ${config.baseUrl} (${config.profile} profile, ${config.phases.length} phases, max ${config.maxPages} URLs)`);

    try {
      const result = await orchestrator.run();

      if (formats.includes('terminal')) {
        printTerminalReport(result);
      }
      if (formats.includes('json')) {
        writeJsonReport(result, join(outputDir, id));
      }
      if (formats.includes('txt')) {
        writeUrlList(result, join(outputDir, id, 'urls.txt'));
      }

      const tokens = orchestrator.tokens.usage();
      if (tokens.totalTokens > 0) {
        log.debug(`Model usage: ${tokens.inputTokens} input + ${tokens.outputTokens} output tokens`);
      }
      log.info(`Discovery complete: ${result.totalUrls} URLs`);
      process.exitCode = 0;
    } catch (err) {
      if (err instanceof OrchestrationFatalError) {
        log.error(`Discovery aborted: ${err.message}`);
      } else {
        log.error(`Discovery failed: ${errorMessage(err)}`);
      }
      if (options.verbose) {
        console.error(err);
      }
      process.exitCode = 2;
    } finally {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    }
  });

program.parse();
