import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { DiscoveryConfig, ParentMatch, PhaseName } from '../discovery/types.js';
import { PHASE_ORDER } from '../discovery/types.js';
import { isScanProfile } from './defaults.js';
import { log } from '../utils/logger.js';
import { errorMessage } from '../utils/shared.js';

/**
 * Config file shape, snake_case, all fields optional.
 * CLI args override config file values.
 */
export interface UrlscoutConfigFile {
  base_url?: string;
  profile?: 'quick' | 'standard' | 'deep';
  max_pages?: number;
  max_depth?: number;
  max_concurrent?: number;
  include_pdfs?: boolean;
  include_images?: boolean;
  allow_extensions?: string[];
  deny_extensions?: string[];
  path_prefix?: string;
  exclude_hosts?: string[];
  use_llm_keywords?: boolean;
  daily_llm_budget?: number;
  min_llm_spacing_seconds?: number;
  timeout_ms?: number;
  deadline_seconds?: number;
  respect_robots?: boolean;
  use_archives?: boolean;
  parent_match?: ParentMatch;
  phases?: PhaseName[];
  rate_limits?: Record<string, number>;
  format?: string;
  output?: string;
  log_requests?: boolean;
}

const CONFIG_FILE_NAMES = ['.urlscoutrc.json', 'urlscout.config.json'] as const;

/**
 * Loads a urlscout config file from the current working directory.
 *
 * Search order:
 *   1. .urlscoutrc.json
 *   2. urlscout.config.json
 *   3. package.json → "urlscout" key
 *
 * Returns the validated config object, or null if no config file is found.
 * Fields of the wrong type are dropped with a warning.
 */
export function loadConfigFile(cwd?: string): UrlscoutConfigFile | null {
  const dir = cwd ?? process.cwd();

  for (const name of CONFIG_FILE_NAMES) {
    const filePath = resolve(dir, name);
    if (existsSync(filePath)) {
      try {
        const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
        log.info(`Loaded config from ${name}`);
        return parseConfigFile(parsed, name);
      } catch (err) {
        log.warn(`Found ${name} but failed to parse it: ${errorMessage(err)}`);
        return null;
      }
    }
  }

  const pkgPath = resolve(dir, 'package.json');
  if (existsSync(pkgPath)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
      const section = isObject(pkg) ? pkg.urlscout : undefined;
      if (isObject(section)) {
        log.info('Loaded config from package.json "urlscout" key');
        return parseConfigFile(section, 'package.json');
      }
    } catch (err) {
      log.warn(`Found package.json but failed to parse it: ${errorMessage(err)}`);
      return null;
    }
  }

  return null;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isPhaseName(value: string): value is PhaseName {
  return PHASE_ORDER.some((phase) => phase === value);
}

export function parseConfigFile(raw: unknown, source = 'config file'): UrlscoutConfigFile {
  if (!isObject(raw)) {
    throw new TypeError(`${source} must contain a JSON object`);
  }

  const out: UrlscoutConfigFile = {};
  const reject = (key: string, expected: string): void => {
    log.warn(`${source}: ignoring "${key}" (expected ${expected})`);
  };

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'base_url':
      case 'path_prefix':
      case 'format':
      case 'output':
        if (typeof value === 'string') out[key] = value;
        else reject(key, 'a string');
        break;
      case 'max_pages':
      case 'max_depth':
      case 'max_concurrent':
      case 'daily_llm_budget':
      case 'min_llm_spacing_seconds':
      case 'timeout_ms':
      case 'deadline_seconds':
        if (typeof value === 'number' && Number.isFinite(value) && value >= 0) out[key] = value;
        else reject(key, 'a non-negative number');
        break;
      case 'include_pdfs':
      case 'include_images':
      case 'use_llm_keywords':
      case 'respect_robots':
      case 'use_archives':
      case 'log_requests':
        if (typeof value === 'boolean') out[key] = value;
        else reject(key, 'a boolean');
        break;
      case 'allow_extensions':
      case 'deny_extensions':
      case 'exclude_hosts':
        if (isStringArray(value)) out[key] = value;
        else reject(key, 'an array of strings');
        break;
      case 'profile':
        if (isScanProfile(value)) out.profile = value;
        else reject(key, 'quick, standard or deep');
        break;
      case 'parent_match':
        if (value === 'segment' || value === 'prefix') out.parent_match = value;
        else reject(key, 'segment or prefix');
        break;
      case 'phases':
        if (isStringArray(value) && value.every(isPhaseName)) out.phases = value.filter(isPhaseName);
        else reject(key, `phase names from: ${PHASE_ORDER.join(', ')}`);
        break;
      case 'rate_limits':
        if (isObject(value) && Object.values(value).every((v) => typeof v === 'number' && v > 0)) {
          const limits: Record<string, number> = {};
          for (const [host, rps] of Object.entries(value)) {
            if (typeof rps === 'number') limits[host] = rps;
          }
          out.rate_limits = limits;
        } else {
          reject(key, 'an object of positive numbers');
        }
        break;
      default:
        log.warn(`${source}: unknown key "${key}"`);
    }
  }
  return out;
}

/** Map the snake_case file fields onto DiscoveryConfig overrides. */
export function configFileOverrides(file: UrlscoutConfigFile): Partial<DiscoveryConfig> {
  const out: Partial<DiscoveryConfig> = {};
  if (file.profile !== undefined) out.profile = file.profile;
  if (file.max_pages !== undefined) out.maxPages = file.max_pages;
  if (file.max_depth !== undefined) out.maxDepth = file.max_depth;
  if (file.max_concurrent !== undefined) out.maxConcurrent = file.max_concurrent;
  if (file.include_pdfs !== undefined) out.includePdfs = file.include_pdfs;
  if (file.include_images !== undefined) out.includeImages = file.include_images;
  if (file.allow_extensions !== undefined) out.allowExtensions = file.allow_extensions;
  if (file.deny_extensions !== undefined) out.denyExtensions = file.deny_extensions;
  if (file.path_prefix !== undefined) out.pathPrefix = file.path_prefix;
  if (file.exclude_hosts !== undefined) out.excludeHosts = file.exclude_hosts;
  if (file.use_llm_keywords !== undefined) out.useLlmKeywords = file.use_llm_keywords;
  if (file.daily_llm_budget !== undefined) out.dailyLlmBudget = file.daily_llm_budget;
  if (file.min_llm_spacing_seconds !== undefined) out.minLlmSpacingMs = file.min_llm_spacing_seconds * 1000;
  if (file.timeout_ms !== undefined) out.timeoutMs = file.timeout_ms;
  if (file.deadline_seconds !== undefined) out.deadlineMs = file.deadline_seconds * 1000;
  if (file.respect_robots !== undefined) out.respectRobots = file.respect_robots;
  if (file.use_archives !== undefined) out.useArchives = file.use_archives;
  if (file.parent_match !== undefined) out.parentMatch = file.parent_match;
  if (file.phases !== undefined) out.phases = file.phases;
  if (file.rate_limits !== undefined) out.rateLimits = file.rate_limits;
  return out;
}
