import { PHASE_ORDER } from '../discovery/types.js';

export const VALID_PROFILES = ['quick', 'standard', 'deep'] as const;

export const VALID_FORMATS = ['terminal', 'json', 'txt'] as const;

export interface CliValidationError {
  field: string;
  message: string;
}

/** Raw option strings as commander hands them over. */
export interface CliOptions {
  profile?: string;
  maxPages?: string;
  maxDepth?: string;
  maxConcurrent?: string;
  timeout?: string;
  deadline?: string;
  phases?: string;
  dailyLlmBudget?: string;
  llmSpacing?: string;
  format?: string;
  pathPrefix?: string;
}

function splitList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

function checkInteger(
  errors: CliValidationError[],
  field: string,
  value: string | undefined,
  min: number,
): void {
  if (value === undefined) return;
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) {
    errors.push({
      field,
      message: `Invalid value "${value}" for ${field}. Must be ${min > 0 ? 'a positive' : 'a non-negative'} integer.`,
    });
  }
}

/**
 * Validates CLI options and returns an array of errors (empty if all valid).
 */
export function validateCliOptions(url: string | undefined, options: CliOptions): CliValidationError[] {
  const errors: CliValidationError[] = [];

  if (url !== undefined) {
    let protocol = '';
    try {
      protocol = new URL(url).protocol;
    } catch {
      // reported below
    }
    if (protocol !== 'http:' && protocol !== 'https:') {
      errors.push({ field: '<url>', message: `Invalid URL "${url}". Only http and https URLs are supported.` });
    }
  }

  if (options.profile !== undefined && !VALID_PROFILES.some((p) => p === options.profile)) {
    errors.push({
      field: '--profile',
      message: `Invalid profile "${options.profile}". Must be one of: ${VALID_PROFILES.join(', ')}`,
    });
  }

  checkInteger(errors, '--max-pages', options.maxPages, 1);
  checkInteger(errors, '--max-depth', options.maxDepth, 0);
  checkInteger(errors, '--max-concurrent', options.maxConcurrent, 1);
  checkInteger(errors, '--timeout', options.timeout, 1);
  checkInteger(errors, '--deadline', options.deadline, 0);
  checkInteger(errors, '--daily-llm-budget', options.dailyLlmBudget, 0);

  if (options.llmSpacing !== undefined) {
    const n = Number(options.llmSpacing);
    if (!Number.isFinite(n) || n < 0) {
      errors.push({
        field: '--llm-spacing',
        message: `Invalid value "${options.llmSpacing}" for --llm-spacing. Must be a non-negative number of seconds.`,
      });
    }
  }

  if (options.phases !== undefined) {
    const names = splitList(options.phases);
    const unknown = names.filter((n) => !PHASE_ORDER.some((phase) => phase === n));
    if (names.length === 0 || unknown.length > 0) {
      errors.push({
        field: '--phases',
        message: `Unknown phase name(s): ${unknown.join(', ') || '(none given)'}. Valid names: ${PHASE_ORDER.join(', ')}`,
      });
    }
  }

  if (options.format !== undefined) {
    const unknown = splitList(options.format).filter((f) => !VALID_FORMATS.some((v) => v === f));
    if (unknown.length > 0) {
      errors.push({
        field: '--format',
        message: `Unknown format(s): ${unknown.join(', ')}. Valid formats: ${VALID_FORMATS.join(', ')}`,
      });
    }
  }

  if (options.pathPrefix !== undefined && /[?#\s]/.test(options.pathPrefix)) {
    errors.push({
      field: '--path-prefix',
      message: `Invalid path prefix "${options.pathPrefix}". Must be a plain path such as /docs/.`,
    });
  }

  return errors;
}
