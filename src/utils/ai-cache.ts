import { createHash } from 'node:crypto';
import { existsSync, mkdirSync, readFileSync, writeFileSync, unlinkSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { log } from './logger.js';
import { errorMessage } from './shared.js';

export interface AICacheOptions {
  cacheDir?: string;
  ttlMs?: number;
}

interface CacheEntry {
  createdAt: string;
  ttlMs: number;
  value: string;
}

const DEFAULT_TTL_MS = 7 * 86_400_000; // one week

export const DEFAULT_CACHE_DIR = join(homedir(), '.urlscout', 'cache');

/** On-disk cache of model responses, one JSON file per key. */
export class AICache {
  readonly cacheDir: string;
  readonly ttlMs: number;

  constructor(options: AICacheOptions = {}) {
    this.cacheDir = options.cacheDir ?? DEFAULT_CACHE_DIR;
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
  }

  /**
   * Deterministic SHA-256 key for a prompt. Prompts that differ only in
   * case or whitespace share a key.
   */
  generateKey(prompt: string): string {
    return createHash('sha256').update(normalizePrompt(prompt)).digest('hex');
  }

  /** Cached value, or null when missing, expired (deleted lazily) or corrupt. */
  async get(key: string): Promise<string | null> {
    const filePath = join(this.cacheDir, `${key}.json`);

    if (!existsSync(filePath)) {
      return null;
    }

    let entry: CacheEntry;
    try {
      entry = parseEntry(readFileSync(filePath, 'utf-8'));
    } catch (err) {
      log.debug(`Ignoring unreadable cache entry ${key}: ${errorMessage(err)}`);
      return null;
    }

    const age = Date.now() - new Date(entry.createdAt).getTime();
    if (age > entry.ttlMs) {
      try {
        unlinkSync(filePath);
      } catch (err) {
        log.debug(`Could not remove expired cache entry ${key}: ${errorMessage(err)}`);
      }
      return null;
    }

    return entry.value;
  }

  async set(key: string, value: string): Promise<void> {
    if (!existsSync(this.cacheDir)) {
      mkdirSync(this.cacheDir, { recursive: true });
    }

    const entry: CacheEntry = {
      createdAt: new Date().toISOString(),
      ttlMs: this.ttlMs,
      value,
    };

    const filePath = join(this.cacheDir, `${key}.json`);
    writeFileSync(filePath, JSON.stringify(entry, null, 2), 'utf-8');
  }
}

export function normalizePrompt(prompt: string): string {
  return prompt.trim().replace(/\s+/g, ' ').toLowerCase();
}

function parseEntry(raw: string): CacheEntry {
  const parsed: unknown = JSON.parse(raw);
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'createdAt' in parsed &&
    typeof parsed.createdAt === 'string' &&
    'ttlMs' in parsed &&
    typeof parsed.ttlMs === 'number' &&
    'value' in parsed &&
    typeof parsed.value === 'string'
  ) {
    return { createdAt: parsed.createdAt, ttlMs: parsed.ttlMs, value: parsed.value };
  }
  throw new Error('cache entry has the wrong shape');
}
