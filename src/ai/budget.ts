import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { log } from '../utils/logger.js';
import { errorMessage } from '../utils/shared.js';

export interface BudgetOptions {
  /** Real model calls allowed per calendar day */
  dailyLimit: number;
  /** Minimum gap between the start of two model calls */
  minSpacingMs: number;
  /** JSON ledger that carries the day's count across runs */
  statePath?: string | null;
  now?: () => number;
}

export type Reservation =
  | { ok: true; startAt: number; used: number }
  | { ok: false; used: number };

interface Ledger {
  day: string;
  used: number;
}

/** Local calendar day as YYYY-MM-DD. */
export function dayKey(timestamp: number): string {
  const d = new Date(timestamp);
  const month = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${d.getFullYear()}-${month}-${day}`;
}

/**
 * Daily quota and call spacing for the suggestion model.
 *
 * `reserve()` checks and increments the counter in one synchronous step, so
 * the ceiling holds however many callers race for it. Each granted call gets
 * its own start slot `minSpacingMs` after the previous one.
 */
export class SuggestionBudget {
  readonly dailyLimit: number;
  readonly minSpacingMs: number;
  private readonly statePath: string | null;
  private readonly now: () => number;
  private day: string;
  private used = 0;
  private nextSlotAt = 0;

  constructor(options: BudgetOptions) {
    this.dailyLimit = Math.max(0, options.dailyLimit);
    this.minSpacingMs = Math.max(0, options.minSpacingMs);
    this.statePath = options.statePath ?? null;
    this.now = options.now ?? Date.now;
    this.day = dayKey(this.now());
    this.load();
  }

  reserve(): Reservation {
    const now = this.now();
    this.rollDay(now);

    if (this.used >= this.dailyLimit) {
      return { ok: false, used: this.used };
    }

    this.used += 1;
    const startAt = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = startAt + this.minSpacingMs;
    this.save();
    return { ok: true, startAt, used: this.used };
  }

  get usedToday(): number {
    this.rollDay(this.now());
    return this.used;
  }

  get remaining(): number {
    return Math.max(0, this.dailyLimit - this.usedToday);
  }

  private rollDay(now: number): void {
    const today = dayKey(now);
    if (today !== this.day) {
      this.day = today;
      this.used = 0;
    }
  }

  private load(): void {
    if (!this.statePath || !existsSync(this.statePath)) return;
    try {
      const parsed: unknown = JSON.parse(readFileSync(this.statePath, 'utf-8'));
      const ledger = toLedger(parsed);
      if (ledger && ledger.day === this.day) {
        this.used = ledger.used;
      }
    } catch (err) {
      log.warn(`Ignoring unreadable suggestion budget ledger ${this.statePath}: ${errorMessage(err)}`);
    }
  }

  private save(): void {
    if (!this.statePath) return;
    const ledger: Ledger = { day: this.day, used: this.used };
    try {
      mkdirSync(dirname(this.statePath), { recursive: true });
      writeFileSync(this.statePath, JSON.stringify(ledger), 'utf-8');
    } catch (err) {
      log.warn(`Could not persist suggestion budget ledger: ${errorMessage(err)}`);
    }
  }
}

function toLedger(value: unknown): Ledger | null {
  if (
    typeof value === 'object' &&
    value !== null &&
    'day' in value &&
    typeof value.day === 'string' &&
    'used' in value &&
    typeof value.used === 'number'
  ) {
    return { day: value.day, used: value.used };
  }
  return null;
}
