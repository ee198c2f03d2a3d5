import { mkdirSync, appendFileSync, readFileSync, existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { log } from './logger.js';
import { errorMessage } from './shared.js';

export interface RequestLogEntry {
  timestamp: string;
  method: string;
  url: string;
  /** 1 for the first try, incremented on every retry */
  attempt: number;
  status?: number;
  /** Error code when no response arrived */
  error?: string;
  durationMs: number;
}

const MAX_BUFFER_SIZE = 500;

/** Append-only JSONL log of every request a run makes. */
export class RequestLogger {
  private buffer: RequestLogEntry[] = [];
  private outputPath: string;
  private totalCount = 0;
  private dirCreated = false;

  constructor(outputDir: string, runId: string) {
    this.outputPath = join(outputDir, runId, 'requests.jsonl');
  }

  log(entry: RequestLogEntry): void {
    this.buffer.push(entry);
    this.totalCount++;

    if (this.buffer.length >= MAX_BUFFER_SIZE) {
      this.flushBuffer();
    }
  }

  /** Flush remaining entries and finalize the log */
  flush(): void {
    if (this.totalCount === 0) return;
    this.flushBuffer();
    log.info(`Request log written: ${this.totalCount} entries → ${this.outputPath}`);
  }

  private flushBuffer(): void {
    if (this.buffer.length === 0) return;

    if (!this.dirCreated) {
      mkdirSync(dirname(this.outputPath), { recursive: true });
      this.dirCreated = true;
    }

    const lines = this.buffer.map((e) => JSON.stringify(e)).join('\n') + '\n';
    appendFileSync(this.outputPath, lines, 'utf-8');
    this.buffer = [];
  }

  get count(): number {
    return this.totalCount;
  }

  get path(): string {
    return this.outputPath;
  }

  /** Entries already on disk followed by the unflushed buffer. */
  readAllEntries(): RequestLogEntry[] {
    const entries: RequestLogEntry[] = [];

    if (existsSync(this.outputPath)) {
      const content = readFileSync(this.outputPath, 'utf-8');
      const lines = content.split('\n').filter((line) => line.trim().length > 0);
      for (const line of lines) {
        try {
          const parsed: unknown = JSON.parse(line);
          if (isEntry(parsed)) entries.push(parsed);
        } catch (err) {
          log.debug(`Skipping malformed request log line: ${errorMessage(err)}`);
        }
      }
    }

    entries.push(...this.buffer);

    return entries;
  }
}

function isEntry(value: unknown): value is RequestLogEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'url' in value &&
    typeof value.url === 'string' &&
    'method' in value &&
    typeof value.method === 'string'
  );
}
