import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { DiscoveryResult } from '../discovery/types.js';
import { log } from '../utils/logger.js';

/** One URL per line, in discovery order. */
export function writeUrlList(result: DiscoveryResult, outputPath: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  const body = result.urls.length > 0 ? `${result.urls.join('\n')}\n` : '';
  writeFileSync(outputPath, body, 'utf-8');
  log.info(`URL list written to: ${outputPath}`);
}
