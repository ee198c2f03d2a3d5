import type { DiscoveryPhase } from '../types.js';
import { sitemapPhase } from './sitemap.js';
import { robotsPhase } from './robots.js';
import { archivePhase } from './archive.js';
import { recursivePhase } from './recursive.js';
import { hierarchicalPhase } from './hierarchical.js';
import { directoryPhase } from './directory.js';
import { patternPhase } from './pattern.js';
import { aggressivePhase } from './aggressive.js';
import { formsPhase } from './forms.js';

/** Registry of all discovery phases, in execution order (cheap first) */
export const PHASE_REGISTRY: DiscoveryPhase[] = [
  sitemapPhase,
  robotsPhase,
  archivePhase,
  recursivePhase,
  hierarchicalPhase,
  directoryPhase,
  patternPhase,
  aggressivePhase,
  formsPhase,
];
