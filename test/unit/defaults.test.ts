import { describe, it, expect } from 'vitest';
import { buildConfig, isScanProfile, PROFILE_SETTINGS } from '../../src/config/defaults.js';
import { PHASE_ORDER } from '../../src/discovery/types.js';

describe('buildConfig', () => {
  it('uses the standard profile by default', () => {
    const config = buildConfig('https://example.com/', {}, {});
    expect(config.profile).toBe('standard');
    expect(config.maxPages).toBe(1000);
    expect(config.maxDepth).toBe(4);
    expect(config.phases).toEqual([...PHASE_ORDER]);
    expect(config.includePdfs).toBe(false);
    expect(config.respectRobots).toBe(true);
    expect(config.pathPrefix).toBe('/');
    expect(config.formQueries.length).toBeGreaterThan(0);
  });

  it('applies profile settings', () => {
    const config = buildConfig('https://example.com/', { profile: 'quick' }, {});
    expect(config.maxPages).toBe(100);
    expect(config.maxConcurrent).toBe(4);
    expect(config.phases).not.toContain('aggressive_crawl');
  });

  it('copies the profile phase list', () => {
    const config = buildConfig('https://example.com/', {}, {});
    config.phases.pop();
    expect(PROFILE_SETTINGS.standard.phases).toHaveLength(PHASE_ORDER.length);
  });

  it('reads page ceiling and timeout from the environment', () => {
    const config = buildConfig('https://example.com/', {}, { URLSCOUT_MAX_PAGES: '42', URLSCOUT_TIMEOUT: '3000' });
    expect(config.maxPages).toBe(42);
    expect(config.timeoutMs).toBe(3000);
  });

  it('ignores malformed environment values', () => {
    const config = buildConfig('https://example.com/', {}, { URLSCOUT_MAX_PAGES: 'lots', URLSCOUT_TIMEOUT: '-5' });
    expect(config.maxPages).toBe(1000);
    expect(config.timeoutMs).toBe(15_000);
  });

  it('lets overrides win over environment and profile', () => {
    const config = buildConfig(
      'https://example.com/',
      { profile: 'deep', maxPages: 7, useLlmKeywords: false },
      { URLSCOUT_MAX_PAGES: '42' },
    );
    expect(config.maxPages).toBe(7);
    expect(config.maxDepth).toBe(8);
    expect(config.useLlmKeywords).toBe(false);
  });
});

describe('isScanProfile', () => {
  it('narrows known profile names', () => {
    expect(isScanProfile('deep')).toBe(true);
    expect(isScanProfile('turbo')).toBe(false);
    expect(isScanProfile(undefined)).toBe(false);
  });
});
