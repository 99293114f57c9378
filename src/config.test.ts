import { afterEach, describe, it, expect, vi } from 'vitest';

async function loadConfig() {
  vi.resetModules();
  const { config } = await import('./config');
  return config;
}

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('config', () => {
  it('leaves SDK retries off by default', async () => {
    vi.stubEnv('LLM_MAX_RETRIES', '');

    const config = await loadConfig();

    expect(config.anthropic.maxRetries).toBe(0);
  });

  it('keeps the default for selector sizes below one', async () => {
    vi.stubEnv('SELECTOR_SCAN_WINDOW', '0');
    vi.stubEnv('SELECTOR_MAX_CANDIDATES', '-3');
    vi.stubEnv('SELECTOR_FALLBACK_CANDIDATE_LIMIT', 'none');
    vi.stubEnv('SELECTOR_EXCLUSION_WINDOW_HOURS', '0');

    const config = await loadConfig();

    expect(config.selector.scanWindow).toBe(200);
    expect(config.selector.maxCandidates).toBe(50);
    expect(config.selector.fallbackCandidateLimit).toBe(10);
    expect(config.selector.exclusionWindowHours).toBe(0);
  });
});
