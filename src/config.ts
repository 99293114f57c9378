import * as dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(__dirname, '../.env') });

function optional(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function optionalInt(name: string, defaultValue: number, min: number = 0): number {
  const parsed = parseInt(optional(name, String(defaultValue)), 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : defaultValue;
}

export const config = {
  anthropic: {
    // Empty key means template-only mode
    apiKey: optional('ANTHROPIC_API_KEY', ''),
    model: optional('ANTHROPIC_MODEL', 'claude-sonnet-4-20250514'),
    analysisModel: optional('ANTHROPIC_ANALYSIS_MODEL', 'claude-3-5-haiku-20241022'),
    timeoutMs: optionalInt('LLM_TIMEOUT_MS', 20_000),
    maxRetries: optionalInt('LLM_MAX_RETRIES', 0),
  },
  selector: {
    scanWindow: optionalInt('SELECTOR_SCAN_WINDOW', 200, 1),
    minRecentMessages: optionalInt('SELECTOR_MIN_RECENT_MESSAGES', 2),
    minMessageLength: optionalInt('SELECTOR_MIN_MESSAGE_LENGTH', 10),
    maxCandidates: optionalInt('SELECTOR_MAX_CANDIDATES', 50, 1),
    fallbackCandidateLimit: optionalInt('SELECTOR_FALLBACK_CANDIDATE_LIMIT', 10, 1),
    exclusionWindowHours: optionalInt('SELECTOR_EXCLUSION_WINDOW_HOURS', 24),
  },
  registry: {
    retentionDays: optionalInt('REGISTRY_RETENTION_DAYS', 7, 1),
  },
  schedule: {
    registrySweepCron: optional('REGISTRY_SWEEP_CRON', '0 * * * *'),
  },
  leak: {
    defaultPersona: optional('LEAK_DEFAULT_PERSONA', 'sassy_reporter'),
  },
};

export type AppConfig = typeof config;
