import 'dotenv/config';
import path from 'node:path';
import {
  ConfigSchema,
  DEFAULT_RESEARCH_CONFIG,
  type AppConfig,
  type PublicConfig,
  getPublicConfig as getPublicConfigShared,
} from '../../shared/config';

type Env = Record<string, string | undefined>;

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: Env = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const rawRoot = env.RESEARCH_DATA_ROOT || path.join(process.cwd(), 'research_data');
  const defaults = DEFAULT_RESEARCH_CONFIG;

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    research: {
      requestsPerSecond: numberFromEnv(env.RESEARCH_REQUESTS_PER_SECOND, defaults.requestsPerSecond),
      fetchTimeoutMs: numberFromEnv(env.RESEARCH_FETCH_TIMEOUT_MS, defaults.fetchTimeoutMs),
      policyTimeoutMs: numberFromEnv(env.RESEARCH_POLICY_TIMEOUT_MS, defaults.policyTimeoutMs),
      cacheTtlMs: numberFromEnv(env.RESEARCH_CACHE_TTL_MS, defaults.cacheTtlMs),
      maxCacheEntries: numberFromEnv(env.RESEARCH_CACHE_MAX_ENTRIES, defaults.maxCacheEntries),
      maxConcurrentFetches: numberFromEnv(env.RESEARCH_MAX_CONCURRENT_FETCHES, defaults.maxConcurrentFetches),
      totalBudgetMs: numberFromEnv(env.RESEARCH_TOTAL_BUDGET_MS, defaults.totalBudgetMs),
      maxTextLength: numberFromEnv(env.RESEARCH_MAX_TEXT_LENGTH, defaults.maxTextLength),
      userAgent: env.RESEARCH_USER_AGENT?.trim() || defaults.userAgent,
    },
    persistence: {
      mode: booleanFromEnv(env.RESEARCH_PERSIST_RESULTS, false) ? 'fs' : 'none',
      rootDir: path.resolve(rawRoot),
    },
    observability: {
      logLevel: (env.LOG_LEVEL || 'info').toLowerCase(),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);

export const refreshConfig = (): AppConfig => {
  cachedConfig = null;
  return loadConfig();
};
