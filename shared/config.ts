import { z } from 'zod';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36';

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  research: z.object({
    requestsPerSecond: z.number().positive(),
    fetchTimeoutMs: z.number().int().positive(),
    policyTimeoutMs: z.number().int().positive(),
    cacheTtlMs: z.number().int().nonnegative(),
    maxCacheEntries: z.number().int().positive(),
    maxConcurrentFetches: z.number().int().positive(),
    totalBudgetMs: z.number().int().nonnegative(),
    maxTextLength: z.number().int().positive(),
    userAgent: z.string().min(1),
  }),
  persistence: z.object({
    mode: z.enum(['fs', 'none']),
    rootDir: z.string().min(1),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type ResearchConfig = AppConfig['research'];

export interface PublicConfig {
  research: {
    requestsPerSecond: number;
    maxConcurrentFetches: number;
    cacheTtlMs: number;
    fetchTimeoutMs: number;
  };
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  research: {
    requestsPerSecond: config.research.requestsPerSecond,
    maxConcurrentFetches: config.research.maxConcurrentFetches,
    cacheTtlMs: config.research.cacheTtlMs,
    fetchTimeoutMs: config.research.fetchTimeoutMs,
  },
});

export const DEFAULT_RESEARCH_CONFIG: ResearchConfig = {
  requestsPerSecond: 0.5,
  fetchTimeoutMs: 30_000,
  policyTimeoutMs: 10_000,
  cacheTtlMs: 60 * 60 * 1000,
  maxCacheEntries: 500,
  maxConcurrentFetches: 3,
  totalBudgetMs: 120_000,
  maxTextLength: 5_000,
  userAgent: DEFAULT_USER_AGENT,
};
