import type { AppConfig } from '../shared/config';
import { createNoopArtifactStore } from '../shared/artifacts';
import { loadConfig } from './config/config';
import { createLogger } from './obs/logger';
import { createFsArtifactStore } from './persistence/fsStore';
import { ResearchEngine, type ResearchEngineOptions } from './research/engine';

export { ResearchEngine, parseResearchQuery } from './research/engine';
export type { ResearchEngineOptions, ResearchOptions } from './research/engine';
export {
  ResearchError,
  ResearchExhaustedError,
  ResearchAbortedError,
  InvalidResearchQueryError,
} from './research/errors';
export type { ResearchErrorCode } from './research/errors';
export { ResultCache } from './research/cache';
export { DomainThrottle } from './research/throttle';
export { PolicyGate, parseRobotsTxt, isPathAllowed } from './research/policyGate';
export { FetchOrchestrator } from './research/orchestrator';
export { extract } from './research/extraction';
export { synthesize, computeConfidence } from './research/synthesis';
export { buildRecommendation } from './research/classification';
export { buildConfig, loadConfig, refreshConfig, getPublicConfig } from './config/config';
export { createLogger, createSilentLogger } from './obs/logger';
export type { Logger } from './obs/logger';
export type { HttpFetch, SourceCatalog, InsightKeywordTable } from './research/types';
export * from '../shared/types';
export type { AppConfig, ResearchConfig, PublicConfig } from '../shared/config';
export type { ArtifactStore, ResearchArtifact } from '../shared/artifacts';

/** An engine wired from application config: JSON logging and, when enabled, on-disk artifacts. */
export const createResearchEngine = (
  config: AppConfig = loadConfig(),
  overrides: Omit<ResearchEngineOptions, 'config'> = {},
): ResearchEngine => {
  const logger = overrides.logger ?? createLogger(config);
  const store =
    overrides.store ?? (config.persistence.mode === 'fs' ? createFsArtifactStore(config) : createNoopArtifactStore());
  logger.info('Research engine configured', {
    environment: config.environment,
    requestsPerSecond: config.research.requestsPerSecond,
    maxConcurrentFetches: config.research.maxConcurrentFetches,
    cacheTtlMs: config.research.cacheTtlMs,
    persistence: config.persistence.mode,
  });
  return new ResearchEngine({ ...overrides, config: config.research, logger, store });
};
