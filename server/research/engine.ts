import { DEFAULT_RESEARCH_CONFIG, type ResearchConfig } from '../../shared/config';
import { createNoopArtifactStore, type ArtifactStore } from '../../shared/artifacts';
import { randomId } from '../../shared/crypto';
import {
  ResearchQuerySchema,
  type FocusArea,
  type NicheType,
  type ResearchQuery,
  type ResearchQueryInput,
  type ResearchResult,
} from '../../shared/types';
import type { Logger } from '../obs/logger';
import { linkAbortSignal } from '../utils/async';
import { ResultCache } from './cache';
import { InvalidResearchQueryError, ResearchAbortedError } from './errors';
import { FetchOrchestrator } from './orchestrator';
import { PolicyGate } from './policyGate';
import { loadSourceCatalog, resolveSourceUrls } from './sources';
import { synthesize, tallyOutcomes } from './synthesis';
import { DomainThrottle } from './throttle';
import type { HttpFetch, InsightKeywordTable, SourceCatalog } from './types';

export interface ResearchEngineOptions {
  config?: Partial<ResearchConfig>;
  fetch?: HttpFetch;
  logger?: Logger;
  store?: ArtifactStore;
  catalog?: SourceCatalog;
  keywords?: InsightKeywordTable;
}

export interface ResearchOptions {
  signal?: AbortSignal;
}

/** Topics researched by `searchSpecificTopics` use a fixed, small source budget. */
const TOPIC_SEARCH_MAX_SOURCES = 3;
const TOPIC_SEARCH_RECENCY_DAYS = 365;

export const parseResearchQuery = (input: ResearchQueryInput): ResearchQuery => {
  const parsed = ResearchQuerySchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidResearchQueryError(parsed.error.issues);
  }
  return Object.freeze(parsed.data);
};

/**
 * Owns the cache, the sticky block list and the throttle state. Construct one
 * per process (or per test); instances share nothing.
 */
export class ResearchEngine {
  readonly config: ResearchConfig;
  private readonly cache: ResultCache;
  private readonly throttle: DomainThrottle;
  private readonly orchestrator: FetchOrchestrator;
  private readonly catalog: SourceCatalog;
  private readonly store: ArtifactStore;
  private readonly logger?: Logger;

  constructor(options: ResearchEngineOptions = {}) {
    this.config = { ...DEFAULT_RESEARCH_CONFIG, ...options.config };
    this.logger = options.logger;
    this.store = options.store ?? createNoopArtifactStore();
    this.catalog = options.catalog ?? loadSourceCatalog();
    const fetchImpl: HttpFetch = options.fetch ?? ((url, init) => fetch(url, init));

    this.cache = new ResultCache({
      ttlMs: this.config.cacheTtlMs,
      maxEntries: this.config.maxCacheEntries,
      logger: this.logger,
    });
    this.throttle = new DomainThrottle(this.config.requestsPerSecond);
    this.orchestrator = new FetchOrchestrator({
      catalog: this.catalog,
      keywords: options.keywords,
      policyGate: new PolicyGate({
        fetch: fetchImpl,
        timeoutMs: this.config.policyTimeoutMs,
        userAgent: this.config.userAgent,
        logger: this.logger,
      }),
      throttle: this.throttle,
      fetch: fetchImpl,
      maxConcurrentFetches: this.config.maxConcurrentFetches,
      fetchTimeoutMs: this.config.fetchTimeoutMs,
      maxTextLength: this.config.maxTextLength,
      userAgent: this.config.userAgent,
      logger: this.logger,
    });
  }

  async research(input: ResearchQueryInput, options: ResearchOptions = {}): Promise<ResearchResult> {
    const query = parseResearchQuery(input);
    const runId = randomId();
    const logger = this.logger?.child({ runId });
    const sourceUrls = this.orchestrator.resolve(query).map((source) => source.url);

    const cached = this.cache.get(query.topic, sourceUrls);
    if (cached) {
      logger?.info('Returning cached research', { topic: query.topic });
      return cached;
    }

    const deadline = linkAbortSignal(options.signal, this.config.totalBudgetMs, 'Research');
    try {
      const startedAt = Date.now();
      const { outcomes } = await this.orchestrator.run(query, { signal: deadline.signal, runId });
      if (deadline.signal.aborted) {
        throw new ResearchAbortedError(query.topic, deadline.signal.reason);
      }

      const tally = tallyOutcomes(outcomes);
      logger?.info('Fetch phase complete', {
        topic: query.topic,
        attempted: outcomes.length,
        ...tally,
        elapsedMs: Date.now() - startedAt,
      });

      let result: ResearchResult;
      try {
        result = synthesize(query, outcomes);
      } catch (error) {
        logger?.error('Research failed', {
          topic: query.topic,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }

      this.cache.set(query.topic, sourceUrls, result);
      await this.persist(runId, query, result, outcomes, logger);
      return result;
    } finally {
      deadline.dispose();
    }
  }

  /** Findings per topic; a topic whose research fails maps to an empty list. */
  async searchSpecificTopics(
    topics: readonly string[],
    focusArea: FocusArea = 'conversion',
    options: ResearchOptions = {},
  ): Promise<Record<string, string[]>> {
    const results: Record<string, string[]> = {};
    for (const topic of topics) {
      try {
        const result = await this.research(
          { topic, focusArea, maxSources: TOPIC_SEARCH_MAX_SOURCES, recencyDays: TOPIC_SEARCH_RECENCY_DAYS },
          options,
        );
        results[topic] = result.findings;
      } catch (error) {
        this.logger?.warn('Failed to research topic', {
          topic,
          error: error instanceof Error ? error.message : String(error),
        });
        results[topic] = [];
      }
    }
    return results;
  }

  resolveSources(focusArea: FocusArea, nicheContext?: NicheType): string[] {
    return resolveSourceUrls(this.catalog, focusArea, nicheContext);
  }

  blockedDomains(): string[] {
    return this.orchestrator.blockedDomains();
  }

  reset(): void {
    this.cache.clear();
    this.throttle.reset();
    this.orchestrator.reset();
  }

  private async persist(
    runId: string,
    query: ResearchQuery,
    result: ResearchResult,
    outcomes: ReadonlyArray<{ source: { url: string }; status: string; error?: string }>,
    logger: Logger | undefined,
  ) {
    try {
      await this.store.saveResearchResult(runId, {
        runId,
        query,
        result,
        outcomes: outcomes.map((outcome) => ({
          url: outcome.source.url,
          status: outcome.status,
          error: outcome.error,
        })),
      });
    } catch (error) {
      logger?.warn('Failed to persist research artifact', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
