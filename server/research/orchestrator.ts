import type { FetchOutcome, ResearchQuery } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { Semaphore } from '../utils/concurrency';
import { extract } from './extraction';
import { fetchPage } from './fetcher';
import type { PolicyCache, PolicyGate } from './policyGate';
import { resolveSources } from './sources';
import type { DomainThrottle } from './throttle';
import type {
  HttpFetch,
  InsightKeywordTable,
  OrchestratorRun,
  OrchestratorRunOptions,
  Source,
  SourceCatalog,
} from './types';

export interface FetchOrchestratorOptions {
  catalog: SourceCatalog;
  keywords?: InsightKeywordTable;
  policyGate: PolicyGate;
  throttle: DomainThrottle;
  fetch: HttpFetch;
  maxConcurrentFetches: number;
  fetchTimeoutMs: number;
  maxTextLength: number;
  userAgent: string;
  logger?: Logger;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Runs gated, throttled fetches for a query's sources.
 *
 * Per source: sticky-block check, robots.txt check, admission to the fetch
 * pool, throttle wait, fetch, extraction. A robots.txt lookup holds a pool slot
 * only for its own request, so every call through `fetch` counts against one
 * ceiling. The pool and the block list belong to the orchestrator, so they
 * span every query an engine runs.
 */
export class FetchOrchestrator {
  private readonly options: FetchOrchestratorOptions;
  private readonly pool: Semaphore;
  private readonly blocked = new Set<string>();

  constructor(options: FetchOrchestratorOptions) {
    this.options = options;
    this.pool = new Semaphore(options.maxConcurrentFetches);
  }

  resolve(query: ResearchQuery): Source[] {
    return resolveSources(this.options.catalog, query);
  }

  isBlocked(domain: string): boolean {
    return this.blocked.has(domain.toLowerCase());
  }

  blockedDomains(): string[] {
    return Array.from(this.blocked);
  }

  reset(): void {
    this.blocked.clear();
  }

  /** Outcomes come back in source order, one per source; this never rejects. */
  async run(query: ResearchQuery, options: OrchestratorRunOptions = {}): Promise<OrchestratorRun> {
    const sources = this.resolve(query);
    const policyCache: PolicyCache = new Map();
    const logger = this.options.logger?.child({ runId: options.runId, topic: query.topic });

    const outcomes = await Promise.all(
      sources.map((source, position) => this.attempt(query, source, position, policyCache, logger, options.signal)),
    );
    return { sources, outcomes };
  }

  private async attempt(
    query: ResearchQuery,
    source: Source,
    position: number,
    policyCache: PolicyCache,
    logger: Logger | undefined,
    signal: AbortSignal | undefined,
  ): Promise<FetchOutcome> {
    const startedAt = Date.now();
    const outcome = (fields: Pick<FetchOutcome, 'status'> & Partial<FetchOutcome>): FetchOutcome => ({
      source,
      position,
      insights: [],
      waitedMs: 0,
      elapsedMs: Date.now() - startedAt,
      ...fields,
    });

    if (this.isBlocked(source.domain)) {
      logger?.debug('Skipping blocked domain', { url: source.url, domain: source.domain });
      return outcome({ status: 'blocked' });
    }

    const allowed = await this.options.policyGate.isAllowed(source.url, {
      signal,
      cache: policyCache,
      limiter: this.pool,
    });
    if (!allowed) {
      logger?.debug('robots.txt disallows source', { url: source.url });
      return outcome({ status: 'policy-denied' });
    }

    let waitedMs = 0;
    try {
      return await this.pool.run(async () => {
        // Another source on this domain may have failed while we queued.
        if (this.isBlocked(source.domain)) {
          return outcome({ status: 'blocked' });
        }
        waitedMs = await this.options.throttle.acquire(source.domain, signal);
        const page = await fetchPage(source.url, {
          fetch: this.options.fetch,
          timeoutMs: this.options.fetchTimeoutMs,
          userAgent: this.options.userAgent,
          signal,
        });
        const content = extract(page.html, query.focusArea, {
          maxTextLength: this.options.maxTextLength,
          keywords: this.options.keywords,
        });
        logger?.debug('Fetched source', {
          url: source.url,
          waitedMs,
          insights: content.insights.length,
          textLength: content.text.length,
        });
        return outcome({
          status: 'fetched',
          title: content.title,
          text: content.text,
          insights: content.insights,
          waitedMs,
        });
      }, signal);
    } catch (error) {
      const message = errorMessage(error);
      if (signal?.aborted) {
        // The caller gave up; the domain did nothing wrong.
        return outcome({ status: 'failed', error: message, waitedMs });
      }
      this.blocked.add(source.domain.toLowerCase());
      logger?.warn('Source fetch failed, blocking domain', { url: source.url, domain: source.domain, error: message });
      return outcome({ status: 'failed', error: message, waitedMs });
    }
  }
}
