import type { FetchOutcome, FocusArea, NicheType, Source } from '../../shared/types';

export type { FetchOutcome, FetchStatus, Source } from '../../shared/types';

/** The slice of `fetch` the engine depends on. */
export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export interface SourceCatalog {
  focusAreas: Record<FocusArea, string[]>;
  niches: Partial<Record<NicheType, string[]>>;
}

export interface InsightKeywordGroup {
  group: string;
  keywords: string[];
}

export type InsightKeywordTable = Record<FocusArea, InsightKeywordGroup[]>;

export interface ExtractedContent {
  title: string | null;
  text: string;
  insights: string[];
}

export interface OrchestratorRunOptions {
  signal?: AbortSignal;
  runId?: string;
}

export interface OrchestratorRun {
  sources: Source[];
  outcomes: FetchOutcome[];
}
