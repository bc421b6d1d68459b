import type { ResearchQuery, ResearchResult } from './types';

export interface ResearchArtifact {
  runId: string;
  query: ResearchQuery;
  result: ResearchResult;
  outcomes: Array<{ url: string; status: string; error?: string }>;
}

export interface ArtifactStore {
  saveResearchResult: (runId: string, artifact: ResearchArtifact) => Promise<string>;
}

export const createNoopArtifactStore = (): ArtifactStore => ({
  saveResearchResult: async () => '',
});
