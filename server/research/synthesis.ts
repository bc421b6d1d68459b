import type { FetchOutcome, ResearchQuery, ResearchResult } from '../../shared/types';
import { truncate } from '../utils/text';
import { buildRecommendation } from './classification';
import { ResearchExhaustedError } from './errors';
import type { FetchStatus } from './types';

export const MAX_FINDINGS = 10;
export const MAX_RECOMMENDATIONS = 5;
export const FINDING_EXCERPT_LENGTH = 200;

export const computeConfidence = (successes: number, maxSources: number): number =>
  Math.min(1, (successes / maxSources) * 0.8 + 0.2);

export const tallyOutcomes = (outcomes: readonly FetchOutcome[]): Record<FetchStatus, number> => {
  const tally: Record<FetchStatus, number> = { fetched: 0, failed: 0, blocked: 0, 'policy-denied': 0 };
  for (const outcome of outcomes) {
    tally[outcome.status] += 1;
  }
  return tally;
};

const uniqueInOrder = (values: Iterable<string>): string[] => Array.from(new Set(values));

export const synthesize = (
  query: ResearchQuery,
  outcomes: readonly FetchOutcome[],
  now: Date = new Date(),
): ResearchResult => {
  const fetched = [...outcomes]
    .filter((outcome) => outcome.status === 'fetched')
    .sort((a, b) => a.position - b.position);

  if (!fetched.length) {
    throw new ResearchExhaustedError(query.topic, outcomes.length, tallyOutcomes(outcomes));
  }

  const findings = uniqueInOrder(
    fetched.flatMap((outcome) =>
      outcome.text ? [`From ${outcome.source.domain}: ${truncate(outcome.text, FINDING_EXCERPT_LENGTH)}`] : [],
    ),
  ).slice(0, MAX_FINDINGS);

  const insights = uniqueInOrder(fetched.flatMap((outcome) => outcome.insights));
  const recommendations = insights
    .slice(0, MAX_RECOMMENDATIONS)
    .map((insight) => buildRecommendation(insight, query.focusArea));

  return {
    query: query.topic,
    findings,
    sources: fetched.map((outcome) => outcome.source.url),
    recommendations,
    confidenceScore: computeConfidence(fetched.length, query.maxSources),
    researchTimestamp: now.toISOString(),
  };
};
