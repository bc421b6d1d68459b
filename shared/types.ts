import { z } from 'zod';

export const FOCUS_AREAS = ['ui_ux', 'conversion', 'seo', 'performance', 'accessibility'] as const;
export const NICHE_TYPES = ['outdoor_gear', 'fashion', 'tech', 'home_improvement', 'music', 'general'] as const;
export const ELEMENT_TYPES = ['button', 'banner', 'form', 'card'] as const;

export type FocusArea = (typeof FOCUS_AREAS)[number];
export type NicheType = (typeof NICHE_TYPES)[number];
export type ElementType = (typeof ELEMENT_TYPES)[number];

export const ResearchQuerySchema = z.object({
  topic: z.string().trim().min(1),
  focusArea: z.enum(FOCUS_AREAS),
  nicheContext: z.enum(NICHE_TYPES).optional(),
  maxSources: z.number().int().min(1).max(20).default(5),
  /** How recent sources should be. Carried through to artifacts; sources are curated, not dated. */
  recencyDays: z.number().int().positive().default(365),
});

/** What callers pass in; defaults are applied on validation. */
export type ResearchQueryInput = z.input<typeof ResearchQuerySchema>;
export type ResearchQuery = Readonly<z.output<typeof ResearchQuerySchema>>;

export const RecommendationSchema = z.object({
  elementType: z.enum(ELEMENT_TYPES),
  psychologyPrinciple: z.string().min(1),
  colorScheme: z.string().min(1),
  textContent: z.string(),
  placement: z.string().min(1),
});

export type Recommendation = z.infer<typeof RecommendationSchema>;

export const ResearchResultSchema = z.object({
  query: z.string(),
  findings: z.array(z.string()).max(10),
  sources: z.array(z.string().url()),
  recommendations: z.array(RecommendationSchema).max(5),
  confidenceScore: z.number().min(0).max(1),
  researchTimestamp: z.string().datetime(),
});

export type ResearchResult = z.infer<typeof ResearchResultSchema>;

export interface Source {
  url: string;
  /** Lower-cased host, the unit of throttling and blocking. */
  domain: string;
}

export type FetchStatus = 'fetched' | 'failed' | 'blocked' | 'policy-denied';

export interface FetchOutcome {
  source: Source;
  /** Index of the source in the resolved list; synthesis orders by it. */
  position: number;
  status: FetchStatus;
  title?: string | null;
  text?: string | null;
  insights: string[];
  /** Time spent waiting on the domain throttle. */
  waitedMs: number;
  elapsedMs: number;
  error?: string;
}
