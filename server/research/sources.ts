import { z } from 'zod';
import { NICHE_TYPES, type FocusArea, type NicheType } from '../../shared/types';
import { readDataFile } from '../utils/dataFile';
import type { Source, SourceCatalog } from './types';

const urlList = z.array(z.string().url());

const SourceCatalogSchema = z.object({
  focusAreas: z.object({
    ui_ux: urlList,
    conversion: urlList,
    seo: urlList,
    performance: urlList,
    accessibility: urlList,
  }) satisfies z.ZodType<Record<FocusArea, string[]>>,
  niches: z.record(z.enum(NICHE_TYPES), urlList),
});

let cachedCatalog: SourceCatalog | null = null;

export const loadSourceCatalog = (): SourceCatalog => {
  if (!cachedCatalog) {
    cachedCatalog = readDataFile('sources.json5', SourceCatalogSchema);
  }
  return cachedCatalog;
};

export const domainOf = (url: string): string => {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return url.trim().toLowerCase();
  }
};

export const toSource = (url: string): Source => ({ url, domain: domainOf(url) });

/**
 * Focus-area sources followed by niche sources, de-duplicated, in catalog order.
 * Blocked domains are not filtered here; the orchestrator records them as skipped.
 */
export const resolveSourceUrls = (
  catalog: SourceCatalog,
  focusArea: FocusArea,
  nicheContext?: NicheType,
): string[] => {
  const urls = [...(catalog.focusAreas[focusArea] ?? [])];
  if (nicheContext) {
    urls.push(...(catalog.niches[nicheContext] ?? []));
  }
  return Array.from(new Set(urls));
};

export const resolveSources = (
  catalog: SourceCatalog,
  query: { focusArea: FocusArea; nicheContext?: NicheType; maxSources: number },
): Source[] => resolveSourceUrls(catalog, query.focusArea, query.nicheContext).slice(0, query.maxSources).map(toSource);
