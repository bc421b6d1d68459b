import { z } from 'zod';
import type { FocusArea } from '../../shared/types';
import { readDataFile } from '../utils/dataFile';
import { containsAnyKeyword, escapeRegExp } from '../utils/text';
import type { ExtractedContent, InsightKeywordGroup, InsightKeywordTable } from './types';

export interface ExtractOptions {
  maxTextLength?: number;
  keywords?: InsightKeywordTable;
}

export const MAX_INSIGHTS = 10;
export const MIN_SEGMENT_LENGTH = 20;
export const MAX_SCANNED_SEGMENTS = 50;
export const DEFAULT_MAX_TEXT_LENGTH = 5_000;

const keywordGroups = z.array(
  z.object({
    group: z.string().min(1),
    keywords: z.array(z.string().min(1)).min(1),
  }),
);

const InsightKeywordTableSchema = z.object({
  ui_ux: keywordGroups,
  conversion: keywordGroups,
  seo: keywordGroups,
  performance: keywordGroups,
  accessibility: keywordGroups,
});

let cachedKeywords: InsightKeywordTable | null = null;

export const loadInsightKeywords = (): InsightKeywordTable => {
  if (!cachedKeywords) {
    cachedKeywords = readDataFile('insight-keywords.json5', InsightKeywordTableSchema);
  }
  return cachedKeywords;
};

const stripTags = (html: string): string => {
  const withoutScripts = html.replace(/<script[\s\S]*?<\/script>/gi, ' ');
  const withoutStyles = withoutScripts.replace(/<style[\s\S]*?<\/style>/gi, ' ');
  const withoutNoscript = withoutStyles.replace(/<noscript[\s\S]*?<\/noscript>/gi, ' ');
  const withoutComments = withoutNoscript.replace(/<!--[\s\S]*?-->/g, ' ');
  return withoutComments.replace(/<[^>]+>/g, ' ');
};

const fromCodePoint = (code: number): string =>
  Number.isInteger(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : '';

const decodeEntities = (text: string): string => {
  const named: Record<string, string> = {
    '&nbsp;': ' ',
    '&quot;': '"',
    '&#39;': "'",
    '&apos;': "'",
    '&lt;': '<',
    '&gt;': '>',
    '&mdash;': '-',
    '&ndash;': '-',
    '&hellip;': '...',
  };
  let out = text;
  for (const [key, value] of Object.entries(named)) {
    out = out.replaceAll(key, value);
  }
  out = out.replace(/&#(\d+);/g, (_match, num: string) => fromCodePoint(Number(num)));
  out = out.replace(/&#x([0-9a-f]+);/gi, (_match, hex: string) => fromCodePoint(Number.parseInt(hex, 16)));
  // Last, so "&amp;lt;" decodes once to "&lt;".
  return out.replaceAll('&amp;', '&');
};

const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

const findMetaContent = (html: string, key: string): string | null => {
  const needle = escapeRegExp(key);
  const metaRe = new RegExp(`<meta[^>]+(?:property|name)=["']${needle}["'][^>]*>`, 'i');
  const match = html.match(metaRe);
  if (!match) return null;
  const contentMatch = match[0].match(/content=["']([^"']+)["']/i);
  return contentMatch ? contentMatch[1] : null;
};

export const extractTitle = (html: string): string | null => {
  const titleMatch = html.match(/<title[^>]*>([^<]+)<\/title>/i);
  const raw = titleMatch?.[1] ?? findMetaContent(html, 'og:title');
  if (!raw) return null;
  const title = normalizeWhitespace(decodeEntities(raw));
  return title || null;
};

export const htmlToText = (html: string, maxLength = DEFAULT_MAX_TEXT_LENGTH): string =>
  normalizeWhitespace(decodeEntities(stripTags(html))).slice(0, maxLength);

/** The first keyword group (in table order) that matches the segment, or null. */
export const classifyInsight = (segment: string, groups: readonly InsightKeywordGroup[]): string | null => {
  for (const { group, keywords } of groups) {
    if (containsAnyKeyword(segment, keywords)) {
      return group;
    }
  }
  return null;
};

export const extractInsights = (text: string, focusArea: FocusArea, keywords?: InsightKeywordTable): string[] => {
  const groups = (keywords ?? loadInsightKeywords())[focusArea] ?? [];
  const insights: string[] = [];
  for (const rawSegment of text.split('.').slice(0, MAX_SCANNED_SEGMENTS)) {
    const segment = rawSegment.trim();
    if (segment.length < MIN_SEGMENT_LENGTH) continue;
    if (classifyInsight(segment, groups) !== null) {
      insights.push(segment);
      if (insights.length >= MAX_INSIGHTS) break;
    }
  }
  return insights;
};

export const extract = (html: string, focusArea: FocusArea, options: ExtractOptions = {}): ExtractedContent => {
  const text = htmlToText(html, options.maxTextLength ?? DEFAULT_MAX_TEXT_LENGTH);
  return {
    title: extractTitle(html),
    text,
    insights: extractInsights(text, focusArea, options.keywords),
  };
};
