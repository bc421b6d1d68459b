import type { ElementType, FocusArea, Recommendation } from '../../shared/types';
import { containsAnyKeyword, truncate } from '../utils/text';

export interface Rule<T> {
  value: T;
  keywords: readonly string[];
  /** Match keywords as whole words (plural allowed) instead of at word starts. */
  wholeWord?: boolean;
  focusAreas?: readonly FocusArea[];
}

/**
 * Ordered rule tables. Each table is evaluated top to bottom and the first
 * matching rule wins; `fallback` applies when nothing matches.
 */
export interface RuleTable<T> {
  rules: ReadonlyArray<Rule<T>>;
  fallback: T;
}

export const ELEMENT_TYPE_RULES: RuleTable<ElementType> = {
  rules: [
    { value: 'button', keywords: ['button', 'cta', 'click'] },
    { value: 'banner', keywords: ['banner', 'header', 'hero'] },
    { value: 'form', keywords: ['form', 'input', 'signup', 'sign up'] },
  ],
  fallback: 'card',
};

export const PSYCHOLOGY_PRINCIPLE_RULES: RuleTable<string> = {
  rules: [
    { value: 'urgency/scarcity', keywords: ['urgency', 'limited', 'hurry'] },
    { value: 'trust building', keywords: ['trust', 'secure', 'safe'] },
    { value: 'social proof', keywords: ['social', 'proof', 'testimonial'] },
    { value: 'color psychology', keywords: ['color', 'colour'] },
    { value: 'color psychology', keywords: ['red', 'green', 'blue'], wholeWord: true },
  ],
  fallback: 'general persuasion',
};

export const COLOR_SCHEME_RULES: RuleTable<string> = {
  rules: [
    { value: 'red for urgency and action', keywords: ['red'], wholeWord: true },
    { value: 'red for urgency and action', keywords: ['urgency'] },
    { value: 'green for trust and success', keywords: ['green'], wholeWord: true },
    { value: 'green for trust and success', keywords: ['trust'] },
    { value: 'blue for professionalism and trust', keywords: ['blue'], wholeWord: true, focusAreas: ['ui_ux'] },
  ],
  fallback: 'brand-consistent colors',
};

export const PLACEMENTS: Record<ElementType, string> = {
  button: 'above the fold, right-aligned',
  banner: 'top of page or sticky header',
  form: 'center of page or sidebar',
  card: 'grid layout with proper spacing',
};

export const MAX_TEXT_CONTENT_LENGTH = 100;

/** A rule matches on any of its keywords, or on the focus area when it lists some. */
export const applyRules = <T>(table: RuleTable<T>, text: string, focusArea?: FocusArea): T => {
  for (const rule of table.rules) {
    if (containsAnyKeyword(text, rule.keywords, { wholeWord: rule.wholeWord })) return rule.value;
    if (focusArea && rule.focusAreas?.includes(focusArea)) return rule.value;
  }
  return table.fallback;
};

export const determineElementType = (insight: string): ElementType => applyRules(ELEMENT_TYPE_RULES, insight);

export const extractPsychologyPrinciple = (insight: string): string => applyRules(PSYCHOLOGY_PRINCIPLE_RULES, insight);

export const suggestColorScheme = (insight: string, focusArea: FocusArea): string =>
  applyRules(COLOR_SCHEME_RULES, insight, focusArea);

export const suggestPlacement = (elementType: ElementType): string => PLACEMENTS[elementType];

export const buildRecommendation = (insight: string, focusArea: FocusArea): Recommendation => {
  const elementType = determineElementType(insight);
  return {
    elementType,
    psychologyPrinciple: extractPsychologyPrinciple(insight),
    colorScheme: suggestColorScheme(insight, focusArea),
    textContent: truncate(insight, MAX_TEXT_CONTENT_LENGTH),
    placement: suggestPlacement(elementType),
  };
};
