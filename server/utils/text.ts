export const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export interface KeywordMatchOptions {
  /** Also require a word boundary after the keyword (an optional plural `s`/`es` is allowed). */
  wholeWord?: boolean;
}

const keywordPatterns = new Map<string, RegExp>();

/**
 * Case-insensitive match anchored at the start of a word, so "trust" finds
 * "trusted" but not "distrust". Multi-word keywords match across any run of
 * whitespace.
 */
export const containsKeyword = (text: string, keyword: string, options: KeywordMatchOptions = {}): boolean => {
  const key = keyword.trim().toLowerCase();
  if (!key) return false;
  const cacheKey = `${options.wholeWord ? 'w' : 'p'}:${key}`;
  let pattern = keywordPatterns.get(cacheKey);
  if (!pattern) {
    const body = key.split(/\s+/).map(escapeRegExp).join('\\s+');
    const tail = options.wholeWord ? '(?:e?s)?(?![a-z0-9])' : '';
    pattern = new RegExp(`(?<![a-z0-9])${body}${tail}`, 'i');
    keywordPatterns.set(cacheKey, pattern);
  }
  return pattern.test(text);
};

export const containsAnyKeyword = (
  text: string,
  keywords: readonly string[],
  options: KeywordMatchOptions = {},
): boolean => keywords.some((keyword) => containsKeyword(text, keyword, options));

export const truncate = (value: string, maxLength: number, suffix = '...'): string =>
  value.length > maxLength ? `${value.slice(0, maxLength)}${suffix}` : value;
