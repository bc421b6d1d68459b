import { describe, expect, it } from 'vitest';
import { containsAnyKeyword, containsKeyword, truncate } from '../text';

describe('containsKeyword', () => {
  it('matches at the start of a word regardless of case', () => {
    expect(containsKeyword('Add a CTA above the fold', 'cta')).toBe(true);
    expect(containsKeyword('Trusted checkout pages convert', 'trust')).toBe(true);
    expect(containsKeyword('Clicking through is easy', 'click')).toBe(true);
    expect(containsKeyword('Customers distrust pop-ups', 'trust')).toBe(false);
    expect(containsKeyword('The page was created quickly', 'red')).toBe(false);
  });

  it('accepts only plural endings in whole-word mode', () => {
    expect(containsKeyword('Reduce friction', 'red')).toBe(true);
    expect(containsKeyword('Reduce friction', 'red', { wholeWord: true })).toBe(false);
    expect(containsKeyword('Use a clear red headline', 'red', { wholeWord: true })).toBe(true);
    expect(containsKeyword('Money-back guarantees', 'guarantee', { wholeWord: true })).toBe(true);
  });

  it('matches multi-word keywords across line breaks', () => {
    expect(containsKeyword('A strong call\nto action', 'call to action')).toBe(true);
  });

  it('never matches an empty keyword', () => {
    expect(containsKeyword('anything', '  ')).toBe(false);
  });
});

describe('containsAnyKeyword', () => {
  it('is true when one keyword matches', () => {
    expect(containsAnyKeyword('Show reviews', ['badge', 'review'])).toBe(true);
    expect(containsAnyKeyword('Show reviews', [])).toBe(false);
    expect(containsAnyKeyword('Bluetooth speakers', ['blue', 'green'], { wholeWord: true })).toBe(false);
  });
});

describe('truncate', () => {
  it('appends the suffix only when it cuts', () => {
    expect(truncate('abcdef', 3)).toBe('abc...');
    expect(truncate('abc', 3)).toBe('abc');
  });
});
