import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ResearchResult } from '../../../shared/types';
import { createSilentLogger } from '../../obs/logger';
import { ResultCache, cacheKey } from '../cache';

const sources = ['https://alpha.test/guide', 'https://beta.test/blog'];

const buildResult = (overrides: Partial<ResearchResult> = {}): ResearchResult => ({
  query: 'button design',
  findings: ['From alpha.test: Buttons with contrast convert better.'],
  sources: ['https://alpha.test/guide'],
  recommendations: [
    {
      elementType: 'button',
      psychologyPrinciple: 'general persuasion',
      colorScheme: 'brand-consistent colors',
      textContent: 'Buttons with contrast convert better',
      placement: 'above the fold, right-aligned',
    },
  ],
  confidenceScore: 0.6,
  researchTimestamp: '2026-03-01T00:00:00.000Z',
  ...overrides,
});

describe('ResultCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns a stored result until its ttl elapses', () => {
    const cache = new ResultCache({ ttlMs: 3_600_000 });
    const result = buildResult();
    cache.set('button design', sources, result, 60_000);

    expect(cache.get('button design', sources)).toEqual(result);

    vi.setSystemTime(Date.now() + 59_999);
    expect(cache.get('button design', sources)).toEqual(result);

    vi.setSystemTime(Date.now() + 1);
    expect(cache.get('button design', sources)).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('uses the default ttl when none is given', () => {
    const cache = new ResultCache({ ttlMs: 1_000 });
    cache.set('button design', sources, buildResult());

    vi.setSystemTime(Date.now() + 1_000);
    expect(cache.get('button design', sources)).toBeNull();
  });

  it('ignores source order when keying', () => {
    const cache = new ResultCache({ ttlMs: 60_000 });
    cache.set('button design', sources, buildResult());

    expect(cache.get('button design', [...sources].reverse())).not.toBeNull();
    expect(cacheKey('button design', sources)).toBe(cacheKey('button design', [...sources].reverse()));
    expect(cache.get('button colors', sources)).toBeNull();
  });

  it('overwrites an existing entry for the same key', () => {
    const cache = new ResultCache({ ttlMs: 60_000 });
    cache.set('button design', sources, buildResult({ confidenceScore: 0.4 }));
    cache.set('button design', sources, buildResult({ confidenceScore: 0.8 }));

    expect(cache.get('button design', sources)?.confidenceScore).toBe(0.8);
    expect(cache.size).toBe(1);
  });

  it('isolates stored results from caller mutation', () => {
    const cache = new ResultCache({ ttlMs: 60_000 });
    const result = buildResult();
    cache.set('button design', sources, result);
    result.findings.push('mutated after set');

    const first = cache.get('button design', sources);
    first?.findings.push('mutated after get');

    expect(cache.get('button design', sources)?.findings).toEqual([
      'From alpha.test: Buttons with contrast convert better.',
    ]);
  });

  it('treats an entry that fails validation as a miss and evicts it', () => {
    const logger = createSilentLogger();
    const warn = vi.spyOn(logger, 'warn');
    const cache = new ResultCache({ ttlMs: 60_000, logger });
    cache.set('button design', sources, buildResult({ confidenceScore: 1.5 }));

    expect(cache.get('button design', sources)).toBeNull();
    expect(cache.size).toBe(0);
    expect(warn).toHaveBeenCalledWith('Discarding corrupt cache entry', expect.objectContaining({ key: expect.any(String) }));
  });

  it('evicts the oldest entry beyond capacity', () => {
    const cache = new ResultCache({ ttlMs: 60_000, maxEntries: 2 });
    cache.set('one', sources, buildResult({ query: 'one' }));
    cache.set('two', sources, buildResult({ query: 'two' }));
    cache.set('three', sources, buildResult({ query: 'three' }));

    expect(cache.get('one', sources)).toBeNull();
    expect(cache.get('two', sources)?.query).toBe('two');
    expect(cache.get('three', sources)?.query).toBe('three');
  });

  it('does not store with a non-positive ttl', () => {
    const cache = new ResultCache({ ttlMs: 60_000 });
    cache.set('button design', sources, buildResult(), 0);

    expect(cache.size).toBe(0);
  });
});
