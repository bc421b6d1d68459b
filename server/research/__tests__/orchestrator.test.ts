import { describe, expect, it } from 'vitest';
import { parseResearchQuery } from '../engine';
import { FetchOrchestrator, type FetchOrchestratorOptions } from '../orchestrator';
import { PolicyGate } from '../policyGate';
import { DomainThrottle } from '../throttle';
import { articleHtml, buildCatalog, createFakeWeb } from './fakeWeb';

const PAGE = { body: articleHtml('Checkout', 'Visitors trust pages with clear guarantees near the checkout.') };

const buildOrchestrator = (
  web: ReturnType<typeof createFakeWeb>,
  urls: string[],
  overrides: Partial<FetchOrchestratorOptions> = {},
) =>
  new FetchOrchestrator({
    catalog: buildCatalog(urls),
    policyGate: new PolicyGate({ fetch: web.fetch, timeoutMs: 500, userAgent: 'test-agent' }),
    throttle: new DomainThrottle(1_000),
    fetch: web.fetch,
    maxConcurrentFetches: 3,
    fetchTimeoutMs: 1_000,
    maxTextLength: 5_000,
    userAgent: 'test-agent',
    ...overrides,
  });

const queryFor = (maxSources: number) =>
  parseResearchQuery({ topic: 'checkout trust', focusArea: 'conversion', maxSources });

describe('FetchOrchestrator.run', () => {
  it('never exceeds the concurrency ceiling', async () => {
    const urls = ['a', 'b', 'c', 'd', 'e'].map((host) => `https://${host}.test/page`);
    const web = createFakeWeb({ pages: Object.fromEntries(urls.map((url) => [url, { ...PAGE, delayMs: 20 }])) });
    const orchestrator = buildOrchestrator(web, urls, { maxConcurrentFetches: 2 });

    const { outcomes } = await orchestrator.run(queryFor(5));

    expect(outcomes.map((outcome) => outcome.status)).toEqual(['fetched', 'fetched', 'fetched', 'fetched', 'fetched']);
    expect(web.stats.maxInFlight).toBe(2);
  });

  it('counts robots.txt lookups against the same ceiling as page fetches', async () => {
    const hosts = ['a', 'b', 'c', 'd', 'e', 'f'];
    const urls = hosts.map((host) => `https://${host}.test/page`);
    const web = createFakeWeb({
      pages: Object.fromEntries(urls.map((url) => [url, { ...PAGE, delayMs: 20 }])),
      robots: Object.fromEntries(hosts.map((host) => [`${host}.test`, { status: 404, delayMs: 20 }])),
    });
    const orchestrator = buildOrchestrator(web, urls, { maxConcurrentFetches: 3 });

    const { outcomes } = await orchestrator.run(queryFor(6));

    expect(outcomes.every((outcome) => outcome.status === 'fetched')).toBe(true);
    expect(web.fetch).toHaveBeenCalledTimes(12);
    expect(web.stats.maxInFlight).toBe(3);
  });

  it('returns outcomes in source order regardless of completion order', async () => {
    const slow = 'https://slow.test/page';
    const fast = 'https://fast.test/page';
    const web = createFakeWeb({ pages: { [slow]: { ...PAGE, delayMs: 40 }, [fast]: PAGE } });
    const orchestrator = buildOrchestrator(web, [slow, fast]);

    const { outcomes } = await orchestrator.run(queryFor(2));

    expect(outcomes.map((outcome) => [outcome.position, outcome.source.url])).toEqual([
      [0, slow],
      [1, fast],
    ]);
  });

  it('extracts title, text and insights from fetched pages', async () => {
    const url = 'https://alpha.test/page';
    const web = createFakeWeb({ pages: { [url]: PAGE } });
    const orchestrator = buildOrchestrator(web, [url]);

    const { outcomes } = await orchestrator.run(queryFor(1));

    expect(outcomes[0]).toMatchObject({
      status: 'fetched',
      title: 'Checkout',
      text: 'Checkout Visitors trust pages with clear guarantees near the checkout.',
      insights: ['Checkout Visitors trust pages with clear guarantees near the checkout'],
    });
  });

  it('spaces requests to one domain by the throttle interval', async () => {
    const first = 'https://alpha.test/one';
    const second = 'https://alpha.test/two';
    const web = createFakeWeb({ pages: { [first]: PAGE, [second]: PAGE } });
    const orchestrator = buildOrchestrator(web, [first, second], { throttle: new DomainThrottle(10) });

    const { outcomes } = await orchestrator.run(queryFor(2));

    expect(outcomes[0].waitedMs).toBe(0);
    expect(outcomes[1].waitedMs).toBeGreaterThanOrEqual(90);
    expect(outcomes[1].waitedMs).toBeLessThanOrEqual(100);
  });

  it('blocks a domain after a timeout', async () => {
    const url = 'https://alpha.test/cro';
    const web = createFakeWeb({ pages: { [url]: { ...PAGE, delayMs: 200 } } });
    const orchestrator = buildOrchestrator(web, [url], { fetchTimeoutMs: 30 });

    const { outcomes } = await orchestrator.run(queryFor(1));

    expect(outcomes[0].status).toBe('failed');
    expect(outcomes[0].error).toBe('Fetch of https://alpha.test/cro timed out after 30ms');
    expect(orchestrator.blockedDomains()).toEqual(['alpha.test']);
    expect(orchestrator.isBlocked('ALPHA.test')).toBe(true);
  });

  it('skips queued sources whose domain failed while they waited', async () => {
    const broken = 'https://alpha.test/broken';
    const queued = 'https://alpha.test/queued';
    const web = createFakeWeb({ pages: { [broken]: { status: 500 }, [queued]: PAGE } });
    const orchestrator = buildOrchestrator(web, [broken, queued], { maxConcurrentFetches: 1 });

    const { outcomes } = await orchestrator.run(queryFor(2));

    expect(outcomes.map((outcome) => outcome.status)).toEqual(['failed', 'blocked']);
    expect(outcomes[0].error).toBe('HTTP 500');
    expect(web.pageCalls(queued)).toBe(0);
  });

  it('rejects non-text responses', async () => {
    const url = 'https://alpha.test/feed';
    const web = createFakeWeb({ pages: { [url]: { body: '{}', contentType: 'application/json' } } });
    const orchestrator = buildOrchestrator(web, [url]);

    const { outcomes } = await orchestrator.run(queryFor(1));

    expect(outcomes[0].error).toBe('Unsupported content-type: application/json');
  });

  it('refuses private hosts without requesting the page', async () => {
    const url = 'http://127.0.0.1/admin';
    const web = createFakeWeb({ pages: { [url]: PAGE } });
    const orchestrator = buildOrchestrator(web, [url]);

    const { outcomes } = await orchestrator.run(queryFor(1));

    expect(outcomes[0].status).toBe('failed');
    expect(outcomes[0].error).toBe('Blocked IP address: 127.0.0.1');
    expect(web.pageCalls(url)).toBe(0);
  });

  it('does not block domains when the caller aborts mid-fetch', async () => {
    const urls = ['https://alpha.test/page', 'https://beta.test/page'];
    const web = createFakeWeb({ pages: Object.fromEntries(urls.map((url) => [url, { ...PAGE, delayMs: 200 }])) });
    const orchestrator = buildOrchestrator(web, urls);
    const controller = new AbortController();
    setTimeout(() => controller.abort(new Error('caller gave up')), 20);

    const { outcomes } = await orchestrator.run(queryFor(2), { signal: controller.signal });

    expect(outcomes.map((outcome) => [outcome.status, outcome.error])).toEqual([
      ['failed', 'caller gave up'],
      ['failed', 'caller gave up'],
    ]);
    expect(orchestrator.blockedDomains()).toEqual([]);
  });

  it('clears the block list on reset', async () => {
    const url = 'https://alpha.test/cro';
    const web = createFakeWeb({ pages: { [url]: { status: 502 } } });
    const orchestrator = buildOrchestrator(web, [url]);

    await orchestrator.run(queryFor(1));
    expect(orchestrator.blockedDomains()).toEqual(['alpha.test']);

    orchestrator.reset();
    expect(orchestrator.blockedDomains()).toEqual([]);
  });
});
