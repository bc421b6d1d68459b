import { vi } from 'vitest';
import type { SourceCatalog } from '../types';

export interface FakePage {
  status?: number;
  body?: string;
  contentType?: string;
  delayMs?: number;
  error?: string;
}

export interface FakeWebOptions {
  pages?: Record<string, FakePage>;
  robots?: Record<string, FakePage>;
}

/**
 * An in-process stand-in for `fetch`. Pages not listed answer 404; robots.txt
 * files not listed answer 404 too, which the policy gate treats as allowed.
 * Tracks the peak number of requests (pages and robots.txt) in flight at once.
 */
export const createFakeWeb = (options: FakeWebOptions = {}) => {
  const pages = options.pages ?? {};
  const robots = options.robots ?? {};
  const stats = { inFlight: 0, maxInFlight: 0 };

  const respond = (page: FakePage | undefined, signal: AbortSignal | null | undefined): Promise<Response> =>
    new Promise<Response>((resolve, reject) => {
      const abortReason = () => (signal?.reason instanceof Error ? signal.reason : new Error('Aborted'));
      if (signal?.aborted) {
        reject(abortReason());
        return;
      }
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        if (page?.error) {
          reject(new Error(page.error));
          return;
        }
        resolve(
          new Response(page?.body ?? 'not found', {
            status: page?.status ?? (page ? 200 : 404),
            headers: { 'content-type': page?.contentType ?? 'text/html; charset=utf-8' },
          }),
        );
      }, page?.delayMs ?? 0);
      const onAbort = () => {
        clearTimeout(timer);
        reject(abortReason());
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });

  const fetch = vi.fn(async (url: string, init?: RequestInit): Promise<Response> => {
    const page = url.endsWith('/robots.txt') ? robots[new URL(url).host] : pages[url];
    stats.inFlight += 1;
    stats.maxInFlight = Math.max(stats.maxInFlight, stats.inFlight);
    try {
      return await respond(page, init?.signal);
    } finally {
      stats.inFlight -= 1;
    }
  });

  const pageCalls = (prefix = '') =>
    fetch.mock.calls.filter(([url]) => !url.endsWith('/robots.txt') && url.startsWith(prefix)).length;

  const callsTo = (prefix: string) => fetch.mock.calls.filter(([url]) => url.startsWith(prefix)).length;

  return { fetch, stats, pageCalls, callsTo };
};

export const buildCatalog = (conversion: string[], extra: Partial<SourceCatalog['focusAreas']> = {}): SourceCatalog => ({
  focusAreas: {
    ui_ux: [],
    conversion,
    seo: [],
    performance: [],
    accessibility: [],
    ...extra,
  },
  niches: {},
});

export const articleHtml = (title: string, body: string): string => `
  <html>
    <head><title>${title}</title><script>window.analytics = {};</script></head>
    <body><main><p>${body}</p></main></body>
  </html>
`;
