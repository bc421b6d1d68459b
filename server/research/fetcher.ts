import { linkAbortSignal } from '../utils/async';
import type { HttpFetch } from './types';

export interface PageFetchOptions {
  fetch: HttpFetch;
  timeoutMs: number;
  userAgent: string;
  signal?: AbortSignal;
}

export interface FetchedPage {
  url: string;
  status: number;
  html: string;
}

const TRUSTED_PROTOCOLS = new Set(['http:', 'https:']);

const PRIVATE_IP_RANGES = [/^127\./, /^10\./, /^192\.168\./, /^172\.(1[6-9]|2[0-9]|3[0-1])\./, /^169\.254\./, /^0\./];

const PRIVATE_IPV6_PREFIXES = ['fc', 'fd', 'fe80', '::1'];

const isIpv4 = (value: string): boolean => /^(\d{1,3}\.){3}\d{1,3}$/.test(value);
const isIpv6 = (value: string): boolean => value.includes(':');

const isPrivateIp = (ip: string): boolean => {
  if (isIpv6(ip)) {
    const normalized = ip.toLowerCase();
    return PRIVATE_IPV6_PREFIXES.some((prefix) => normalized.startsWith(prefix));
  }
  return PRIVATE_IP_RANGES.some((pattern) => pattern.test(ip));
};

export const assertUrlAllowed = (rawUrl: string): URL => {
  const parsed = new URL(rawUrl);
  if (!TRUSTED_PROTOCOLS.has(parsed.protocol)) {
    throw new Error(`Unsupported protocol: ${parsed.protocol}`);
  }

  if (parsed.hostname === 'localhost' || parsed.hostname.endsWith('.local')) {
    throw new Error(`Blocked hostname: ${parsed.hostname}`);
  }

  const host = parsed.hostname.replace(/^\[|\]$/g, '');
  if ((isIpv4(host) || isIpv6(host)) && isPrivateIp(host)) {
    throw new Error(`Blocked IP address: ${host}`);
  }
  return parsed;
};

/**
 * GET an HTML page. Throws on timeout, network errors, non-2xx statuses and
 * non-text responses; every throw counts as a fetch failure for the domain.
 */
export const fetchPage = async (url: string, options: PageFetchOptions): Promise<FetchedPage> => {
  assertUrlAllowed(url);
  const linked = linkAbortSignal(options.signal, options.timeoutMs, `Fetch of ${url}`);
  try {
    const response = await options.fetch(url, {
      method: 'GET',
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'text/html,application/xhtml+xml',
        'Accept-Language': 'en-US,en;q=0.9',
      },
      redirect: 'follow',
      signal: linked.signal,
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }

    const contentType = response.headers.get('content-type') || '';
    if (contentType && !/text\/html|application\/xhtml|text\/plain/i.test(contentType)) {
      throw new Error(`Unsupported content-type: ${contentType}`);
    }

    return {
      url: response.url || url,
      status: response.status,
      html: await response.text(),
    };
  } finally {
    linked.dispose();
  }
};
