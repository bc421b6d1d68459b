import type { Logger } from '../obs/logger';
import { linkAbortSignal } from '../utils/async';
import type { Semaphore } from '../utils/concurrency';
import { escapeRegExp } from '../utils/text';
import type { HttpFetch } from './types';

export interface RobotsRule {
  allow: boolean;
  pattern: string;
}

/** Rules that apply to the wildcard user agent. */
export interface RobotsRules {
  rules: RobotsRule[];
}

/** Per-run memo of robots.txt lookups, keyed by origin. */
export type PolicyCache = Map<string, Promise<RobotsRules | null>>;

export interface PolicyGateOptions {
  fetch: HttpFetch;
  timeoutMs: number;
  userAgent: string;
  logger?: Logger;
}

export interface PolicyCheckOptions {
  signal?: AbortSignal;
  cache?: PolicyCache;
  /** Held only while the robots.txt request is in flight; the timeout starts once admitted. */
  limiter?: Semaphore;
}

/**
 * Parse robots.txt into the rules for `User-agent: *`.
 * Consecutive User-agent lines share the group that follows them.
 */
export const parseRobotsTxt = (content: string): RobotsRules => {
  const result: RobotsRules = { rules: [] };
  let groupAgents: string[] = [];
  let inRules = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;

    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) continue;

    const directive = line.slice(0, colonIndex).trim().toLowerCase();
    const value = line.slice(colonIndex + 1).trim();

    switch (directive) {
      case 'user-agent':
        if (inRules) {
          groupAgents = [];
          inRules = false;
        }
        groupAgents.push(value.toLowerCase());
        break;
      case 'allow':
      case 'disallow':
        inRules = true;
        // An empty Disallow allows everything, which is the default anyway.
        if (value && groupAgents.includes('*')) {
          result.rules.push({ allow: directive === 'allow', pattern: value });
        }
        break;
      default:
        break;
    }
  }

  return result;
};

const patternCache = new Map<string, RegExp>();

const compilePattern = (pattern: string): RegExp => {
  let compiled = patternCache.get(pattern);
  if (!compiled) {
    const anchored = pattern.endsWith('$');
    const body = (anchored ? pattern.slice(0, -1) : pattern).split('*').map(escapeRegExp).join('.*');
    compiled = new RegExp(`^${body}${anchored ? '$' : ''}`);
    patternCache.set(pattern, compiled);
  }
  return compiled;
};

/** Longest matching pattern wins; on a tie, Allow wins. No match means allowed. */
export const isPathAllowed = (robots: RobotsRules, path: string): boolean => {
  if (path === '/robots.txt') return true;
  let best: RobotsRule | null = null;
  for (const rule of robots.rules) {
    if (!compilePattern(rule.pattern).test(path)) continue;
    if (
      !best ||
      rule.pattern.length > best.pattern.length ||
      (rule.pattern.length === best.pattern.length && rule.allow && !best.allow)
    ) {
      best = rule;
    }
  }
  return best ? best.allow : true;
};

export class PolicyGate {
  private readonly options: PolicyGateOptions;

  constructor(options: PolicyGateOptions) {
    this.options = options;
  }

  /** Fail-open: anything short of a readable 200 robots.txt allows the fetch. */
  async isAllowed(url: string, options: PolicyCheckOptions = {}): Promise<boolean> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return true;
    }

    const origin = `${parsed.protocol}//${parsed.host}`;
    let pending = options.cache?.get(origin);
    if (!pending) {
      pending = this.loadRules(origin, options);
      options.cache?.set(origin, pending);
    }

    const rules = await pending;
    if (!rules) return true;
    return isPathAllowed(rules, `${parsed.pathname}${parsed.search}`);
  }

  private async loadRules(origin: string, options: PolicyCheckOptions): Promise<RobotsRules | null> {
    const robotsUrl = `${origin}/robots.txt`;
    const load = () => this.fetchRules(robotsUrl, options.signal);
    try {
      return await (options.limiter ? options.limiter.run(load, options.signal) : load());
    } catch (error) {
      this.options.logger?.debug('Could not check robots.txt, allowing', {
        robotsUrl,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async fetchRules(robotsUrl: string, signal?: AbortSignal): Promise<RobotsRules | null> {
    const linked = linkAbortSignal(signal, this.options.timeoutMs, 'robots.txt fetch');
    try {
      const response = await this.options.fetch(robotsUrl, {
        method: 'GET',
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'text/plain, */*',
        },
        redirect: 'follow',
        signal: linked.signal,
      });
      if (response.status !== 200) {
        this.options.logger?.debug('robots.txt unavailable, allowing', { robotsUrl, status: response.status });
        return null;
      }
      return parseRobotsTxt(await response.text());
    } finally {
      linked.dispose();
    }
  }
}
