import * as fs from 'fs';
import * as path from 'path';
import type { CrawlConfig, FeedConfig } from '../types/index.js';
import { ConfigError } from '../shared/errors.js';
import { loadFilterRules, DEFAULT_RULES_FILE } from '../filter/rule-engine.js';

export const DEFAULT_FEEDS_FILE = path.join(process.cwd(), 'config', 'feeds.json');

// Some station CMSes return 403 to bare clients
export const BROWSER_HEADERS = {
  "User-Agent": "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Accept": "application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5"
};

export const DEFAULTS = {
  port: 8080,
  feedTimeoutMs: 10_000,
  maxEntriesPerFeed: 20,
  otherCap: 10,
  cacheMaxAgeSeconds: 3 * 60 * 60,
  cacheStaleSeconds: 60 * 60,
  corsOrigin: '*'
} as const;

export interface FeedSources {
  feeds: FeedConfig[];
  searchTerms: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function searchUrl(template: string, term: string): string {
  return template.replace('{query}', encodeURIComponent(term).replace(/%20/g, '+'));
}

function parseFeedEntry(entry: unknown, index: number, source: string): FeedConfig {
  if (!isRecord(entry) || typeof entry.name !== 'string' || typeof entry.url !== 'string') {
    throw new ConfigError(`feeds[${index}] needs string "name" and "url"`, source);
  }
  const feed: FeedConfig = { name: entry.name, url: entry.url };
  if (typeof entry.region === 'string') feed.region = entry.region;
  if (typeof entry.timeout === 'number') feed.timeout = entry.timeout;
  if (typeof entry.enabled === 'boolean') feed.enabled = entry.enabled;
  return feed;
}

/**
 * Expand the feed file into concrete feeds: one per search term for the
 * search feed, followed by the regional feeds in file order.
 */
export function parseFeedSources(raw: unknown, source = 'feed list'): FeedSources {
  if (!isRecord(raw)) {
    throw new ConfigError('expected a JSON object', source);
  }

  const feeds: FeedConfig[] = [];
  let searchTerms: string[] = [];

  if (raw.searchFeed !== undefined) {
    const search = raw.searchFeed;
    if (!isRecord(search)) {
      throw new ConfigError('"searchFeed" must be an object', source);
    }
    const { name, urlTemplate: template, terms } = search;
    if (typeof name !== 'string' || typeof template !== 'string'
      || !Array.isArray(terms) || !terms.every((t): t is string => typeof t === 'string')) {
      throw new ConfigError('"searchFeed" needs "name", "urlTemplate" and a "terms" string array', source);
    }
    if (!template.includes('{query}')) {
      throw new ConfigError('"searchFeed.urlTemplate" must contain {query}', source);
    }
    searchTerms = terms;
    for (const term of searchTerms) {
      feeds.push({ name, url: searchUrl(template, term), searchTerm: term });
    }
  }

  const regional = raw.feeds ?? [];
  if (!Array.isArray(regional)) {
    throw new ConfigError('"feeds" must be an array', source);
  }
  regional.forEach((entry, index) => feeds.push(parseFeedEntry(entry, index, source)));

  if (feeds.length === 0) {
    throw new ConfigError('no feeds configured', source);
  }
  return { feeds, searchTerms };
}

export function loadFeedSources(file: string = DEFAULT_FEEDS_FILE): FeedSources {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigError(`could not read feed list (${err instanceof Error ? err.message : String(err)})`, file);
  }
  return parseFeedSources(parsed, file);
}

function intEnv(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const value = env[name];
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${value}"`, 'environment');
  }
  return parsed;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Read environment and data files once into the immutable configuration
 * handed to the fetcher, filter and server.
 */
export function loadCrawlConfig(env: NodeJS.ProcessEnv = process.env): CrawlConfig {
  const { feeds, searchTerms } = loadFeedSources(env.FEEDS_FILE || DEFAULT_FEEDS_FILE);
  const rules = loadFilterRules(env.RULES_FILE || DEFAULT_RULES_FILE);

  const headers: Record<string, string> = { ...BROWSER_HEADERS };
  if (env.USER_AGENT) headers["User-Agent"] = env.USER_AGENT;

  return deepFreeze({
    feeds,
    searchTerms,
    rules,
    fetch: {
      timeoutMs: intEnv(env, 'FEED_TIMEOUT_MS', DEFAULTS.feedTimeoutMs, 1),
      maxEntriesPerFeed: intEnv(env, 'MAX_ENTRIES_PER_FEED', DEFAULTS.maxEntriesPerFeed, 1),
      headers
    },
    otherCap: DEFAULTS.otherCap,
    port: intEnv(env, 'PORT', DEFAULTS.port, 0),
    cacheMaxAgeSeconds: intEnv(env, 'CACHE_MAX_AGE_SECONDS', DEFAULTS.cacheMaxAgeSeconds, 0),
    cacheStaleSeconds: intEnv(env, 'CACHE_STALE_SECONDS', DEFAULTS.cacheStaleSeconds, 0),
    corsOrigin: env.CORS_ORIGIN || DEFAULTS.corsOrigin,
    outputDir: env.OUTPUT_DIR || process.cwd()
  });
}
