/**
 * Crawl pipeline
 *
 * 1. fetchAllFeeds()   - fetch & parse every configured feed, failures isolated
 * 2. passesFilter()    - keep relevant, recent entries per feed
 * 3. aggregate()       - merge, dedupe, sort, categorize, cap "Other"
 *
 * Each call is independent; nothing is kept between crawls.
 */

import type { CrawlConfig, CrawlResult, FeedEntry } from '../types/index.js';
import { fetchAllFeeds, axiosGet } from './fetcher.js';
import type { HttpGet } from './fetcher.js';
import { passesFilter } from '../filter/relevance.js';
import { aggregate } from './aggregator.js';
import { log } from '../server/logging.js';

export interface CrawlDeps {
    httpGet?: HttpGet;
    now?: () => Date;
}

export function filterEntries(entries: readonly FeedEntry[], config: Pick<CrawlConfig, 'rules'>, now: Date): FeedEntry[] {
    return entries.filter(entry => passesFilter(entry, config.rules, now));
}

export async function runCrawl(config: CrawlConfig, deps: CrawlDeps = {}): Promise<CrawlResult> {
    const startTime = Date.now();
    const now = deps.now?.() ?? new Date();

    const feeds = await fetchAllFeeds(config.feeds, config.fetch, deps.httpGet ?? axiosGet);
    const filtered = feeds.map(result => filterEntries(result.entries, config, now));
    const articles = aggregate(filtered, { rules: config.rules, otherCap: config.otherCap });

    log('info', 'Crawl completed', {
        feeds: feeds.length,
        failedFeeds: feeds.filter(f => f.status === 'error').length,
        fetched: feeds.reduce((sum, f) => sum + f.entries.length, 0),
        relevant: filtered.reduce((sum, list) => sum + list.length, 0),
        articles: articles.length,
        durationMs: Date.now() - startTime
    });

    return { crawledAt: now.toISOString(), articles, feeds };
}
