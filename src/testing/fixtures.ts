// Shared builders for the test suites; excluded from the production build
import * as os from 'os';
import type { Article, Category, CrawlConfig, FeedConfig, FeedEntry } from '../types/index.js';
import { loadFilterRules } from '../filter/rule-engine.js';
import type { HttpGet } from '../feeds/fetcher.js';

export const NOW = new Date('2026-01-22T12:00:00.000Z');

const HOUR_MS = 60 * 60 * 1000;

export function hoursAgo(hours: number, now: Date = NOW): Date {
    return new Date(now.getTime() - hours * HOUR_MS);
}

export function daysAgo(days: number, now: Date = NOW): Date {
    return hoursAgo(days * 24, now);
}

export const rules = loadFilterRules();

export function makeEntry(title: string, overrides: Partial<FeedEntry> = {}): FeedEntry {
    return {
        title,
        link: `https://www.wltx.com/article/${title.toLowerCase().replace(/[^a-z0-9]+/g, '-')}`,
        pubDate: hoursAgo(1).toISOString(),
        summary: '',
        sourceFeed: 'WLTX',
        ...overrides
    };
}

export function makeArticle(title: string, category: Category, overrides: Partial<Article> = {}): Article {
    return {
        ...makeEntry(title),
        id: title.toLowerCase().replace(/[^a-z0-9]+/g, '').slice(0, 12),
        category,
        ...overrides
    };
}

export interface RssItem {
    title: string;
    link?: string;
    pubDate?: Date;
    description?: string;
}

export function rssDocument(channel: string, items: RssItem[]): string {
    const body = items.map(item => [
        '<item>',
        `<title>${item.title}</title>`,
        item.link ? `<link>${item.link}</link>` : '',
        item.pubDate ? `<pubDate>${item.pubDate.toUTCString()}</pubDate>` : '',
        item.description ? `<description>${item.description}</description>` : '',
        '</item>'
    ].join('')).join('\n');

    return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0"><channel><title>${channel}</title><link>https://example.com</link><description>Test feed</description>
${body}
</channel></rss>`;
}

/** Serves canned bodies by URL; unknown URLs reject like a refused connection. */
export function fakeHttpGet(responses: Record<string, string | Error>): HttpGet {
    return async url => {
        const response = responses[url];
        if (response === undefined) throw new Error(`connect ECONNREFUSED ${url}`);
        if (response instanceof Error) throw response;
        return response;
    };
}

export function testConfig(overrides: Partial<CrawlConfig> = {}): CrawlConfig {
    const feeds: FeedConfig[] = [
        { name: 'WLTX', url: 'https://feeds.test/wltx.xml', region: 'Midlands' },
        { name: 'WYFF', url: 'https://feeds.test/wyff.xml', region: 'Upstate' }
    ];
    return {
        feeds,
        searchTerms: [],
        rules,
        fetch: { timeoutMs: 1000, maxEntriesPerFeed: 20, headers: {} },
        otherCap: 10,
        port: 0,
        cacheMaxAgeSeconds: 10800,
        cacheStaleSeconds: 3600,
        corsOrigin: '*',
        outputDir: os.tmpdir(),
        ...overrides
    };
}
