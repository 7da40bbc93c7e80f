import { describe, test, expect } from 'vitest';
import { DEFAULTS, loadCrawlConfig, parseFeedSources } from './config.js';
import { ConfigError } from '../shared/errors.js';

describe('parseFeedSources()', () => {
    const raw = {
        searchFeed: {
            name: 'Google News',
            urlTemplate: 'https://news.google.com/rss/search?q={query}&hl=en-US',
            terms: ['SC ice storm', 'Columbia power outage']
        },
        feeds: [
            { name: 'WLTX', url: 'https://www.wltx.com/feeds/syndication/rss/news', region: 'Midlands' }
        ]
    };

    test('should expand one feed per search term ahead of regional feeds', () => {
        const { feeds, searchTerms } = parseFeedSources(raw);
        expect(searchTerms).toEqual(['SC ice storm', 'Columbia power outage']);
        expect(feeds).toEqual([
            { name: 'Google News', url: 'https://news.google.com/rss/search?q=SC+ice+storm&hl=en-US', searchTerm: 'SC ice storm' },
            { name: 'Google News', url: 'https://news.google.com/rss/search?q=Columbia+power+outage&hl=en-US', searchTerm: 'Columbia power outage' },
            { name: 'WLTX', url: 'https://www.wltx.com/feeds/syndication/rss/news', region: 'Midlands' }
        ]);
    });

    test('should require a {query} placeholder', () => {
        expect(() => parseFeedSources({ searchFeed: { ...raw.searchFeed, urlTemplate: 'https://news.google.com/rss' } }))
            .toThrow('"searchFeed.urlTemplate" must contain {query}');
    });

    test('should reject feeds without a url', () => {
        expect(() => parseFeedSources({ feeds: [{ name: 'WIS' }] }, 'feeds.json'))
            .toThrow('feeds.json: feeds[0] needs string "name" and "url"');
    });

    test('should reject an empty feed list', () => {
        expect(() => parseFeedSources({})).toThrow(ConfigError);
    });
});

describe('loadCrawlConfig()', () => {
    test('should apply defaults with the bundled feed list', () => {
        const config = loadCrawlConfig({});
        expect(config.searchTerms).toHaveLength(4);
        expect(config.feeds).toHaveLength(19);
        expect(config.port).toBe(DEFAULTS.port);
        expect(config.fetch.timeoutMs).toBe(10_000);
        expect(config.fetch.maxEntriesPerFeed).toBe(20);
        expect(config.otherCap).toBe(10);
        expect(config.cacheMaxAgeSeconds).toBe(10800);
        expect(config.cacheStaleSeconds).toBe(3600);
        expect(config.corsOrigin).toBe('*');
        expect(Object.isFrozen(config.fetch.headers)).toBe(true);
    });

    test('should read overrides from the environment', () => {
        const config = loadCrawlConfig({
            FEED_TIMEOUT_MS: '2500',
            USER_AGENT: 'test-agent',
            CORS_ORIGIN: 'https://example.org',
            OUTPUT_DIR: '/tmp/storm'
        });
        expect(config.fetch.timeoutMs).toBe(2500);
        expect(config.fetch.headers['User-Agent']).toBe('test-agent');
        expect(config.corsOrigin).toBe('https://example.org');
        expect(config.outputDir).toBe('/tmp/storm');
    });

    test('should reject malformed numbers', () => {
        expect(() => loadCrawlConfig({ PORT: 'abc' })).toThrow('environment: PORT must be an integer >= 0, got "abc"');
        expect(() => loadCrawlConfig({ FEED_TIMEOUT_MS: '0' })).toThrow(ConfigError);
    });
});
