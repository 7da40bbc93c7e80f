import { describe, test, expect } from 'vitest';
import { formatValidationReport, validateFeeds } from './validation.js';
import { NOW, daysAgo, fakeHttpGet, hoursAgo, rssDocument, testConfig } from '../testing/fixtures.js';

describe('validateFeeds()', () => {
    test('should report entries and filter passes per feed', async () => {
        const config = testConfig();
        const report = await validateFeeds(config, {
            now: () => NOW,
            httpGet: fakeHttpGet({
                'https://feeds.test/wltx.xml': rssDocument('WLTX', [
                    { title: 'Ice storm hits Sumter', link: 'https://www.wltx.com/1', pubDate: hoursAgo(1) },
                    { title: 'Ice storm hits Sumter last week', link: 'https://www.wltx.com/2', pubDate: daysAgo(5) }
                ]),
                'https://feeds.test/wyff.xml': new Error('getaddrinfo ENOTFOUND feeds.test')
            })
        });

        expect(report.timestamp).toBe(NOW.toISOString());
        expect(report.summary).toEqual({ working: 1, failing: 1, total: 2 });
        expect(report.feeds[0]).toMatchObject({ feed: 'WLTX', status: 'ok', entries: 2, relevant: 1, latest: 'Ice storm hits Sumter' });
        expect(report.feeds[1]).toMatchObject({ feed: 'WYFF', status: 'error', entries: 0, relevant: 0, error: 'network: getaddrinfo ENOTFOUND feeds.test' });
    });
});

describe('formatValidationReport()', () => {
    test('should print one line per feed and a summary', () => {
        const lines = formatValidationReport({
            timestamp: NOW.toISOString(),
            summary: { working: 1, failing: 1, total: 2 },
            feeds: [
                { feed: 'WLTX', status: 'ok', entries: 2, relevant: 1, durationMs: 5, latest: 'Ice storm hits Sumter' },
                { feed: 'WYFF', status: 'error', entries: 0, relevant: 0, durationMs: 9, error: 'HTTP 404' }
            ]
        });

        expect(lines).toEqual([
            'OK    2 entries, 1 relevant        WLTX',
            '   └─ Latest: Ice storm hits Sumter',
            'FAIL  0 entries, 0 relevant        WYFF',
            '   └─ Error: HTTP 404',
            '',
            'Working: 1 feeds',
            'Failing: 1 feeds',
            'Success Rate: 50.0%'
        ]);
    });
});
