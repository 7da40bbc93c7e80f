import type { CrawlConfig, FetchResult } from '../types/index.js';
import { fetchAllFeeds, axiosGet } from './fetcher.js';
import { filterEntries } from './pipeline.js';
import type { CrawlDeps } from './pipeline.js';

export interface ValidationRow {
    feed: string;
    status: FetchResult['status'];
    entries: number;
    relevant: number;
    durationMs: number;
    error?: string;
    latest?: string;
}

export interface ValidationReport {
    timestamp: string;
    summary: { working: number; failing: number; total: number };
    feeds: ValidationRow[];
}

export async function validateFeeds(config: CrawlConfig, deps: CrawlDeps = {}): Promise<ValidationReport> {
    const now = deps.now?.() ?? new Date();
    const results = await fetchAllFeeds(config.feeds, config.fetch, deps.httpGet ?? axiosGet);

    const feeds = results.map((result): ValidationRow => {
        const row: ValidationRow = {
            feed: result.meta.feed,
            status: result.status,
            entries: result.entries.length,
            relevant: filterEntries(result.entries, config, now).length,
            durationMs: result.meta.durationMs
        };
        if (result.error) {
            row.error = result.error.httpStatus ? `HTTP ${result.error.httpStatus}` : `${result.error.type}: ${result.error.message}`;
        }
        const first = result.entries[0];
        if (first) row.latest = first.title;
        return row;
    });

    const working = feeds.filter(f => f.status === 'ok').length;
    return {
        timestamp: now.toISOString(),
        summary: { working, failing: feeds.length - working, total: feeds.length },
        feeds
    };
}

export function formatValidationReport(report: ValidationReport): string[] {
    const lines: string[] = [];
    for (const row of report.feeds) {
        const status = (row.status === 'ok' ? 'OK' : 'FAIL').padEnd(5);
        const counts = `${row.entries} entries, ${row.relevant} relevant`.padEnd(28);
        lines.push(`${status} ${counts} ${row.feed}`);
        if (row.error) lines.push(`   └─ Error: ${row.error}`);
        if (row.latest) lines.push(`   └─ Latest: ${row.latest.substring(0, 60)}`);
    }
    const { working, failing, total } = report.summary;
    const rate = total > 0 ? ((working / total) * 100).toFixed(1) : '0.0';
    lines.push('');
    lines.push(`Working: ${working} feeds`);
    lines.push(`Failing: ${failing} feeds`);
    lines.push(`Success Rate: ${rate}%`);
    return lines;
}
