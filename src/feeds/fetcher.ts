import axios from 'axios';
import type { FeedConfig, FetchErrorType, FetchOptions, FetchResult } from '../types/index.js';
import { parseFeedXml } from './parser.js';
import { log } from '../server/logging.js';

export interface HttpGetOptions {
    headers: Readonly<Record<string, string>>;
    timeoutMs: number;
    signal: AbortSignal;
}

/** Returns the response body; rejects on network errors and non-2xx statuses. */
export type HttpGet = (url: string, options: HttpGetOptions) => Promise<string>;

export const axiosGet: HttpGet = async (url, { headers, timeoutMs, signal }) => {
    const response = await axios.get<string>(url, {
        headers: { ...headers },
        timeout: timeoutMs,
        signal,
        responseType: 'text',
        maxRedirects: 5,
        maxContentLength: 5 * 1024 * 1024,
        validateStatus: (status: number) => status >= 200 && status < 300
    });
    return response.data;
};

export class FeedTimeoutError extends Error {
    constructor(readonly feed: string, readonly timeoutMs: number) {
        super(`Timed out after ${timeoutMs}ms`);
        this.name = 'FeedTimeoutError';
    }
}

class FeedParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FeedParseError';
    }
}

function describeError(err: unknown): { type: FetchErrorType; message: string; httpStatus?: number } {
    if (err instanceof FeedTimeoutError) {
        return { type: 'timeout', message: err.message };
    }
    if (err instanceof FeedParseError) {
        return { type: 'parse', message: err.message };
    }
    if (axios.isAxiosError(err)) {
        const httpStatus = err.response?.status;
        if (httpStatus) return { type: 'http', message: `HTTP ${httpStatus}`, httpStatus };
        if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') return { type: 'timeout', message: err.message };
        return { type: 'network', message: err.message };
    }
    return { type: 'network', message: err instanceof Error ? err.message : String(err) };
}

/**
 * Fetch and parse one feed. Never rejects: any failure becomes an `error`
 * result with zero entries. The timeout bounds download and parse together.
 */
export async function fetchFeed(feed: FeedConfig, options: FetchOptions, httpGet: HttpGet = axiosGet): Promise<FetchResult> {
    const start = Date.now();
    const label = feed.searchTerm ? `${feed.name} (${feed.searchTerm})` : feed.name;
    const timeoutMs = feed.timeout ?? options.timeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new FeedTimeoutError(label, timeoutMs));
        }, timeoutMs);
    });

    const attempt = async () => {
        const body = await httpGet(feed.url, { headers: options.headers, timeoutMs, signal: controller.signal });
        try {
            return await parseFeedXml(body, feed, options.maxEntriesPerFeed);
        } catch (err) {
            throw new FeedParseError(err instanceof Error ? err.message : String(err));
        }
    };

    try {
        const parsed = await Promise.race([attempt(), deadline]);
        const durationMs = Date.now() - start;
        log('info', 'Feed fetched', { feed: label, entries: parsed.entries.length, parser: parsed.parser, durationMs });
        return {
            status: 'ok',
            entries: parsed.entries,
            meta: { feed: label, fetchedRaw: parsed.fetchedRaw, kept: parsed.entries.length, durationMs }
        };
    } catch (err) {
        const error = describeError(err);
        const durationMs = Date.now() - start;
        log('warn', 'Feed failed', { feed: label, url: feed.url, ...error, durationMs });
        return {
            status: 'error',
            entries: [],
            error,
            meta: { feed: label, fetchedRaw: 0, kept: 0, durationMs }
        };
    } finally {
        clearTimeout(timer);
    }
}

// Fetch every enabled feed concurrently; results keep configuration order
export async function fetchAllFeeds(feeds: readonly FeedConfig[], options: FetchOptions, httpGet: HttpGet = axiosGet): Promise<FetchResult[]> {
    const enabled = feeds.filter(f => f.enabled !== false);
    const results = await Promise.all(enabled.map(feed => fetchFeed(feed, options, httpGet)));

    const failed = results.filter(r => r.status === 'error').length;
    const totalEntries = results.reduce((sum, r) => sum + r.meta.kept, 0);
    log(failed === results.length && results.length > 0 ? 'error' : 'info', 'Fetch completed', {
        feeds: results.length,
        failed,
        entries: totalEntries
    });
    return results;
}
