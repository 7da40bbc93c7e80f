import type { IncomingMessage, ServerResponse } from 'http';
import type { CrawlConfig, CrawlResult } from '../types/index.js';
import { runCrawl } from '../feeds/pipeline.js';
import type { CrawlDeps } from '../feeds/pipeline.js';
import { toArticleJsonList } from '../build/feed-generators.js';
import { buildBriefingSummary } from '../build/summary.js';
import { buildReportDocument, renderReportHtml } from '../build/report.js';
import { log } from './logging.js';

export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export interface EndpointDeps extends CrawlDeps {
    crawl?: (config: CrawlConfig, deps: CrawlDeps) => Promise<CrawlResult>;
}

type CrawlOutcome = { result: CrawlResult; degraded: boolean };

function emptyResult(): CrawlResult {
    return { crawledAt: new Date().toISOString(), articles: [], feeds: [] };
}

function sendJson(res: ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}): void {
    res.writeHead(status, { "Content-Type": "application/json; charset=utf-8", ...headers });
    res.end(JSON.stringify(body));
}

export function createRequestHandler(config: CrawlConfig, deps: EndpointDeps = {}): RequestHandler {
    const crawl = deps.crawl ?? runCrawl;
    const crawlDeps: CrawlDeps = { httpGet: deps.httpGet, now: deps.now };
    const cacheControl = `public, max-age=0, s-maxage=${config.cacheMaxAgeSeconds}, stale-while-revalidate=${config.cacheStaleSeconds}`;

    // A failed crawl still answers with whatever it has, so the front end can show "no updates"
    async function crawlSafely(): Promise<CrawlOutcome> {
        try {
            const result = await crawl(config, crawlDeps);
            return { result, degraded: result.feeds.some(f => f.status === 'error') };
        } catch (error) {
            log('error', 'Crawl failed', {
                error: String(error),
                stack: error instanceof Error ? error.stack : undefined
            });
            return { result: emptyResult(), degraded: true };
        }
    }

    // Empty degraded answers are never cached
    function crawlHeaders(outcome: CrawlOutcome): Record<string, string> {
        const emptyAndDegraded = outcome.degraded && outcome.result.articles.length === 0;
        return {
            'Cache-Control': emptyAndDegraded ? 'no-store' : cacheControl,
            'X-Crawl-Status': outcome.degraded ? 'degraded' : 'ok'
        };
    }

    async function handleCrawlEndpoint(res: ServerResponse): Promise<void> {
        const outcome = await crawlSafely();
        sendJson(res, 200, toArticleJsonList(outcome.result.articles), crawlHeaders(outcome));
    }

    async function handleSummaryEndpoint(res: ServerResponse): Promise<void> {
        const outcome = await crawlSafely();
        const summary = buildBriefingSummary(outcome.result.articles, config.rules);
        sendJson(res, 200, { generatedAt: outcome.result.crawledAt, ...summary }, crawlHeaders(outcome));
    }

    async function handleReportEndpoint(res: ServerResponse): Promise<void> {
        const outcome = await crawlSafely();
        const report = buildReportDocument(outcome.result.articles, {
            rules: config.rules,
            generatedAt: new Date(outcome.result.crawledAt)
        });
        res.writeHead(200, { "Content-Type": "text/html; charset=utf-8", ...crawlHeaders(outcome) });
        res.end(renderReportHtml(report));
    }

    return async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const urlObj = new URL(req.url || "/", `http://localhost:${config.port}`);
        const method = req.method || 'GET';
        const pathname = urlObj.pathname.replace(/\/+$/, '') || '/';

        log('info', 'Incoming request', { method, path: pathname });

        res.setHeader('X-Content-Type-Options', 'nosniff');
        res.setHeader('Access-Control-Allow-Origin', config.corsOrigin);
        res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
        if (config.corsOrigin !== '*') res.setHeader('Vary', 'Origin');

        if (method === 'OPTIONS') {
            res.writeHead(204);
            res.end();
            return;
        }
        if (method !== 'GET' && method !== 'HEAD') {
            sendJson(res, 405, { error: "Method not allowed" }, { Allow: 'GET, OPTIONS' });
            return;
        }

        try {
            if (pathname === "/crawl" || pathname === "/api/crawl") {
                await handleCrawlEndpoint(res);
            } else if (pathname === "/summary" || pathname === "/api/summary") {
                await handleSummaryEndpoint(res);
            } else if (pathname === "/report" || pathname === "/api/pdf") {
                await handleReportEndpoint(res);
            } else if (pathname === "/health" || pathname === "/api/health") {
                sendJson(res, 200, { status: 'ok', feeds: config.feeds.filter(f => f.enabled !== false).length });
            } else {
                sendJson(res, 404, { error: "Not found" });
            }
        } catch (error) {
            log('error', 'Request handling error', { path: pathname, error: String(error) });
            if (!res.headersSent) {
                sendJson(res, 500, { error: "Internal server error" });
            } else {
                res.end();
            }
        }
    };
}
