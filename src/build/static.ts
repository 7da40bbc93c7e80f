/**
 * Static build: one crawl written out as an HTML report and a JSON data file.
 */

import * as fs from 'fs';
import * as path from 'path';
import { log } from '../server/logging.js';
import { runCrawl } from '../feeds/pipeline.js';
import type { CrawlDeps } from '../feeds/pipeline.js';
import type { CrawlConfig, CrawlResult } from '../types/index.js';
import { buildCrawlDocument } from './feed-generators.js';
import { buildReportDocument, renderReportHtml } from './report.js';

export const REPORT_FILE = 'news_report.html';
export const DATA_FILE = 'news_data.json';

export interface StaticBuildResult {
    htmlPath: string;
    jsonPath: string;
    crawl: CrawlResult;
    // true when no feed could be fetched at all
    crawlFailed: boolean;
}

export async function buildStaticReport(config: CrawlConfig, outDir: string = config.outputDir, deps: CrawlDeps = {}): Promise<StaticBuildResult> {
    const startTime = Date.now();
    log('info', 'Starting static report build', { outDir });

    const crawl = await runCrawl(config, deps);
    const crawlFailed = crawl.feeds.length > 0 && crawl.feeds.every(f => f.status === 'error');

    fs.mkdirSync(outDir, { recursive: true });
    const jsonPath = path.resolve(outDir, DATA_FILE);
    const htmlPath = path.resolve(outDir, REPORT_FILE);

    const document = buildCrawlDocument(crawl, config);
    fs.writeFileSync(jsonPath, JSON.stringify(document, null, 2), 'utf8');

    const report = buildReportDocument(crawl.articles, { rules: config.rules, generatedAt: new Date(crawl.crawledAt) });
    fs.writeFileSync(htmlPath, renderReportHtml(report), 'utf8');

    log(crawlFailed ? 'error' : 'info', 'Static report build finished', {
        articles: crawl.articles.length,
        pages: report.pages.length,
        crawlFailed,
        durationMs: Date.now() - startTime
    });

    return { htmlPath, jsonPath, crawl, crawlFailed };
}
