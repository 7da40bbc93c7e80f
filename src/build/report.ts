/**
 * Printable report: a paginated document model plus its HTML rendering.
 * Browsers turn the HTML into a PDF through the print dialog; every headline
 * stays a clickable link in the saved file.
 */

import type { Article, Category, FilterRules } from '../types/index.js';
import { groupByCategory } from '../feeds/aggregator.js';
import { mentionsRedCross } from '../filter/relevance.js';
import { escapeHtml } from '../shared/text.js';
import { buildBriefingSummary } from './summary.js';
import type { BriefingSummary } from './summary.js';

export const DEFAULT_ITEMS_PER_PAGE = 12;
export const REPORT_TITLE = 'South Carolina Winter Storm';
export const REPORT_SUBTITLE = 'Winter Storm News Summary';

const SECTION_TITLES: Record<Category, string> = {
    'Power & Utilities': 'Power & Utilities',
    'Road Conditions': 'Road Conditions',
    'Schools & Closures': 'Schools & Closures',
    'Shelters & Emergency': 'Shelters & Emergency',
    'Other': 'Other Coverage'
};

export const RED_CROSS_SECTION = 'Red Cross Mentions';

export type ReportBlock =
    | { kind: 'section'; title: string; count: number }
    | { kind: 'article'; title: string; link: string; source: string; publishedAt: string | null; summary: string; redCross: boolean };

export interface ReportPage {
    number: number;
    total: number;
    blocks: ReportBlock[];
}

export interface ReportDocument {
    title: string;
    subtitle: string;
    generatedAt: string;
    summary: BriefingSummary;
    pages: ReportPage[];
}

export interface ReportOptions {
    rules: FilterRules;
    generatedAt: Date;
    itemsPerPage?: number;
}

function articleBlock(article: Article, redCross: boolean): ReportBlock {
    return {
        kind: 'article',
        title: article.title,
        link: article.link,
        source: article.sourceFeed,
        publishedAt: article.pubDate,
        summary: article.summary,
        redCross
    };
}

export function buildReportBlocks(articles: readonly Article[], rules: FilterRules): ReportBlock[] {
    const blocks: ReportBlock[] = [];
    for (const [category, items] of groupByCategory(articles)) {
        if (items.length === 0) continue;
        blocks.push({ kind: 'section', title: SECTION_TITLES[category], count: items.length });
        for (const article of items) {
            blocks.push(articleBlock(article, mentionsRedCross(article, rules)));
        }
    }

    const redCross = articles.filter(a => mentionsRedCross(a, rules));
    if (redCross.length > 0) {
        blocks.push({ kind: 'section', title: RED_CROSS_SECTION, count: redCross.length });
        for (const article of redCross) blocks.push(articleBlock(article, true));
    }
    return blocks;
}

/**
 * Split blocks into pages of at most `perPage` blocks. A section heading is
 * never left as the last block of a page.
 */
export function paginate(blocks: readonly ReportBlock[], perPage: number): ReportBlock[][] {
    const size = Math.max(2, Math.floor(perPage));
    const pages: ReportBlock[][] = [];
    let current: ReportBlock[] = [];

    for (const block of blocks) {
        const full = current.length >= size;
        const orphanHeading = block.kind === 'section' && current.length === size - 1;
        if (current.length > 0 && (full || orphanHeading)) {
            pages.push(current);
            current = [];
        }
        current.push(block);
    }
    if (current.length > 0 || pages.length === 0) pages.push(current);
    return pages;
}

export function buildReportDocument(articles: readonly Article[], options: ReportOptions): ReportDocument {
    const chunks = paginate(buildReportBlocks(articles, options.rules), options.itemsPerPage ?? DEFAULT_ITEMS_PER_PAGE);
    return {
        title: REPORT_TITLE,
        subtitle: REPORT_SUBTITLE,
        generatedAt: options.generatedAt.toISOString(),
        summary: buildBriefingSummary(articles, options.rules),
        pages: chunks.map((blocks, index) => ({ number: index + 1, total: chunks.length, blocks }))
    };
}

// --- HTML rendering ---------------------------------------------------------

function formatDate(iso: string | null): string {
    if (!iso) return '';
    const date = new Date(iso);
    if (Number.isNaN(date.getTime())) return '';
    return date.toLocaleString('en-US', {
        timeZone: 'America/New_York',
        month: 'short',
        day: 'numeric',
        year: 'numeric',
        hour: 'numeric',
        minute: '2-digit'
    }) + ' ET';
}

function renderBlock(block: ReportBlock): string {
    if (block.kind === 'section') {
        return `<h2 class="section-title">${escapeHtml(block.title)} (${block.count})</h2>`;
    }
    const meta = [block.source, formatDate(block.publishedAt)].filter(Boolean).map(escapeHtml).join(' | ');
    return `<div class="article-card${block.redCross ? ' red-cross' : ''}">
        <h3 class="article-title"><a href="${escapeHtml(block.link)}" target="_blank" rel="noopener">${escapeHtml(block.title)}</a></h3>
        <div class="article-meta">${meta}</div>
        ${block.summary ? `<p class="summary">${escapeHtml(block.summary)}</p>` : ''}
    </div>`;
}

function renderOverview(doc: ReportDocument): string {
    const { summary } = doc;
    const impacts = Object.entries(summary.keyImpacts)
        .filter(([, titles]) => titles.length > 0)
        .map(([category, titles]) => `<li><strong>${escapeHtml(category)}:</strong> ${titles.map(escapeHtml).join('; ')}</li>`)
        .join('\n');

    return `<div class="stats-bar">
        <div class="stat-card"><div class="number">${summary.articleCount}</div><div class="label">Articles</div></div>
        <div class="stat-card"><div class="number">${summary.sourceCount}</div><div class="label">Sources</div></div>
        <div class="stat-card"><div class="number">${summary.redCrossMentions}</div><div class="label">Red Cross Mentions</div></div>
    </div>
    <h2 class="section-title">Executive Summary</h2>
    <p class="executive-summary">${escapeHtml(summary.executiveSummary)}</p>
    ${impacts ? `<ul class="key-impacts">\n${impacts}\n</ul>` : ''}`;
}

export function renderReportHtml(doc: ReportDocument): string {
    const generated = formatDate(doc.generatedAt);
    const pages = doc.pages.map(page => {
        const body = page.blocks.length > 0
            ? page.blocks.map(renderBlock).join('\n')
            : '<p class="empty">No updates available. Check back after the next crawl.</p>';
        return `<section class="page">
    ${page.number === 1 ? renderOverview(doc) : ''}
    ${body}
    <footer class="page-footer">${escapeHtml(doc.subtitle)} | Page ${page.number} of ${page.total}</footer>
</section>`;
    }).join('\n');

    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(doc.title)} | ${escapeHtml(doc.subtitle)}</title>
<style>
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Arial, sans-serif; background: #f5f5f5; color: #333; line-height: 1.5; }
    .header { background: #c62828; color: #fff; padding: 24px; text-align: center; }
    .header h1 { font-size: 26px; }
    .header .updated { font-size: 12px; opacity: 0.85; margin-top: 8px; }
    .print-btn { margin-top: 12px; background: #fff; color: #c62828; border: 0; border-radius: 4px; padding: 6px 14px; cursor: pointer; }
    .page { max-width: 900px; margin: 24px auto; background: #fff; padding: 32px; border-radius: 8px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
    .stats-bar { display: flex; gap: 16px; margin-bottom: 20px; }
    .stat-card { flex: 1; border: 1px solid #ffcdd2; border-radius: 6px; padding: 12px 16px; }
    .stat-card .number { font-size: 28px; font-weight: bold; color: #c62828; }
    .stat-card .label { font-size: 11px; text-transform: uppercase; color: #666; }
    .section-title { font-size: 15px; color: #fff; background: #c62828; border-radius: 3px; padding: 4px 8px; margin: 18px 0 8px; }
    .executive-summary { margin-bottom: 8px; }
    .key-impacts { margin-left: 20px; font-size: 13px; }
    .article-card { padding: 10px 0; border-bottom: 1px solid #eee; }
    .article-card.red-cross { border-left: 3px solid #c62828; padding-left: 8px; }
    .article-title { font-size: 15px; }
    .article-title a { color: #1a0dab; text-decoration: none; }
    .article-meta { font-size: 11px; color: #999; }
    .summary { font-size: 13px; color: #666; }
    .empty { color: #999; padding: 20px 0; }
    .page-footer { margin-top: 24px; padding-top: 8px; border-top: 1px solid #c62828; font-size: 11px; color: #aaa; }
    @media print {
        body { background: #fff; }
        .print-btn { display: none; }
        .page { box-shadow: none; margin: 0; max-width: none; border-radius: 0; page-break-after: always; }
        .page:last-of-type { page-break-after: auto; }
    }
</style>
</head>
<body>
<div class="header">
    <h1>${escapeHtml(doc.title)}</h1>
    <div class="subtitle">${escapeHtml(doc.subtitle)}</div>
    <div class="updated">Generated ${escapeHtml(generated)}</div>
    <button class="print-btn" onclick="window.print()">Save as PDF</button>
</div>
${pages}
</body>
</html>`;
}
