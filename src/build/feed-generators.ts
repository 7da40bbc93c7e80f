/**
 * JSON output: the article array served to the front end and the data file
 * written next to the HTML report.
 */

import type { Article, ArticleJson, CrawlConfig, CrawlResult } from '../types/index.js';

export function toArticleJson(article: Article): ArticleJson {
    return {
        id: article.id,
        title: article.title,
        link: article.link,
        published_at: article.pubDate,
        source_feed: article.sourceFeed,
        category: article.category,
        summary: article.summary
    };
}

export function toArticleJsonList(articles: readonly Article[]): ArticleJson[] {
    return articles.map(toArticleJson);
}

export interface CrawlDocument {
    metadata: {
        crawled_at: string;
        total_articles: number;
        feeds_total: number;
        feeds_failed: number;
        sources: string[];
        search_terms: string[];
    };
    articles: ArticleJson[];
}

export function buildCrawlDocument(result: CrawlResult, config: Pick<CrawlConfig, 'feeds' | 'searchTerms'>): CrawlDocument {
    return {
        metadata: {
            crawled_at: result.crawledAt,
            total_articles: result.articles.length,
            feeds_total: result.feeds.length,
            feeds_failed: result.feeds.filter(f => f.status === 'error').length,
            sources: Array.from(new Set(config.feeds.filter(f => f.enabled !== false).map(f => f.name))),
            search_terms: [...config.searchTerms]
        },
        articles: toArticleJsonList(result.articles)
    };
}
