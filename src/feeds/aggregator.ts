import { CATEGORIES } from '../types/index.js';
import type { Article, Category, FeedEntry, FilterRules } from '../types/index.js';
import { categorizeEntry } from '../filter/classifier.js';
import { parsePublished } from '../filter/relevance.js';
import { computeId, normalizeTitle, normalizeUrlForDedupe } from '../shared/url-utils.js';

export interface AggregateOptions {
    rules: FilterRules;
    otherCap: number;
}

/**
 * Drop entries whose normalized link or normalized title was already seen.
 * The first occurrence (feed order) is kept.
 */
export function dedupeEntries(entries: readonly FeedEntry[]): FeedEntry[] {
    const seenUrls = new Set<string>();
    const seenTitles = new Set<string>();
    const unique: FeedEntry[] = [];

    for (const entry of entries) {
        const urlKey = normalizeUrlForDedupe(entry.link);
        const titleKey = normalizeTitle(entry.title);
        if ((urlKey && seenUrls.has(urlKey)) || (titleKey && seenTitles.has(titleKey))) continue;
        if (urlKey) seenUrls.add(urlKey);
        if (titleKey) seenTitles.add(titleKey);
        unique.push(entry);
    }
    return unique;
}

// Newest first; undated entries sink to the end, ties keep input order
export function sortByRecency<T extends Pick<FeedEntry, 'pubDate'>>(entries: readonly T[]): T[] {
    return [...entries].sort((a, b) => {
        const ta = parsePublished(a.pubDate);
        const tb = parsePublished(b.pubDate);
        if (ta === tb) return 0;
        if (ta === null) return 1;
        if (tb === null) return -1;
        return tb - ta;
    });
}

export function capOther(articles: readonly Article[], cap: number): Article[] {
    let others = 0;
    return articles.filter(article => {
        if (article.category !== 'Other') return true;
        others++;
        return others <= cap;
    });
}

export function aggregate(lists: readonly (readonly FeedEntry[])[], options: AggregateOptions): Article[] {
    const merged = lists.flat();
    const sorted = sortByRecency(dedupeEntries(merged));
    const categorized: Article[] = sorted.map(entry => ({
        ...entry,
        id: computeId(entry.link),
        category: categorizeEntry(entry, options.rules)
    }));
    return capOther(categorized, options.otherCap);
}

/** Buckets in display order; every category is present, possibly empty. */
export function groupByCategory(articles: readonly Article[]): Map<Category, Article[]> {
    const groups = new Map<Category, Article[]>(CATEGORIES.map(c => [c, []]));
    for (const article of articles) {
        groups.get(article.category)?.push(article);
    }
    return groups;
}
