export const CATEGORIES = [
    'Power & Utilities',
    'Road Conditions',
    'Schools & Closures',
    'Shelters & Emergency',
    'Other'
] as const;

export type Category = typeof CATEGORIES[number];

export type NamedCategory = Exclude<Category, 'Other'>;

export type FeedConfig = {
    url: string;
    name: string;
    region?: string;
    searchTerm?: string;
    timeout?: number;
    enabled?: boolean;
};

// Parsed feed entry before filtering
export type FeedEntry = {
    title: string;
    link: string;
    pubDate: string | null;
    summary: string;
    sourceFeed: string;
};

export type Article = FeedEntry & {
    id: string;
    category: Category;
};

export type FetchErrorType = 'timeout' | 'http' | 'parse' | 'network';

export type FetchResult = {
    status: "ok" | "error";
    entries: FeedEntry[];
    error?: { type: FetchErrorType; message: string; httpStatus?: number };
    meta: { feed: string; fetchedRaw: number; kept: number; durationMs: number };
};

export type CrawlResult = {
    crawledAt: string;
    articles: Article[];
    feeds: FetchResult[];
};

// Wire format served by GET /crawl
export interface ArticleJson {
    id: string;
    title: string;
    link: string;
    published_at: string | null;
    source_feed: string;
    category: Category;
    summary: string;
}

export interface CategoryRule {
    readonly name: NamedCategory;
    readonly terms: readonly string[];
}

export interface FilterRules {
    readonly weatherTerms: readonly string[];
    readonly locationTerms: readonly string[];
    readonly exclusionTerms: readonly string[];
    readonly redCrossTerms: readonly string[];
    readonly categories: readonly CategoryRule[];
    readonly standardWindowHours: number;
    readonly extendedWindowDays: number;
}

export interface FetchOptions {
    readonly timeoutMs: number;
    readonly maxEntriesPerFeed: number;
    readonly headers: Readonly<Record<string, string>>;
}

export interface CrawlConfig {
    readonly feeds: readonly FeedConfig[];
    readonly searchTerms: readonly string[];
    readonly rules: FilterRules;
    readonly fetch: FetchOptions;
    readonly otherCap: number;
    readonly port: number;
    readonly cacheMaxAgeSeconds: number;
    readonly cacheStaleSeconds: number;
    readonly corsOrigin: string;
    readonly outputDir: string;
}
