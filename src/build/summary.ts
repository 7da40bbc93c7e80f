import { CATEGORIES } from '../types/index.js';
import type { Article, Category, FilterRules, NamedCategory } from '../types/index.js';
import { mentionsRedCross } from '../filter/relevance.js';
import { truncate } from '../shared/text.js';

const IMPACTS_PER_CATEGORY = 4;
const IMPACT_TITLE_CHARS = 80;

export interface BriefingSummary {
    executiveSummary: string;
    articleCount: number;
    sourceCount: number;
    redCrossMentions: number;
    categoryCounts: Record<Category, number>;
    keyImpacts: Record<NamedCategory, string[]>;
}

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
    return `${count} ${count === 1 ? singular : pluralForm}`;
}

export function buildBriefingSummary(articles: readonly Article[], rules: FilterRules): BriefingSummary {
    const categoryCounts: Record<Category, number> = {
        'Power & Utilities': 0,
        'Road Conditions': 0,
        'Schools & Closures': 0,
        'Shelters & Emergency': 0,
        'Other': 0
    };
    const keyImpacts: Record<NamedCategory, string[]> = {
        'Power & Utilities': [],
        'Road Conditions': [],
        'Schools & Closures': [],
        'Shelters & Emergency': []
    };

    const sources = new Set<string>();
    let redCrossMentions = 0;

    for (const article of articles) {
        sources.add(article.sourceFeed);
        categoryCounts[article.category]++;
        if (mentionsRedCross(article, rules)) redCrossMentions++;
        if (article.category !== 'Other') {
            const impacts = keyImpacts[article.category];
            if (impacts.length < IMPACTS_PER_CATEGORY) impacts.push(truncate(article.title, IMPACT_TITLE_CHARS));
        }
    }

    let executiveSummary: string;
    if (articles.length === 0) {
        executiveSummary = 'No new winter storm coverage from South Carolina sources in the current window.';
    } else {
        const active = CATEGORIES
            .filter(c => c !== 'Other' && categoryCounts[c] > 0)
            .map(c => `${c} (${categoryCounts[c]})`);
        executiveSummary = `This briefing covers ${plural(articles.length, 'article')} from ${plural(sources.size, 'source')} on the South Carolina winter storm.`;
        if (active.length > 0) executiveSummary += ` Reported impacts: ${active.join(', ')}.`;
        if (redCrossMentions > 0) executiveSummary += ` Red Cross is mentioned in ${plural(redCrossMentions, 'article')}.`;
    }

    return {
        executiveSummary,
        articleCount: articles.length,
        sourceCount: sources.size,
        redCrossMentions,
        categoryCounts,
        keyImpacts
    };
}
