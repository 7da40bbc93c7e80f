import type { Category, FeedEntry, FilterRules } from '../types/index.js';
import { containsAny } from '../shared/text.js';
import { entryText } from './relevance.js';

/**
 * First category (in rule order) whose keyword list matches the entry text wins.
 * Entries with no text or no match land in "Other".
 */
export function categorizeEntry(entry: Pick<FeedEntry, 'title' | 'summary'>, rules: FilterRules): Category {
    const text = entryText(entry);
    for (const category of rules.categories) {
        if (containsAny(text, category.terms)) {
            return category.name;
        }
    }
    return 'Other';
}
