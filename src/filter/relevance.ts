/**
 * Relevance filter: keyword, location and recency predicates over a single feed entry.
 *
 * Every predicate takes the rule set explicitly so that alternative rule sets
 * can be exercised side by side.
 */

import type { FeedEntry, FilterRules } from '../types/index.js';
import { containsAny, normalizeText } from '../shared/text.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

type Matchable = Pick<FeedEntry, 'title' | 'summary'>;

export function entryText(entry: Matchable): string {
    return normalizeText(`${entry.title} ${entry.summary}`);
}

export function matchesWeather(entry: Matchable, rules: FilterRules): boolean {
    return containsAny(entryText(entry), rules.weatherTerms);
}

export function matchesLocation(entry: Matchable, rules: FilterRules): boolean {
    return containsAny(entryText(entry), rules.locationTerms);
}

export function matchesExclusion(entry: Matchable, rules: FilterRules): boolean {
    return containsAny(entryText(entry), rules.exclusionTerms);
}

export function mentionsRedCross(entry: Matchable, rules: FilterRules): boolean {
    return containsAny(entryText(entry), rules.redCrossTerms);
}

// Exclusion is checked first and wins over any weather/location match
export function isRelevant(entry: Matchable, rules: FilterRules): boolean {
    if (matchesExclusion(entry, rules)) return false;
    return matchesWeather(entry, rules) && matchesLocation(entry, rules);
}

/** Maximum age in milliseconds allowed for this entry. */
export function recencyWindowMs(entry: Matchable, rules: FilterRules): number {
    return mentionsRedCross(entry, rules)
        ? rules.extendedWindowDays * DAY_MS
        : rules.standardWindowHours * HOUR_MS;
}

export function parsePublished(pubDate: string | null): number | null {
    if (!pubDate) return null;
    const ts = new Date(pubDate).getTime();
    return Number.isNaN(ts) ? null : ts;
}

/**
 * Undated or unparseable entries are never recent. Entries dated ahead of
 * `now` count as age zero.
 */
export function isRecentEnough(entry: Matchable & Pick<FeedEntry, 'pubDate'>, rules: FilterRules, now: Date = new Date()): boolean {
    const published = parsePublished(entry.pubDate);
    if (published === null) return false;
    const age = Math.max(0, now.getTime() - published);
    return age <= recencyWindowMs(entry, rules);
}

export function passesFilter(entry: FeedEntry, rules: FilterRules, now: Date = new Date()): boolean {
    return isRelevant(entry, rules) && isRecentEnough(entry, rules, now);
}
