import { describe, test, expect } from 'vitest';
import {
    isRecentEnough,
    isRelevant,
    matchesExclusion,
    matchesLocation,
    matchesWeather,
    mentionsRedCross,
    passesFilter,
    recencyWindowMs
} from './relevance.js';
import { NOW, daysAgo, hoursAgo, makeEntry, rules } from '../testing/fixtures.js';

describe('isRelevant()', () => {
    test('should accept weather coverage with a South Carolina location', () => {
        expect(isRelevant(makeEntry('Ice storm knocks out power in Greenville'), rules)).toBe(true);
    });

    test('should reject weather coverage from elsewhere', () => {
        const entry = makeEntry('Ice storm hits Ohio');
        expect(matchesWeather(entry, rules)).toBe(true);
        expect(matchesLocation(entry, rules)).toBe(false);
        expect(isRelevant(entry, rules)).toBe(false);
    });

    test('should reject local news without weather terms', () => {
        expect(isRelevant(makeEntry('Columbia SC restaurant opens downtown'), rules)).toBe(false);
    });

    test('should let exclusion win over weather and location matches', () => {
        const entry = makeEntry('Police investigate crash on icy I-26 in Spartanburg');
        expect(matchesWeather(entry, rules)).toBe(true);
        expect(matchesLocation(entry, rules)).toBe(true);
        expect(matchesExclusion(entry, rules)).toBe(true);
        expect(isRelevant(entry, rules)).toBe(false);
    });

    test.each([
        'Greenville County animal shelter waives adoption fees',
        'Spectrum internet outage hits Columbia customers',
        'Charleston homeless shelter opens new wing'
    ])('should reject "%s" without a weather term', title => {
        expect(matchesWeather(makeEntry(title), rules)).toBe(false);
        expect(isRelevant(makeEntry(title), rules)).toBe(false);
    });

    test('should accept storm shelters and power outages', () => {
        expect(isRelevant(makeEntry('Sumter opens warming shelter ahead of hard freeze'), rules)).toBe(true);
        expect(isRelevant(makeEntry('Power outage leaves Aiken neighborhoods dark'), rules)).toBe(true);
    });

    test('should match on whole words only', () => {
        expect(isRelevant(makeEntry('Snowboarding season opens in Greenville'), rules)).toBe(false);
    });

    test('should match terms found in the summary', () => {
        const entry = makeEntry('Winter storm update', { summary: 'Crews in Charleston salt bridges overnight' });
        expect(isRelevant(entry, rules)).toBe(true);
    });
});

describe('isRecentEnough()', () => {
    test('should use a 48 hour window by default', () => {
        expect(recencyWindowMs(makeEntry('Snow in Aiken'), rules)).toBe(48 * 60 * 60 * 1000);
        expect(isRecentEnough(makeEntry('Snow in Aiken', { pubDate: hoursAgo(47).toISOString() }), rules, NOW)).toBe(true);
        expect(isRecentEnough(makeEntry('Snow in Aiken', { pubDate: hoursAgo(48).toISOString() }), rules, NOW)).toBe(true);
        expect(isRecentEnough(makeEntry('Snow in Aiken', { pubDate: hoursAgo(49).toISOString() }), rules, NOW)).toBe(false);
    });

    test('should extend the window to 7 days for Red Cross coverage', () => {
        const title = 'Red Cross opens warming shelter in Sumter';
        expect(mentionsRedCross(makeEntry(title), rules)).toBe(true);
        expect(recencyWindowMs(makeEntry(title), rules)).toBe(7 * 24 * 60 * 60 * 1000);
        expect(isRecentEnough(makeEntry(title, { pubDate: daysAgo(6).toISOString() }), rules, NOW)).toBe(true);
        expect(isRecentEnough(makeEntry(title, { pubDate: daysAgo(7).toISOString() }), rules, NOW)).toBe(true);
        expect(isRecentEnough(makeEntry(title, { pubDate: daysAgo(8).toISOString() }), rules, NOW)).toBe(false);
    });

    test('should treat missing or unparseable dates as not recent', () => {
        expect(isRecentEnough(makeEntry('Snow in Aiken', { pubDate: null }), rules, NOW)).toBe(false);
        expect(isRecentEnough(makeEntry('Snow in Aiken', { pubDate: 'yesterday-ish' }), rules, NOW)).toBe(false);
    });

    test('should treat future dates as current', () => {
        expect(isRecentEnough(makeEntry('Snow in Aiken', { pubDate: hoursAgo(-2).toISOString() }), rules, NOW)).toBe(true);
    });
});

describe('passesFilter()', () => {
    test('should require both relevance and recency', () => {
        const fresh = makeEntry('Freezing rain coats Rock Hill', { pubDate: hoursAgo(3).toISOString() });
        const stale = makeEntry('Freezing rain coats Rock Hill', { pubDate: daysAgo(3).toISOString() });
        const offTopic = makeEntry('Rock Hill council meets', { pubDate: hoursAgo(3).toISOString() });
        expect(passesFilter(fresh, rules, NOW)).toBe(true);
        expect(passesFilter(stale, rules, NOW)).toBe(false);
        expect(passesFilter(offTopic, rules, NOW)).toBe(false);
    });
});
