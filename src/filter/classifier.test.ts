import { describe, test, expect } from 'vitest';
import { categorizeEntry } from './classifier.js';
import { compileFilterRules } from './rule-engine.js';
import { makeEntry, rules } from '../testing/fixtures.js';

describe('categorizeEntry()', () => {
    test.each([
        ['Duke Energy reports 50,000 without power', 'Power & Utilities'],
        ['SCDOT crews treat interstate bridges', 'Road Conditions'],
        ['Richland Two schools stay shut Friday', 'Schools & Closures'],
        ['Governor declares state of emergency', 'Shelters & Emergency'],
        ['Weather service tracks the storm', 'Other']
    ])('should file "%s" under %s', (title, category) => {
        expect(categorizeEntry(makeEntry(title), rules)).toBe(category);
    });

    test('should take the first matching category in rule order', () => {
        expect(categorizeEntry(makeEntry('Power outage shuts Greenville schools'), rules)).toBe('Power & Utilities');
    });

    test('should look at the summary as well as the title', () => {
        expect(categorizeEntry(makeEntry('Storm update', { summary: 'Roads remain slick near Conway' }), rules)).toBe('Road Conditions');
    });

    test('should return Other for empty text', () => {
        expect(categorizeEntry({ title: '', summary: '' }, rules)).toBe('Other');
    });

    test('should follow the categories of the given rule set', () => {
        const custom = compileFilterRules({
            weatherTerms: ['snow'],
            locationTerms: ['sc'],
            categories: [{ name: 'Schools & Closures', terms: ['power'] }]
        });
        expect(categorizeEntry(makeEntry('Power outage in Aiken'), custom)).toBe('Schools & Closures');
    });
});
