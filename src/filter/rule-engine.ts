import * as fs from 'fs';
import * as path from 'path';
import { CATEGORIES } from '../types/index.js';
import type { CategoryRule, FilterRules, NamedCategory } from '../types/index.js';
import { ConfigError } from '../shared/errors.js';
import { normalizeTerm } from '../shared/text.js';

export const DEFAULT_RULES_FILE = path.join(process.cwd(), 'config', 'filter-rules.json');

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNamedCategory(value: unknown): value is NamedCategory {
    return typeof value === 'string' && value !== 'Other' && CATEGORIES.some(c => c === value);
}

/**
 * Normalize a keyword list the same way article text is normalized, dropping blanks and repeats.
 */
function termList(raw: Record<string, unknown>, key: string, source: string, required: boolean): string[] {
    const value = raw[key];
    if (value === undefined && !required) return [];
    if (!Array.isArray(value) || !value.every((t): t is string => typeof t === 'string')) {
        throw new ConfigError(`"${key}" must be an array of strings`, source);
    }
    const terms = Array.from(new Set(value.map((t: string) => normalizeTerm(t)).filter(Boolean)));
    if (required && terms.length === 0) {
        throw new ConfigError(`"${key}" must not be empty`, source);
    }
    return terms;
}

function positiveNumber(raw: Record<string, unknown>, key: string, fallback: number, source: string): number {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
        throw new ConfigError(`"recency.${key}" must be a positive number`, source);
    }
    return value;
}

export function compileFilterRules(raw: unknown, source = 'filter rules'): FilterRules {
    if (!isRecord(raw)) {
        throw new ConfigError('expected a JSON object', source);
    }

    const categoriesRaw = raw.categories ?? [];
    if (!Array.isArray(categoriesRaw)) {
        throw new ConfigError('"categories" must be an array', source);
    }
    const categories: CategoryRule[] = categoriesRaw.map((entry, index) => {
        if (!isRecord(entry) || !isNamedCategory(entry.name)) {
            throw new ConfigError(`categories[${index}] must name one of: ${CATEGORIES.filter(c => c !== 'Other').join(', ')}`, source);
        }
        return { name: entry.name, terms: termList(entry, 'terms', source, true) };
    });

    const recency = raw.recency ?? {};
    if (!isRecord(recency)) {
        throw new ConfigError('"recency" must be an object', source);
    }

    return Object.freeze({
        weatherTerms: Object.freeze(termList(raw, 'weatherTerms', source, true)),
        locationTerms: Object.freeze(termList(raw, 'locationTerms', source, true)),
        exclusionTerms: Object.freeze(termList(raw, 'exclusionTerms', source, false)),
        redCrossTerms: Object.freeze(termList(raw, 'redCrossTerms', source, false)),
        categories: Object.freeze(categories.map(c => Object.freeze({ name: c.name, terms: Object.freeze(c.terms) }))),
        standardWindowHours: positiveNumber(recency, 'standardHours', 48, source),
        extendedWindowDays: positiveNumber(recency, 'extendedDays', 7, source)
    });
}

export function loadFilterRules(file: string = DEFAULT_RULES_FILE): FilterRules {
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (err) {
        throw new ConfigError(`could not read rules (${err instanceof Error ? err.message : String(err)})`, file);
    }
    return compileFilterRules(parsed, file);
}
