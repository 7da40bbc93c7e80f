/**
 * URL and title normalization utilities, shared by the fetcher and the aggregator.
 */

import { createHash } from 'crypto';

const TRACKING_PARAMS = [
    'utm_source', 'utm_medium', 'utm_campaign', 'utm_term', 'utm_content',
    'fbclid', 'gclid', 'mc_cid', 'mc_eid', 'ref', 'cmpid'
];

/**
 * Validate an http(s) URL and return it in canonical `URL` form, or '' when unusable.
 */
export function normalizeUrl(urlStr: string): string {
    try {
        const u = new URL(urlStr.trim());
        if (u.protocol !== 'http:' && u.protocol !== 'https:') return '';
        return u.toString();
    } catch {
        return '';
    }
}

export function normalizeUrlForDedupe(url: string): string {
    if (!url) return '';
    try {
        const u = new URL(url);
        for (const key of Array.from(u.searchParams.keys())) {
            if (TRACKING_PARAMS.includes(key.toLowerCase())) u.searchParams.delete(key);
        }
        u.hash = '';
        const host = u.hostname.replace(/^www\./, '');
        const pathname = u.pathname.replace(/\/+$/, '');
        return `${host}${pathname}${u.search}`.toLowerCase();
    } catch {
        return url.trim().toLowerCase();
    }
}

/**
 * Title key for near-duplicate detection. Aggregators append " - Publisher" to
 * headlines, so a short trailing segment after " - " is dropped first.
 */
export function normalizeTitle(title: string): string {
    if (!title) return '';
    let base = title;
    const dash = base.lastIndexOf(' - ');
    if (dash > 0) {
        const suffix = base.slice(dash + 3).trim();
        if (suffix.split(/\s+/).length <= 5) base = base.slice(0, dash);
    }
    return base.toLowerCase().replace(/[^a-z0-9]/g, '');
}

export function computeId(link: string): string {
    return createHash('sha1').update(normalizeUrlForDedupe(link)).digest('hex').slice(0, 12);
}
