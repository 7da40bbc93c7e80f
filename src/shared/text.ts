/**
 * Text helpers shared by the feed parser, the relevance filter and the report renderer.
 */

const NAMED_ENTITIES: Record<string, string> = {
    amp: '&',
    lt: '<',
    gt: '>',
    quot: '"',
    apos: "'",
    nbsp: ' ',
    ndash: '–',
    mdash: '—',
    lsquo: '‘',
    rsquo: '’',
    ldquo: '“',
    rdquo: '”',
    hellip: '…'
};

export function decodeEntities(text: string): string {
    return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
        if (body[0] === '#') {
            const code = body[1] === 'x' || body[1] === 'X'
                ? parseInt(body.slice(2), 16)
                : parseInt(body.slice(1), 10);
            if (!Number.isInteger(code) || code < 0 || code > 0x10ffff) return match;
            return String.fromCodePoint(code);
        }
        return NAMED_ENTITIES[body.toLowerCase()] ?? match;
    });
}

// Feed descriptions are often entity-encoded HTML, so decode before stripping tags
export function cleanHtml(html: string | undefined | null): string {
    if (!html) return '';
    let text = decodeEntities(html);
    text = text.replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, '$1');
    text = text.replace(/<[^>]*>/g, ' ');
    return text.replace(/\s+/g, ' ').trim();
}

export function truncate(text: string, max: number): string {
    if (text.length <= max) return text;
    const cut = text.slice(0, Math.max(0, max - 3));
    const atWord = cut.replace(/\s+\S*$/, '');
    return (atWord || cut) + '...';
}

/** Lowercased, punctuation-free form padded with spaces so terms match on word boundaries. */
export function normalizeText(text: string): string {
    const words = normalizeTerm(text);
    return words ? ` ${words} ` : ' ';
}

export function normalizeTerm(term: string): string {
    return term.toLowerCase().replace(/[^a-z0-9]+/g, ' ').trim();
}

export function containsTerm(normalizedText: string, normalizedTerm: string): boolean {
    return normalizedTerm !== '' && normalizedText.includes(` ${normalizedTerm} `);
}

export function containsAny(normalizedText: string, normalizedTerms: readonly string[]): boolean {
    return normalizedTerms.some(term => containsTerm(normalizedText, term));
}

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}
