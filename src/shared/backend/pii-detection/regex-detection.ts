import { PII_CATEGORIES, type DetectionRule, type PiiCategory, type PiiMatch } from './types';

/**
 * Fixed detection rules, in declaration order.
 * Word boundaries on both ends keep digits inside longer runs from being picked up.
 */
export const DETECTION_RULES: readonly DetectionRule[] = Object.freeze<DetectionRule[]>([
    // email: local@domain.tld, 2+ letter TLD
    {
        category: 'email',
        pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
    },
    // phone: NANP 10-digit, optional +1 / 1 prefix, area code bare or in parentheses.
    // A bare area code needs a boundary only when no prefix precedes it.
    {
        category: 'phone',
        pattern:
            /(?:(?:\+1|\b1)[-. ]?(?:\([2-9]\d{2}\)|[2-9]\d{2})|\([2-9]\d{2}\)|\b[2-9]\d{2})[-. ]?[2-9]\d{2}[-. ]?\d{4}\b/g,
    },
    // credit_card: 4x4 digits, each gap a space, a hyphen or nothing
    {
        category: 'credit_card',
        pattern: /\b\d{4}[- ]?\d{4}[- ]?\d{4}[- ]?\d{4}\b/g,
    },
    // ssn: 3-2-4 digits, hyphenated or contiguous
    {
        category: 'ssn',
        pattern: /\b\d{3}(-?)\d{2}\1\d{4}\b/g,
    },
]);

/** Orders matches by start offset, then by rule declaration order. */
export function compareMatches(a: PiiMatch, b: PiiMatch): number {
    return a.startOffset - b.startOffset || PII_CATEGORIES.indexOf(a.category) - PII_CATEGORIES.indexOf(b.category);
}

/**
 * Find every occurrence of the enabled categories in `text`.
 * Each rule scans left to right without overlapping itself; matches of different
 * rules may overlap and are left for the masker to resolve.
 */
export function scanText(text: string, categories: readonly PiiCategory[] = PII_CATEGORIES): PiiMatch[] {
    if (!text || categories.length === 0) return [];

    const enabled = new Set<PiiCategory>(categories);
    const matches: PiiMatch[] = [];

    for (const { category, pattern } of DETECTION_RULES) {
        if (!enabled.has(category)) continue;

        // matchAll works on a copy of the pattern, so the shared rule keeps lastIndex at 0
        for (const match of text.matchAll(pattern)) {
            const start = match.index;
            if (start === undefined) continue;

            matches.push({
                category,
                startOffset: start,
                endOffset: start + match[0].length,
                matchedText: match[0],
            });
        }
    }

    return matches.sort(compareMatches);
}
