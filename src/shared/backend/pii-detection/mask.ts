import type { PiiCategory, PiiMatch } from './types';
import { PII_CATEGORY_TO_PLACEHOLDER } from './placeholders';
import { compareMatches } from './regex-detection';

export type PiiMaskerConfig = {
    /** Override the mask token for some categories (default: `[<CATEGORY> MASKED]`) */
    placeholders?: Partial<Record<PiiCategory, string>>;
};

export type MaskOutcome = {
    maskedText: string;
    /** Matches replaced in `maskedText`, in offset order. */
    applied: PiiMatch[];
    /** Matches skipped because they start inside an earlier retained match. */
    dropped: PiiMatch[];
};

/**
 * Replaces detected spans with a category token.
 * Single Responsibility: apply masking strategy to text given detection results.
 */
export class PiiMasker {
    private readonly placeholders: Readonly<Record<PiiCategory, string>>;

    constructor(config: PiiMaskerConfig = {}) {
        this.placeholders = { ...PII_CATEGORY_TO_PLACEHOLDER, ...config.placeholders };
    }

    placeholderFor(category: PiiCategory): string {
        return this.placeholders[category];
    }

    mask(text: string, matches: readonly PiiMatch[]): string {
        return this.apply(text, matches).maskedText;
    }

    /**
     * Walk matches in start order (rule order on ties). A match that begins before the
     * previously retained one ends is dropped, so every region gets exactly one token.
     */
    apply(text: string, matches: readonly PiiMatch[]): MaskOutcome {
        if (matches.length === 0) {
            return { maskedText: text, applied: [], dropped: [] };
        }

        const ordered = [...matches].sort(compareMatches);
        const applied: PiiMatch[] = [];
        const dropped: PiiMatch[] = [];
        const parts: string[] = [];
        let cursor = 0;

        for (const match of ordered) {
            if (match.startOffset < cursor) {
                dropped.push(match);
                continue;
            }
            parts.push(text.slice(cursor, match.startOffset), this.placeholders[match.category]);
            cursor = match.endOffset;
            applied.push(match);
        }
        parts.push(text.slice(cursor));

        return { maskedText: parts.join(''), applied, dropped };
    }
}
