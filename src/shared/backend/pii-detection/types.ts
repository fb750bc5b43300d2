/** Categories in declaration order; this order breaks ties between matches that start at the same offset. */
export const PII_CATEGORIES = ['email', 'phone', 'credit_card', 'ssn'] as const;

export type PiiCategory = (typeof PII_CATEGORIES)[number];

export type DetectionRule = {
    readonly category: PiiCategory;
    readonly pattern: RegExp;
};

/** A `[startOffset, endOffset)` span of one text buffer. */
export type PiiMatch = {
    category: PiiCategory;
    startOffset: number;
    endOffset: number;
    matchedText: string;
};

export type ScanResult = {
    originalText: string;
    /** Matches that were replaced in `maskedText`, in offset order. */
    matches: PiiMatch[];
    maskedText: string;
};

export type PiiFinding = {
    category: PiiCategory;
    value: string;
    occurrences: number;
};

export type MaskingStats = {
    byCategory: Record<PiiCategory, number>;
    total: number;
};

export type PiiDetectionOptions = {
    /** Categories to look for. Defaults to all of them. */
    categories?: readonly PiiCategory[];
    /** Exact values the operator chose to leave visible. */
    ignoredValues?: readonly string[];
};
