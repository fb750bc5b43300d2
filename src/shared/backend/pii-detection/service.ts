import { logger } from 'src/shared/backend/logger';
import type { IPiiDetectionService } from 'src/shared/backend/ports';
import { PiiMasker } from './mask';
import { scanText } from './regex-detection';
import {
    PII_CATEGORIES,
    type MaskingStats,
    type PiiCategory,
    type PiiDetectionOptions,
    type PiiFinding,
    type ScanResult,
} from './types';

export type PiiDetectionServiceDeps = {
    masker?: PiiMasker;
};

export function emptyMaskingStats(): MaskingStats {
    return {
        byCategory: { email: 0, phone: 0, credit_card: 0, ssn: 0 },
        total: 0,
    };
}

/**
 * PII Detection Service
 * Runs the fixed regex rules over extracted text and masks what they find.
 * Holds no per-request state, so one instance serves concurrent requests.
 */
export class PiiDetectionService implements IPiiDetectionService {
    private readonly masker: PiiMasker;

    constructor(deps?: PiiDetectionServiceDeps) {
        this.masker = deps?.masker ?? new PiiMasker();
    }

    scan(text: string, options: PiiDetectionOptions = {}): ScanResult {
        const categories = options.categories ?? PII_CATEGORIES;
        const ignored = new Set(options.ignoredValues ?? []);

        const detected = scanText(text, categories);
        const candidates = ignored.size > 0 ? detected.filter((m) => !ignored.has(m.matchedText)) : detected;
        const { maskedText, applied, dropped } = this.masker.apply(text, candidates);

        if (dropped.length > 0) {
            logger.debug(
                { dropped: dropped.map((m) => m.category), kept: applied.length },
                'Overlapping PII matches dropped',
            );
        }

        return { originalText: text, matches: applied, maskedText };
    }

    maskText(text: string, options?: PiiDetectionOptions): string {
        return this.scan(text, options).maskedText;
    }

    /**
     * Distinct detected values in first-seen order, for the operator to review
     * before masking. Overlaps are not resolved here; every candidate is listed.
     */
    analyze(text: string, categories: readonly PiiCategory[] = PII_CATEGORIES): PiiFinding[] {
        const findings = new Map<string, PiiFinding>();

        for (const match of scanText(text, categories)) {
            const key = `${match.category}\u0000${match.matchedText}`;
            const existing = findings.get(key);
            if (existing) {
                existing.occurrences += 1;
            } else {
                findings.set(key, { category: match.category, value: match.matchedText, occurrences: 1 });
            }
        }

        return [...findings.values()];
    }

    /**
     * Mask each unit (page, sheet, document) on its own and sum the stats.
     * Results keep the input order.
     */
    maskUnits(texts: readonly string[], options?: PiiDetectionOptions): { results: ScanResult[]; stats: MaskingStats } {
        const stats = emptyMaskingStats();
        const results = texts.map((text) => {
            const result = this.scan(text, options);
            for (const match of result.matches) {
                stats.byCategory[match.category] += 1;
                stats.total += 1;
            }
            return result;
        });

        return { results, stats };
    }
}
