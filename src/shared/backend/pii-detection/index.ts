export {
    PII_CATEGORIES,
    type DetectionRule,
    type MaskingStats,
    type PiiCategory,
    type PiiDetectionOptions,
    type PiiFinding,
    type PiiMatch,
    type ScanResult,
} from './types';
export { DETECTION_RULES, compareMatches, scanText } from './regex-detection';
export { PII_CATEGORY_TO_PLACEHOLDER } from './placeholders';
export { PiiMasker, type MaskOutcome, type PiiMaskerConfig } from './mask';
export { PiiDetectionService, emptyMaskingStats } from './service';
