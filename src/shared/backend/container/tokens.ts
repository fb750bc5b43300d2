export const PII_DETECTION_SERVICE = Symbol('PII_DETECTION_SERVICE');
export const TEXT_EXTRACTOR_REGISTRY = Symbol('TEXT_EXTRACTOR_REGISTRY');
export const MASKED_FILE_BUILDER = Symbol('MASKED_FILE_BUILDER');
export const ANALYZE_DOCUMENT_USE_CASE = Symbol('ANALYZE_DOCUMENT_USE_CASE');
export const MASK_DOCUMENT_USE_CASE = Symbol('MASK_DOCUMENT_USE_CASE');
