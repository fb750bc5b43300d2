export { Container } from './container';
export { createBackendContainer, getBackendContainer } from './module';
export {
    ANALYZE_DOCUMENT_USE_CASE,
    MASK_DOCUMENT_USE_CASE,
    MASKED_FILE_BUILDER,
    PII_DETECTION_SERVICE,
    TEXT_EXTRACTOR_REGISTRY,
} from './tokens';
