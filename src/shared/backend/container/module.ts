import { getServerConfig, type ServerConfig } from 'src/shared/config/env';
import { PiiDetectionService, PiiMasker } from 'src/shared/backend/pii-detection';
import { TextExtractorRegistry } from 'src/shared/backend/extraction';
import { MaskedFileBuilder } from 'src/shared/backend/masked-file';
import type { IMaskedFileBuilder, IPiiDetectionService } from 'src/shared/backend/ports';
import { AnalyzeDocumentUseCase } from 'src/shared/backend/use-cases/analyze-document.use-case';
import { MaskDocumentUseCase } from 'src/shared/backend/use-cases/mask-document.use-case';
import { Container } from './container';
import {
    ANALYZE_DOCUMENT_USE_CASE,
    MASK_DOCUMENT_USE_CASE,
    MASKED_FILE_BUILDER,
    PII_DETECTION_SERVICE,
    TEXT_EXTRACTOR_REGISTRY,
} from './tokens';

/**
 * Create and configure the backend DI container.
 * Wires all providers with lazy singleton resolution.
 */
export function createBackendContainer(config: ServerConfig = getServerConfig()): Container {
    const container = new Container();

    container
        .register<IPiiDetectionService>(PII_DETECTION_SERVICE, () => new PiiDetectionService({ masker: new PiiMasker() }))
        .register(TEXT_EXTRACTOR_REGISTRY, () => new TextExtractorRegistry())
        .register<IMaskedFileBuilder>(MASKED_FILE_BUILDER, () => new MaskedFileBuilder())
        .register(
            ANALYZE_DOCUMENT_USE_CASE,
            (c) =>
                new AnalyzeDocumentUseCase({
                    piiService: c.resolve<IPiiDetectionService>(PII_DETECTION_SERVICE),
                    extractors: c.resolve<TextExtractorRegistry>(TEXT_EXTRACTOR_REGISTRY),
                    config,
                }),
        )
        .register(
            MASK_DOCUMENT_USE_CASE,
            (c) =>
                new MaskDocumentUseCase({
                    piiService: c.resolve<IPiiDetectionService>(PII_DETECTION_SERVICE),
                    extractors: c.resolve<TextExtractorRegistry>(TEXT_EXTRACTOR_REGISTRY),
                    fileBuilder: c.resolve<IMaskedFileBuilder>(MASKED_FILE_BUILDER),
                    config,
                }),
        );

    return container;
}

let containerInstance: Container | null = null;

export function getBackendContainer(): Container {
    containerInstance ??= createBackendContainer();
    return containerInstance;
}
