import type { IMaskedFileBuilder, IPiiDetectionService } from 'src/shared/backend/ports';
import type { DocumentFormat, TextExtractorRegistry } from 'src/shared/backend/extraction';
import type { MaskedFile } from 'src/shared/backend/masked-file';
import type { MaskingStats, PiiCategory, PiiDetectionOptions } from 'src/shared/backend/pii-detection';
import type { ServerConfig } from 'src/shared/config/env';
import { logger } from 'src/shared/backend/logger';
import { loadDocument, type DocumentSource } from './load-document';

export type MaskDocumentUseCaseDeps = {
    piiService: IPiiDetectionService;
    extractors: TextExtractorRegistry;
    fileBuilder: IMaskedFileBuilder;
    config: ServerConfig;
};

export type MaskDocumentParams = {
    source: DocumentSource;
    categories?: readonly PiiCategory[];
    ignoredValues?: readonly string[];
};

export type MaskedUnit = {
    label: string;
    maskedText: string;
    matchCount: number;
};

export type MaskDocumentResult = {
    filename: string | null;
    format: DocumentFormat;
    units: MaskedUnit[];
    /** Masked units joined with newlines, in document order */
    maskedText: string;
    stats: MaskingStats;
    /** Downloadable masked copy; null for pasted text */
    file: MaskedFile | null;
};

export class MaskDocumentUseCase {
    constructor(private readonly deps: MaskDocumentUseCaseDeps) {}

    async execute(params: MaskDocumentParams): Promise<MaskDocumentResult> {
        const { piiService, extractors, fileBuilder, config } = this.deps;

        const document = await loadDocument(params.source, { extractors, maxUploadBytes: config.upload.maxBytes });

        const options: PiiDetectionOptions = {
            categories: params.categories,
            ignoredValues: params.ignoredValues,
        };
        const { results, stats } = piiService.maskUnits(
            document.units.map((unit) => unit.text),
            options,
        );

        const units = document.units.map((unit, i) => ({
            label: unit.label,
            maskedText: results[i]?.maskedText ?? '',
            matchCount: results[i]?.matches.length ?? 0,
        }));
        const maskedText = units.map((unit) => unit.maskedText).join('\n');

        const file =
            document.kind === 'upload'
                ? await fileBuilder.build({
                      filename: document.filename,
                      format: document.format,
                      source: document.content,
                      maskedText,
                      maskText: (text) => piiService.maskText(text, options),
                  })
                : null;

        logger.info(
            {
                source: document.kind,
                format: document.format,
                units: units.length,
                masked: stats.byCategory,
                total: stats.total,
                ignoredCount: params.ignoredValues?.length ?? 0,
            },
            'Document masked',
        );

        return { filename: document.filename, format: document.format, units, maskedText, stats, file };
    }
}
