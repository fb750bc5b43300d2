import type { IPiiDetectionService } from 'src/shared/backend/ports';
import type { TextExtractorRegistry, DocumentFormat, ExtractedUnit } from 'src/shared/backend/extraction';
import type { PiiCategory, PiiFinding } from 'src/shared/backend/pii-detection';
import type { ServerConfig } from 'src/shared/config/env';
import { logger } from 'src/shared/backend/logger';
import { loadDocument, type DocumentSource } from './load-document';

export type AnalyzeDocumentUseCaseDeps = {
    piiService: IPiiDetectionService;
    extractors: TextExtractorRegistry;
    config: ServerConfig;
};

export type AnalyzeDocumentParams = {
    source: DocumentSource;
    categories?: readonly PiiCategory[];
};

export type AnalyzeDocumentResult = {
    filename: string | null;
    format: DocumentFormat;
    units: ExtractedUnit[];
    /** All units joined with newlines, for display */
    text: string;
    findings: PiiFinding[];
};

/**
 * Review step: extract the document and list what would be masked,
 * so the operator can pick values to leave visible.
 */
export class AnalyzeDocumentUseCase {
    constructor(private readonly deps: AnalyzeDocumentUseCaseDeps) {}

    async execute(params: AnalyzeDocumentParams): Promise<AnalyzeDocumentResult> {
        const { piiService, extractors, config } = this.deps;

        const document = await loadDocument(params.source, { extractors, maxUploadBytes: config.upload.maxBytes });

        const merged = new Map<string, PiiFinding>();
        for (const unit of document.units) {
            for (const finding of piiService.analyze(unit.text, params.categories)) {
                const key = `${finding.category}\u0000${finding.value}`;
                const existing = merged.get(key);
                if (existing) {
                    existing.occurrences += finding.occurrences;
                } else {
                    merged.set(key, { ...finding });
                }
            }
        }
        const findings = [...merged.values()];

        logger.info(
            {
                source: document.kind,
                format: document.format,
                units: document.units.length,
                findingCount: findings.length,
                categories: [...new Set(findings.map((f) => f.category))],
            },
            'Document analyzed',
        );

        return {
            filename: document.filename,
            format: document.format,
            units: document.units,
            text: document.units.map((unit) => unit.text).join('\n'),
            findings,
        };
    }
}
