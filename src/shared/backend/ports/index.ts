export type { IPiiDetectionService } from './pii-detection.interface';
export type { ITextExtractor } from './text-extractor.interface';
export type { IMaskedFileBuilder } from './masked-file-builder.interface';
