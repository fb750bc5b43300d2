import type {
    MaskingStats,
    PiiCategory,
    PiiDetectionOptions,
    PiiFinding,
    ScanResult,
} from 'src/shared/backend/pii-detection/types';

export interface IPiiDetectionService {
    scan(text: string, options?: PiiDetectionOptions): ScanResult;

    maskText(text: string, options?: PiiDetectionOptions): string;

    analyze(text: string, categories?: readonly PiiCategory[]): PiiFinding[];

    maskUnits(texts: readonly string[], options?: PiiDetectionOptions): { results: ScanResult[]; stats: MaskingStats };
}
