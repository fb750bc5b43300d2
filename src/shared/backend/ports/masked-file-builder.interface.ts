import type { MaskedFile, MaskedFileInput } from 'src/shared/backend/masked-file/builder';

export interface IMaskedFileBuilder {
    build(input: MaskedFileInput): Promise<MaskedFile>;
}
