export { MaskedFileBuilder, type MaskedFile, type MaskedFileInput } from './builder';
export { rewriteWorkbook } from './rewrite-workbook';
export { rewriteDocument } from './rewrite-document';
