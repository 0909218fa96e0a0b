export { PDF_OUTLINE } from './config/constants';
export { PdfOutlineDocument } from './core/pdf-outline-document';
export type { PdfOutlineDocumentOptions } from './core/pdf-outline-document';
export { DestinationResolver } from './processors/destination-resolver';
export type { ResolvedDestination } from './processors/destination-resolver';
export { OutlineReader } from './processors/outline-reader';
export { OutlineWriter } from './processors/outline-writer';
