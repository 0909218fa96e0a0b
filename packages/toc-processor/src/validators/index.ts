export { CharsetValidator, resolveTitleEncoding } from './charset-validator';
export {
  PDF_DOC_ENCODING,
  encodePdfDocString,
  isPdfDocEncodable,
  pdfDocByteOrderMarkLength,
} from './pdf-doc-encoding';
