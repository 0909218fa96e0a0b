export { TocProcessor } from './toc-processor';
export type {
  ReadTocTextOptions,
  TocProcessorOptions,
  UnsupportedCharacterPolicy,
} from './toc-processor';

export { OutlineConverter } from './converters';
export type { BuildOutlineOptions } from './converters';

export {
  DocumentIOError,
  EmptyOutlineError,
  EncodingError,
  FormatError,
  PageRangeError,
  TocProcessError,
  isTocError,
} from './errors';
export type {
  CharsetIssue,
  CharsetValidationResult,
  FormatErrorContext,
  TocError,
  TocErrorKind,
} from './errors';

export { TocTextParser } from './parsers';

export { HumanReadableRenderer, TocTextSerializer } from './serializers';
export type { HumanReadableRendererOptions } from './serializers';

export {
  DEFAULT_TOC_GRAMMAR,
  ESCAPE_CHARACTER,
  escapeTitle,
  resolveTocGrammar,
  unescapeTitle,
} from './utils';
export type { TocGrammar, TocGrammarOptions } from './utils';

export {
  CharsetValidator,
  PDF_DOC_ENCODING,
  encodePdfDocString,
  isPdfDocEncodable,
  resolveTitleEncoding,
} from './validators';
