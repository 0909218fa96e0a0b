export {
  DocumentIOError,
  EmptyOutlineError,
  EncodingError,
  FormatError,
  PageRangeError,
  TocProcessError,
  isTocError,
} from './toc-process-error';
export type {
  CharsetIssue,
  CharsetValidationResult,
  FormatErrorContext,
  TocError,
  TocErrorKind,
} from './toc-process-error';
