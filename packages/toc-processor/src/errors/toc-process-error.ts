import type { TitleEncoding, TocEntry } from '@tocio/model';

/**
 * Discriminant shared by every error the processor raises
 */
export type TocErrorKind = 'format' | 'range' | 'encoding' | 'empty-outline' | 'io';

/**
 * One entry whose title cannot be written in the target encoding
 */
export interface CharsetIssue {
  /**
   * Human-readable description
   */
  message: string;

  /**
   * Index of the entry in the validated sequence
   */
  index: number;

  /**
   * The offending entry
   */
  entry: TocEntry;

  /**
   * Code point positions of the unsupported characters in the title
   */
  positions: number[];

  /**
   * The unsupported characters, in the order of `positions`
   */
  characters: string[];
}

/**
 * Result of validating a sequence of titles against an encoding
 */
export interface CharsetValidationResult {
  /**
   * Whether every title is representable
   */
  valid: boolean;

  /**
   * Encoding the titles were checked against
   */
  encoding: TitleEncoding;

  /**
   * One issue per offending entry, in entry order
   */
  issues: CharsetIssue[];

  /**
   * Number of offending entries
   */
  errorCount: number;
}

/**
 * TocProcessError
 *
 * Base class of all processor errors. Subclasses carry a literal `kind` so
 * that callers can switch over {@link TocError} exhaustively.
 */
export abstract class TocProcessError extends Error {
  abstract readonly kind: TocErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TocProcessError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * Where a format error was found
 */
export interface FormatErrorContext {
  /**
   * 1-based line number in the parsed text
   */
  lineNo?: number;

  /**
   * Title of the offending entry, when no line is available
   */
  title?: string;
}

/**
 * FormatError
 *
 * Thrown when ToC text or an entry sequence does not follow the grammar:
 * bad indentation, separators or escapes, non-numeric fields, a skipped
 * level, or a first entry below the top level.
 */
export class FormatError extends TocProcessError {
  readonly kind = 'format' as const;

  /**
   * Short reason without location (e.g. "skipped indentation level")
   */
  readonly reason: string;

  readonly lineNo?: number;

  readonly title?: string;

  constructor(reason: string, context: FormatErrorContext = {}) {
    super(FormatError.formatMessage(reason, context));
    this.name = 'FormatError';
    this.reason = reason;
    this.lineNo = context.lineNo;
    this.title = context.title;
  }

  private static formatMessage(
    reason: string,
    { lineNo, title }: FormatErrorContext,
  ): string {
    if (lineNo !== undefined) {
      return `line ${lineNo}: ${reason}`;
    }
    if (title !== undefined) {
      return `${reason} at "${title}"`;
    }
    return reason;
  }
}

/**
 * PageRangeError
 *
 * Thrown when an entry targets a page outside `[1, pageCount]`.
 */
export class PageRangeError extends TocProcessError {
  readonly kind = 'range' as const;

  constructor(
    readonly title: string,
    readonly pageNo: number,
    readonly pageCount: number,
  ) {
    super(
      `page ${pageNo} of "${title}" is out of range (document has ${pageCount} page(s))`,
    );
    this.name = 'PageRangeError';
  }
}

/**
 * EncodingError
 *
 * Thrown when titles contain characters the target encoding cannot carry.
 * Holds every offending entry, not only the first.
 */
export class EncodingError extends TocProcessError {
  readonly kind = 'encoding' as const;

  readonly validationResult: CharsetValidationResult;

  constructor(message: string, validationResult: CharsetValidationResult) {
    super(message);
    this.name = 'EncodingError';
    this.validationResult = validationResult;
  }

  /**
   * Build the error for a failed validation
   */
  static fromResult(validationResult: CharsetValidationResult): EncodingError {
    return new EncodingError(
      `${validationResult.errorCount} title(s) contain characters not representable in ${validationResult.encoding}`,
      validationResult,
    );
  }

  /**
   * Get formatted error summary
   */
  getSummary(): string {
    const { errorCount, encoding, issues } = this.validationResult;
    const lines = [
      `${errorCount} title(s) contain characters not representable in ${encoding}:`,
    ];

    for (const issue of issues) {
      const characters = issue.characters
        .map((char, i) => `${formatCodePoint(char)} at ${issue.positions[i]}`)
        .join(', ');
      lines.push(`  "${issue.entry.title}" (page ${issue.entry.pageNo})`);
      lines.push(`    ${characters}`);
    }

    return lines.join('\n');
  }
}

/**
 * EmptyOutlineError
 *
 * Raised when a document has no outline to read. Recoverable: callers may
 * fall back to another source instead of failing.
 */
export class EmptyOutlineError extends TocProcessError {
  readonly kind = 'empty-outline' as const;

  readonly recoverable = true;

  constructor(message = 'no table of contents found') {
    super(message);
    this.name = 'EmptyOutlineError';
  }
}

/**
 * DocumentIOError
 *
 * Raised when a document cannot be opened or saved.
 */
export class DocumentIOError extends TocProcessError {
  readonly kind = 'io' as const;

  constructor(
    readonly path: string,
    readonly operation: 'open' | 'save',
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'DocumentIOError';
  }

  /**
   * Create DocumentIOError from unknown error with context
   */
  static fromError(
    path: string,
    operation: 'open' | 'save',
    error: unknown,
  ): DocumentIOError {
    return new DocumentIOError(
      path,
      operation,
      `unable to ${operation} ${path}: ${TocProcessError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * Closed set of processor errors
 */
export type TocError =
  | FormatError
  | PageRangeError
  | EncodingError
  | EmptyOutlineError
  | DocumentIOError;

export function isTocError(error: unknown): error is TocError {
  return error instanceof TocProcessError;
}

function formatCodePoint(char: string): string {
  const codePoint = char.codePointAt(0) ?? 0;
  return `U+${codePoint.toString(16).toUpperCase().padStart(4, '0')}`;
}
