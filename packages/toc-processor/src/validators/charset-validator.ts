import type {
  TitleEncoding,
  TitleEncodingMode,
  TocEntry,
} from '@tocio/model';

import type { CharsetIssue, CharsetValidationResult } from '../errors';

import { EncodingError } from '../errors';
import {
  isPdfDocEncodable,
  pdfDocByteOrderMarkLength,
} from './pdf-doc-encoding';

/**
 * CharsetValidator
 *
 * Detects title characters that an outline string in the target encoding
 * cannot carry. It only reports; substituting or rejecting is up to the
 * caller.
 *
 * - `pdfdoc`: characters outside the PDFDocEncoding table, and a leading
 *   `þÿ` or `ï»¿` that readers would decode as a byte order mark
 * - `utf16be`: lone surrogates
 *
 * U+0000 is reported for both encodings.
 */
export class CharsetValidator {
  /**
   * Find unsupported characters in one title
   *
   * @returns 0-based code point positions, empty when fully representable
   */
  check(title: string, encoding: TitleEncoding): number[] {
    const positions: number[] = [];
    const markLength =
      encoding === 'pdfdoc' ? pdfDocByteOrderMarkLength(title) : 0;
    let position = 0;

    for (const char of title) {
      const codePoint = char.codePointAt(0) ?? 0;
      if (position < markLength || !this.isRepresentable(codePoint, encoding)) {
        positions.push(position);
      }
      position++;
    }

    return positions;
  }

  /**
   * Check every entry and collect all offending ones
   */
  validate(
    entries: readonly TocEntry[],
    encoding: TitleEncoding,
  ): CharsetValidationResult {
    const issues: CharsetIssue[] = [];

    entries.forEach((entry, index) => {
      const positions = this.check(entry.title, encoding);
      if (positions.length === 0) {
        return;
      }

      const characters = Array.from(entry.title);
      issues.push({
        message: `Title contains ${positions.length} character(s) not representable in ${encoding}`,
        index,
        entry,
        positions,
        characters: positions.map((position) => characters[position]),
      });
    });

    return {
      valid: issues.length === 0,
      encoding,
      issues,
      errorCount: issues.length,
    };
  }

  /**
   * Validate and throw if any title is not representable
   *
   * @throws {EncodingError} Carrying every offending entry
   */
  validateOrThrow(entries: readonly TocEntry[], encoding: TitleEncoding): void {
    const result = this.validate(entries, encoding);

    if (!result.valid) {
      throw EncodingError.fromResult(result);
    }
  }

  private isRepresentable(codePoint: number, encoding: TitleEncoding): boolean {
    if (codePoint === 0) {
      return false;
    }
    if (encoding === 'pdfdoc') {
      return isPdfDocEncodable(codePoint);
    }
    return codePoint < 0xd800 || codePoint > 0xdfff;
  }
}

/**
 * Pick the encoding a title is written in
 *
 * `auto` prefers PDFDocEncoding and falls back to UTF-16BE, also for titles
 * starting with a byte order mark lookalike.
 */
export function resolveTitleEncoding(
  title: string,
  mode: TitleEncodingMode,
): TitleEncoding {
  if (mode !== 'auto') {
    return mode;
  }
  return pdfDocByteOrderMarkLength(title) === 0 &&
    Array.from(title).every((char) =>
      isPdfDocEncodable(char.codePointAt(0) ?? 0),
    )
    ? 'pdfdoc'
    : 'utf16be';
}
