import type { TocEntry } from '@tocio/model';

import type { TocGrammar, TocGrammarOptions } from '../utils';

import { FormatError } from '../errors';
import { resolveTocGrammar, splitFields, unescapeTitle } from '../utils';

const PAGE_NUMBER_PATTERN = /^\d+$/;
const TOP_OFFSET_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/;
const BYTE_ORDER_MARK = '\uFEFF';

/**
 * TocTextParser
 *
 * Parses indented ToC text into a flat, leveled entry sequence.
 *
 * ## Line grammar
 *
 * `<indent * (level - 1)><title><sep><page>[<sep><topOffset>]`
 *
 * With the default grammar, `"Chapter 1|1\n\tSection 1.1|2|120\n"` yields
 * two entries at levels 1 and 2, the second 120pt below the top of page 2.
 *
 * The parser makes a single pass and only remembers the level of the
 * previous entry: children always directly follow their parent, so that is
 * enough to reject a skipped level. It stops at the first error.
 */
export class TocTextParser {
  private readonly grammar: TocGrammar;

  constructor(options?: TocGrammarOptions) {
    this.grammar = resolveTocGrammar(options);
  }

  /**
   * Parse ToC text
   *
   * @param input - Whole text, or its lines without terminators
   * @returns Entries in document order; empty for blank input
   * @throws {FormatError} On the first malformed line
   */
  parse(input: string | readonly string[]): TocEntry[] {
    const lines = typeof input === 'string' ? input.split('\n') : input;
    const entries: TocEntry[] = [];
    let previousLevel = 0;

    for (let i = 0; i < lines.length; i++) {
      const lineNo = i + 1;
      const line = this.normalizeLine(lines[i], i === 0);

      if (line.trim() === '') {
        continue;
      }

      const entry = this.parseLine(line, lineNo);

      if (previousLevel === 0 && entry.level !== 1) {
        throw new FormatError('first entry must be top-level', { lineNo });
      }
      if (entry.level > previousLevel + 1) {
        throw new FormatError('skipped indentation level', { lineNo });
      }

      entries.push(entry);
      previousLevel = entry.level;
    }

    return entries;
  }

  /**
   * Strip a carriage return and, on the first line, a byte order mark
   */
  private normalizeLine(line: string, isFirst: boolean): string {
    let normalized = line.endsWith('\r') ? line.slice(0, -1) : line;
    if (isFirst && normalized.startsWith(BYTE_ORDER_MARK)) {
      normalized = normalized.slice(BYTE_ORDER_MARK.length);
    }
    return normalized;
  }

  private parseLine(line: string, lineNo: number): TocEntry {
    const { level, body } = this.readIndentation(line, lineNo);
    const fields = splitFields(body, this.grammar, lineNo);

    if (fields.length < 2) {
      throw new FormatError('missing separator', { lineNo });
    }
    if (fields.length > 3) {
      throw new FormatError('unexpected separator', { lineNo });
    }

    const [rawTitle, rawPage, rawOffset] = fields;
    const title = unescapeTitle(rawTitle.trim(), this.grammar, lineNo);
    if (title.trim() === '') {
      throw new FormatError('empty title', { lineNo });
    }

    const entry: TocEntry = {
      title,
      level,
      pageNo: this.parsePageNo(rawPage, lineNo),
    };

    if (rawOffset !== undefined) {
      entry.topOffset = this.parseTopOffset(rawOffset, lineNo);
    }

    return entry;
  }

  /**
   * Count whole indent units; any other leading whitespace is an error
   */
  private readIndentation(
    line: string,
    lineNo: number,
  ): { level: number; body: string } {
    const { indentUnit } = this.grammar;
    let offset = 0;
    let level = 1;

    while (line.startsWith(indentUnit, offset)) {
      offset += indentUnit.length;
      level++;
    }

    const body = line.slice(offset);
    if (/^\s/.test(body)) {
      throw new FormatError('bad indentation', { lineNo });
    }

    return { level, body };
  }

  private parsePageNo(raw: string, lineNo: number): number {
    const text = raw.trim();
    const pageNo = Number(text);

    if (
      !PAGE_NUMBER_PATTERN.test(text) ||
      !Number.isSafeInteger(pageNo) ||
      pageNo < 1
    ) {
      throw new FormatError('bad page number', { lineNo });
    }

    return pageNo;
  }

  private parseTopOffset(raw: string, lineNo: number): number {
    const text = raw.trim();
    const topOffset = Number(text);

    if (!TOP_OFFSET_PATTERN.test(text) || !Number.isFinite(topOffset)) {
      throw new FormatError('bad top offset', { lineNo });
    }

    return topOffset;
  }
}
