import type { TocEntry } from '@tocio/model';

import type { TocGrammar, TocGrammarOptions } from '../utils';

import { escapeTitle, resolveTocGrammar } from '../utils';

/**
 * TocTextSerializer
 *
 * Renders entries as canonical indented ToC text, the inverse of
 * {@link TocTextParser}. For any level-consistent sequence of non-blank
 * titles, `parser.parse(serializer.serialize(entries))` equals `entries`.
 */
export class TocTextSerializer {
  private readonly grammar: TocGrammar;

  constructor(options?: TocGrammarOptions) {
    this.grammar = resolveTocGrammar(options);
  }

  /**
   * Serialize entries, one newline-terminated line each
   */
  serialize(entries: readonly TocEntry[]): string {
    return entries.map((entry) => `${this.serializeEntry(entry)}\n`).join('');
  }

  /**
   * Serialize a single entry without a line terminator
   */
  serializeEntry(entry: TocEntry): string {
    const { indentUnit, separator } = this.grammar;
    const fields = [escapeTitle(entry.title, this.grammar), String(entry.pageNo)];

    if (entry.topOffset !== undefined) {
      fields.push(formatOffset(entry.topOffset));
    }

    return indentUnit.repeat(Math.max(entry.level - 1, 0)) + fields.join(separator);
  }
}

/**
 * Plain decimal notation; the grammar has no exponent form
 */
function formatOffset(value: number): string {
  const text = String(value);
  const match = /^(\d+)(?:\.(\d+))?e([+-]\d+)$/i.exec(text);
  if (!match) {
    return text;
  }

  const [, integer, fraction = '', exponent] = match;
  const digits = integer + fraction;
  const point = integer.length + Number(exponent);

  if (point <= 0) {
    return `0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return digits + '0'.repeat(point - digits.length);
  }
  return `${digits.slice(0, point)}.${digits.slice(point)}`;
}
