import { FormatError } from '../errors';

/**
 * Grammar options for the indented ToC text format
 */
export interface TocGrammarOptions {
  /**
   * String repeated `level - 1` times before a title (default: one TAB)
   */
  indentUnit?: string;

  /**
   * Single character between title, page and offset (default: '|')
   */
  separator?: string;
}

export type TocGrammar = Required<TocGrammarOptions>;

/**
 * Default grammar: TAB indentation, `|` separator
 */
export const DEFAULT_TOC_GRAMMAR: Readonly<TocGrammar> = {
  indentUnit: '\t',
  separator: '|',
};

/**
 * Escape character for titles. Recognized sequences:
 * `\\`, `\<separator>`, `\t`, `\n`, `\r`, `\s` (space) and `\uXXXX`.
 *
 * `\s` and `\uXXXX` keep whitespace at either end of a title, which the
 * parser would otherwise trim.
 */
export const ESCAPE_CHARACTER = '\\';

const ESCAPED_CHARACTERS: Record<string, string> = {
  t: '\t',
  n: '\n',
  r: '\r',
  s: ' ',
};

const CONTROL_ESCAPES: Record<string, string> = {
  '\t': '\\t',
  '\n': '\\n',
  '\r': '\\r',
};

const CODE_UNIT_PATTERN = /^[0-9A-Fa-f]{4}$/;
const WHITESPACE_PATTERN = /\s/;

/**
 * Merge options over the default grammar and reject ambiguous settings
 */
export function resolveTocGrammar(options?: TocGrammarOptions): TocGrammar {
  const grammar = { ...DEFAULT_TOC_GRAMMAR, ...options };

  if (!/^[ \t]+$/.test(grammar.indentUnit)) {
    throw new Error(
      `Indent unit must be a non-empty run of spaces or tabs: ${JSON.stringify(grammar.indentUnit)}`,
    );
  }

  // Letters would collide with \t \n \r, digits and '.' with page and offset
  if (
    grammar.separator.length !== 1 ||
    /[\s\\A-Za-z0-9.]/.test(grammar.separator)
  ) {
    throw new Error(
      `Separator must be one punctuation character: ${JSON.stringify(grammar.separator)}`,
    );
  }

  return grammar;
}

/**
 * Escape a title so that it survives one line of the text format
 */
export function escapeTitle(title: string, grammar: TocGrammar): string {
  const chars = Array.from(title);
  let start = 0;
  while (start < chars.length && WHITESPACE_PATTERN.test(chars[start])) {
    start++;
  }
  let end = chars.length;
  while (end > start && WHITESPACE_PATTERN.test(chars[end - 1])) {
    end--;
  }

  return chars
    .map((char, index) => {
      if (char === ESCAPE_CHARACTER || char === grammar.separator) {
        return ESCAPE_CHARACTER + char;
      }
      const control = CONTROL_ESCAPES[char];
      if (control !== undefined) {
        return control;
      }
      if (index >= start && index < end) {
        return char;
      }
      return char === ' ' ? '\\s' : escapeCodeUnit(char);
    })
    .join('');
}

/**
 * `\uXXXX` for a BMP character
 */
function escapeCodeUnit(char: string): string {
  return `\\u${char.charCodeAt(0).toString(16).toUpperCase().padStart(4, '0')}`;
}

/**
 * Resolve escape sequences in a raw title field
 *
 * @throws {FormatError} On an unknown escape or a trailing lone backslash
 */
export function unescapeTitle(
  raw: string,
  grammar: TocGrammar,
  lineNo?: number,
): string {
  let title = '';

  for (let i = 0; i < raw.length; i++) {
    const char = raw[i];
    if (char !== ESCAPE_CHARACTER) {
      title += char;
      continue;
    }

    const next = raw[i + 1];
    if (next === ESCAPE_CHARACTER || next === grammar.separator) {
      title += next;
    } else if (next === 'u') {
      const hex = raw.slice(i + 2, i + 6);
      if (!CODE_UNIT_PATTERN.test(hex)) {
        throw new FormatError('bad escape sequence', { lineNo });
      }
      title += String.fromCharCode(parseInt(hex, 16));
      i += hex.length;
    } else if (next !== undefined && Object.hasOwn(ESCAPED_CHARACTERS, next)) {
      title += ESCAPED_CHARACTERS[next];
    } else {
      throw new FormatError('bad escape sequence', { lineNo });
    }
    i++;
  }

  return title;
}

/**
 * Split a line body on unescaped separators
 *
 * Escape sequences are kept verbatim in the returned fields; only
 * {@link unescapeTitle} interprets them.
 */
export function splitFields(
  body: string,
  grammar: TocGrammar,
  lineNo?: number,
): string[] {
  const fields: string[] = [];
  let current = '';

  for (let i = 0; i < body.length; i++) {
    const char = body[i];
    if (char === ESCAPE_CHARACTER) {
      if (i + 1 >= body.length) {
        throw new FormatError('bad escape sequence', { lineNo });
      }
      current += char + body[i + 1];
      i++;
    } else if (char === grammar.separator) {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  fields.push(current);
  return fields;
}
