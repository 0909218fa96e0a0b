import pdfDocEncoding from './pdf-doc-encoding.json';

/**
 * Byte ranges where PDFDocEncoding agrees with ISO Latin-1
 */
const LATIN1_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x09, 0x0a],
  [0x0d, 0x0d],
  [0x20, 0x7e],
  [0xa1, 0xac],
  [0xae, 0xff],
];

function buildEncodingTable(): Map<number, number> {
  const table = new Map<number, number>();

  for (const [start, end] of LATIN1_RANGES) {
    for (let byte = start; byte <= end; byte++) {
      table.set(byte, byte);
    }
  }

  for (const [byte, codePoint] of Object.entries(pdfDocEncoding.characters)) {
    table.set(parseInt(codePoint.slice(2), 16), Number(byte));
  }

  return table;
}

/**
 * Unicode code point to PDFDocEncoding byte
 */
export const PDF_DOC_ENCODING: ReadonlyMap<number, number> = buildEncodingTable();

/**
 * Title prefixes whose PDFDocEncoding bytes read as a byte order mark:
 * `þÿ` is FE FF (UTF-16BE), `ï»¿` is EF BB BF (UTF-8)
 */
const BYTE_ORDER_MARK_LOOKALIKES = ['\u00FE\u00FF', '\u00EF\u00BB\u00BF'];

export function isPdfDocEncodable(codePoint: number): boolean {
  return PDF_DOC_ENCODING.has(codePoint);
}

/**
 * Number of leading characters a PDF reader would take for a byte order mark
 * once the title is written in PDFDocEncoding, or 0
 */
export function pdfDocByteOrderMarkLength(title: string): number {
  const mark = BYTE_ORDER_MARK_LOOKALIKES.find((prefix) =>
    title.startsWith(prefix),
  );
  return mark?.length ?? 0;
}

/**
 * Encode text as PDFDocEncoding bytes
 *
 * @throws {Error} When a character has no PDFDocEncoding byte
 */
export function encodePdfDocString(text: string): Uint8Array {
  const bytes: number[] = [];

  for (const char of text) {
    const codePoint = char.codePointAt(0) ?? 0;
    const byte = PDF_DOC_ENCODING.get(codePoint);
    if (byte === undefined) {
      throw new Error(
        `Character U+${codePoint.toString(16).toUpperCase().padStart(4, '0')} has no PDFDocEncoding byte`,
      );
    }
    bytes.push(byte);
  }

  return Uint8Array.from(bytes);
}
