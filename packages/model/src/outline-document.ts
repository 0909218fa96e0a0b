import type { OutlineNode } from './outline-node';

/**
 * Text encodings a PDF text string can carry
 *
 * - `pdfdoc`: PDFDocEncoding, the single-byte encoding of PDF text strings
 * - `utf16be`: UTF-16 big-endian with a byte order mark
 */
export type TitleEncoding = 'pdfdoc' | 'utf16be';

/**
 * Encoding choice for outline titles
 *
 * `auto` uses PDFDocEncoding for titles it can represent and UTF-16BE for
 * the rest.
 */
export type TitleEncodingMode = TitleEncoding | 'auto';

/**
 * Options for replacing a document outline
 */
export interface SetOutlineOptions {
  /**
   * Encoding used for titles (default: 'auto')
   */
  encoding?: TitleEncodingMode;
}

/**
 * Outline Document
 *
 * The part of an opened document that outline conversion needs. The document
 * is always passed explicitly to the operations that use it.
 */
export interface OutlineDocument {
  /**
   * Number of pages in the document
   */
  readonly pageCount: number;

  /**
   * Read the current outline (empty array when the document has none)
   */
  getOutline(): OutlineNode[];

  /**
   * Replace the whole outline
   */
  setOutline(nodes: OutlineNode[], options?: SetOutlineOptions): void;

  /**
   * Write the document to a file
   */
  save(path: string): Promise<void>;
}
