import type { LoggerMethods } from '@tocio/logger';
import type {
  OutlineDocument,
  OutlineNode,
  SetOutlineOptions,
} from '@tocio/model';

import {
  CharsetValidator,
  DocumentIOError,
  OutlineConverter,
  PageRangeError,
} from '@tocio/toc-processor';
import { readFile, writeFile } from 'node:fs/promises';
import { PDFDocument } from 'pdf-lib';

import { OutlineReader } from '../processors/outline-reader';
import { OutlineWriter } from '../processors/outline-writer';

export interface PdfOutlineDocumentOptions {
  /**
   * Logger instance
   */
  logger: LoggerMethods;
}

/**
 * Name reported for documents loaded from memory
 */
const IN_MEMORY_SOURCE = '<memory>';

/**
 * PdfOutlineDocument
 *
 * A PDF opened for outline editing. Only the outline is touched: page
 * content, metadata and every other object are written back as loaded.
 *
 * Encrypted documents are opened without decryption; their outline titles
 * are read as stored.
 */
export class PdfOutlineDocument implements OutlineDocument {
  private readonly logger: LoggerMethods;
  private readonly reader: OutlineReader;
  private readonly writer: OutlineWriter;
  private readonly converter: OutlineConverter;
  private readonly charsetValidator = new CharsetValidator();

  constructor(
    private readonly pdf: PDFDocument,
    options: PdfOutlineDocumentOptions,
  ) {
    this.logger = options.logger;
    this.reader = new OutlineReader(pdf, options.logger);
    this.writer = new OutlineWriter(pdf, options.logger);
    this.converter = new OutlineConverter(options.logger);
  }

  /**
   * Open a PDF file
   *
   * @throws {DocumentIOError} When the file cannot be read or parsed
   */
  static async open(
    path: string,
    options: PdfOutlineDocumentOptions,
  ): Promise<PdfOutlineDocument> {
    options.logger.info(`[PdfOutlineDocument] Opening ${path}...`);

    let bytes: Uint8Array;
    try {
      bytes = await readFile(path);
    } catch (error) {
      throw DocumentIOError.fromError(path, 'open', error);
    }

    return PdfOutlineDocument.load(bytes, path, options);
  }

  /**
   * Load a PDF from memory
   *
   * @throws {DocumentIOError} When the bytes are not a readable PDF
   */
  static async fromBytes(
    bytes: Uint8Array,
    options: PdfOutlineDocumentOptions,
  ): Promise<PdfOutlineDocument> {
    return PdfOutlineDocument.load(bytes, IN_MEMORY_SOURCE, options);
  }

  private static async load(
    bytes: Uint8Array,
    source: string,
    options: PdfOutlineDocumentOptions,
  ): Promise<PdfOutlineDocument> {
    let pdf: PDFDocument;
    try {
      pdf = await PDFDocument.load(bytes, {
        ignoreEncryption: true,
        updateMetadata: false,
      });
    } catch (error) {
      throw DocumentIOError.fromError(source, 'open', error);
    }

    const document = new PdfOutlineDocument(pdf, options);
    options.logger.debug(
      `[PdfOutlineDocument] Loaded ${source} (${document.pageCount} pages)`,
    );
    return document;
  }

  get pageCount(): number {
    return this.pdf.getPageCount();
  }

  getOutline(): OutlineNode[] {
    return this.reader.read();
  }

  /**
   * Replace the whole outline
   *
   * Nothing is changed unless every node targets a page of the document and
   * every title is representable in the requested encoding.
   *
   * @throws {PageRangeError} When a node targets a page outside the document
   * @throws {EncodingError} When a title cannot be written in the encoding
   */
  setOutline(nodes: OutlineNode[], options: SetOutlineOptions = {}): void {
    const { encoding = 'auto' } = options;
    const entries = this.converter.flatten(nodes);

    for (const entry of entries) {
      if (
        !Number.isInteger(entry.pageNo) ||
        entry.pageNo < 1 ||
        entry.pageNo > this.pageCount
      ) {
        throw new PageRangeError(entry.title, entry.pageNo, this.pageCount);
      }
    }
    this.charsetValidator.validateOrThrow(
      entries,
      encoding === 'auto' ? 'utf16be' : encoding,
    );

    this.writer.write(nodes, encoding);
    this.logger.info(
      `[PdfOutlineDocument] Outline replaced with ${entries.length} item(s)`,
    );
  }

  /**
   * Serialize the document
   */
  async toBytes(): Promise<Uint8Array> {
    return this.pdf.save();
  }

  /**
   * Write the document to a file
   *
   * @throws {DocumentIOError} When the document cannot be serialized or written
   */
  async save(path: string): Promise<void> {
    this.logger.info(`[PdfOutlineDocument] Saving ${path}...`);

    try {
      await writeFile(path, await this.toBytes());
    } catch (error) {
      throw DocumentIOError.fromError(path, 'save', error);
    }
  }
}
