import type { LoggerMethods } from '@tocio/logger';
import type {
  OutlineDocument,
  OutlineNode,
  TitleEncoding,
  TitleEncodingMode,
  TocEntry,
} from '@tocio/model';

import type { CharsetValidationResult } from './errors';
import type { HumanReadableRendererOptions } from './serializers';
import type { TocGrammarOptions } from './utils';

import { OutlineConverter } from './converters';
import { EmptyOutlineError, EncodingError } from './errors';
import { TocTextParser } from './parsers';
import { HumanReadableRenderer, TocTextSerializer } from './serializers';
import { CharsetValidator } from './validators';

/**
 * What to do with title characters the target encoding cannot carry
 */
export type UnsupportedCharacterPolicy = 'reject' | 'replace';

/**
 * TocProcessor Options
 */
export interface TocProcessorOptions {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Text grammar for parsing and serializing (default: TAB indent, '|' separator)
   */
  grammar?: TocGrammarOptions;

  /**
   * Layout of the human-readable rendering
   */
  humanReadable?: HumanReadableRendererOptions;

  /**
   * Encoding for outline titles (default: 'auto')
   */
  encoding?: TitleEncodingMode;

  /**
   * Policy for unsupported title characters (default: 'reject')
   */
  onUnsupportedCharacter?: UnsupportedCharacterPolicy;

  /**
   * Substitute used by the 'replace' policy (default: '?')
   */
  replacementCharacter?: string;
}

/**
 * Options for reading a ToC as text
 */
export interface ReadTocTextOptions {
  /**
   * Render the bulleted display form instead of the editable text format
   */
  humanReadable?: boolean;
}

/**
 * TocProcessor
 *
 * Moves a table of contents between text and a document outline.
 *
 * ## Read path
 *
 * document outline -> flatten -> serialize (or render for display)
 *
 * ## Write path
 *
 * text -> parse -> charset check -> build tree -> replace document outline
 *
 * Every operation takes the document explicitly and touches it at most once
 * for reading and once for writing. The write path installs nothing unless
 * all checks pass.
 */
export class TocProcessor {
  private readonly logger: LoggerMethods;
  private readonly encoding: TitleEncodingMode;
  private readonly onUnsupportedCharacter: UnsupportedCharacterPolicy;
  private readonly replacementCharacter: string;
  private readonly parser: TocTextParser;
  private readonly serializer: TocTextSerializer;
  private readonly renderer: HumanReadableRenderer;
  private readonly charsetValidator: CharsetValidator;
  private readonly converter: OutlineConverter;

  constructor(options: TocProcessorOptions) {
    const {
      logger,
      grammar,
      humanReadable,
      encoding = 'auto',
      onUnsupportedCharacter = 'reject',
      replacementCharacter = '?',
    } = options;

    this.logger = logger;
    this.encoding = encoding;
    this.onUnsupportedCharacter = onUnsupportedCharacter;
    this.replacementCharacter = replacementCharacter;
    this.parser = new TocTextParser(grammar);
    this.serializer = new TocTextSerializer(grammar);
    this.renderer = new HumanReadableRenderer(humanReadable);
    this.charsetValidator = new CharsetValidator();
    this.converter = new OutlineConverter(logger);

    if (
      this.charsetValidator.check(replacementCharacter, 'pdfdoc').length > 0
    ) {
      throw new Error(
        `Replacement character must be representable in every encoding: ${JSON.stringify(replacementCharacter)}`,
      );
    }
  }

  /**
   * Parse ToC text into entries
   *
   * @throws {FormatError} On malformed text
   */
  parseToc(text: string | readonly string[]): TocEntry[] {
    return this.parser.parse(text);
  }

  /**
   * Read the document outline as flat entries
   *
   * @throws {EmptyOutlineError} When the document has no outline
   */
  readToc(document: OutlineDocument): TocEntry[] {
    this.logger.info('[TocProcessor] Reading outline...');

    const outline = document.getOutline();
    if (outline.length === 0) {
      this.logger.info('[TocProcessor] Document has no outline');
      throw new EmptyOutlineError();
    }

    const entries = this.converter.flatten(outline);
    this.logger.info(`[TocProcessor] Read ${entries.length} outline entries`);
    return entries;
  }

  /**
   * Read the document outline as text
   *
   * @throws {EmptyOutlineError} When the document has no outline
   */
  readTocText(
    document: OutlineDocument,
    options: ReadTocTextOptions = {},
  ): string {
    const entries = this.readToc(document);
    return options.humanReadable
      ? this.renderer.render(entries)
      : this.serializer.serialize(entries);
  }

  /**
   * Render entries in the editable text format
   */
  serializeToc(entries: readonly TocEntry[]): string {
    return this.serializer.serialize(entries);
  }

  /**
   * Render entries as a bulleted tree for display
   */
  renderToc(entries: readonly TocEntry[]): string {
    return this.renderer.render(entries);
  }

  /**
   * Replace the document outline with the given entries
   *
   * @returns The installed outline tree
   * @throws {EncodingError} When titles are not representable and the policy is 'reject'
   * @throws {PageRangeError} When an entry targets a page outside the document
   * @throws {FormatError} When entry levels are inconsistent
   */
  writeToc(
    document: OutlineDocument,
    entries: readonly TocEntry[],
  ): OutlineNode[] {
    this.logger.info(
      `[TocProcessor] Writing ${entries.length} entries (encoding: ${this.encoding})...`,
    );

    const checked = this.applyCharsetPolicy(entries);
    const outline = this.converter.build(checked, {
      pageCount: document.pageCount,
    });

    document.setOutline(outline, { encoding: this.encoding });
    this.logger.info(
      `[TocProcessor] Installed outline with ${outline.length} top-level node(s)`,
    );
    return outline;
  }

  /**
   * Parse ToC text and replace the document outline with it
   *
   * @returns The installed outline tree
   */
  writeTocText(
    document: OutlineDocument,
    text: string | readonly string[],
  ): OutlineNode[] {
    return this.writeToc(document, this.parseToc(text));
  }

  /**
   * Collect every unsupported title, then reject or substitute
   */
  private applyCharsetPolicy(entries: readonly TocEntry[]): readonly TocEntry[] {
    const result = this.charsetValidator.validate(
      entries,
      this.validationEncoding(),
    );
    if (result.valid) {
      return entries;
    }

    if (this.onUnsupportedCharacter === 'reject') {
      throw EncodingError.fromResult(result);
    }

    return this.replaceUnsupported(entries, result);
  }

  private replaceUnsupported(
    entries: readonly TocEntry[],
    result: CharsetValidationResult,
  ): TocEntry[] {
    const replaced = [...entries];

    for (const issue of result.issues) {
      const positions = new Set(issue.positions);
      const title = Array.from(issue.entry.title)
        .map((char, position) =>
          positions.has(position) ? this.replacementCharacter : char,
        )
        .join('');

      this.logger.warn(
        `[TocProcessor] Replaced ${issue.positions.length} unsupported character(s) in "${title}" (page ${issue.entry.pageNo})`,
      );
      replaced[issue.index] = { ...issue.entry, title };
    }

    return replaced;
  }

  /**
   * 'auto' falls back to UTF-16BE, so only its limits apply
   */
  private validationEncoding(): TitleEncoding {
    return this.encoding === 'auto' ? 'utf16be' : this.encoding;
  }
}
