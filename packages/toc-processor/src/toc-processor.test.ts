import type { LoggerMethods } from '@tocio/logger';
import type {
  OutlineDocument,
  OutlineNode,
  SetOutlineOptions,
} from '@tocio/model';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import {
  EmptyOutlineError,
  EncodingError,
  FormatError,
  PageRangeError,
} from './errors';
import { TocProcessor } from './toc-processor';

class InMemoryOutlineDocument implements OutlineDocument {
  outline: OutlineNode[];
  setOutlineCalls: Array<{ nodes: OutlineNode[]; options?: SetOutlineOptions }> =
    [];
  getOutlineCalls = 0;

  constructor(
    readonly pageCount: number,
    outline: OutlineNode[] = [],
  ) {
    this.outline = outline;
  }

  getOutline(): OutlineNode[] {
    this.getOutlineCalls++;
    return this.outline;
  }

  setOutline(nodes: OutlineNode[], options?: SetOutlineOptions): void {
    this.setOutlineCalls.push({ nodes, options });
    this.outline = nodes;
  }

  async save(): Promise<void> {}
}

describe('TocProcessor', () => {
  let logger: LoggerMethods;

  const outline: OutlineNode[] = [
    {
      title: 'Chapter 1',
      pageNo: 1,
      children: [
        { title: 'Section 1.1', pageNo: 2, topOffset: 120, children: [] },
      ],
    },
    { title: 'Chapter 2', pageNo: 5, children: [] },
  ];

  beforeEach(() => {
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  describe('readToc', () => {
    test('flattens the document outline', () => {
      const processor = new TocProcessor({ logger });
      const document = new InMemoryOutlineDocument(10, outline);

      expect(processor.readToc(document)).toEqual([
        { title: 'Chapter 1', level: 1, pageNo: 1 },
        { title: 'Section 1.1', level: 2, pageNo: 2, topOffset: 120 },
        { title: 'Chapter 2', level: 1, pageNo: 5 },
      ]);
      expect(document.getOutlineCalls).toBe(1);
      expect(logger.info).toHaveBeenCalledWith(
        '[TocProcessor] Read 3 outline entries',
      );
    });

    test('throws EmptyOutlineError when the document has no outline', () => {
      const processor = new TocProcessor({ logger });
      const document = new InMemoryOutlineDocument(3);

      expect(() => processor.readToc(document)).toThrow(EmptyOutlineError);
      expect(() => processor.readToc(document)).toThrow(
        'no table of contents found',
      );
    });
  });

  describe('readTocText', () => {
    test('serializes in the editable text format by default', () => {
      const processor = new TocProcessor({ logger });
      const document = new InMemoryOutlineDocument(10, outline);

      expect(processor.readTocText(document)).toBe(
        'Chapter 1|1\n\tSection 1.1|2|120\nChapter 2|5\n',
      );
    });

    test('renders the bulleted form when asked for human-readable output', () => {
      const processor = new TocProcessor({ logger });
      const document = new InMemoryOutlineDocument(10, outline);

      expect(processor.readTocText(document, { humanReadable: true })).toBe(
        '• Chapter 1 (1)\n  • Section 1.1 (2)\n• Chapter 2 (5)',
      );
    });

    test('uses the configured grammar', () => {
      const processor = new TocProcessor({
        logger,
        grammar: { indentUnit: '    ', separator: ';' },
      });
      const document = new InMemoryOutlineDocument(10, outline);

      expect(processor.readTocText(document)).toBe(
        'Chapter 1;1\n    Section 1.1;2;120\nChapter 2;5\n',
      );
    });
  });

  describe('writeToc', () => {
    test('builds the tree and installs it in one call', () => {
      const processor = new TocProcessor({ logger });
      const document = new InMemoryOutlineDocument(10);

      const installed = processor.writeToc(document, [
        { title: 'Chapter 1', level: 1, pageNo: 1 },
        { title: 'Section 1.1', level: 2, pageNo: 2, topOffset: 120 },
        { title: 'Chapter 2', level: 1, pageNo: 5 },
      ]);

      expect(installed).toEqual(outline);
      expect(document.setOutlineCalls).toHaveLength(1);
      expect(document.setOutlineCalls[0].nodes).toBe(installed);
      expect(document.setOutlineCalls[0].options).toEqual({ encoding: 'auto' });
    });

    test('passes the configured encoding to the document', () => {
      const processor = new TocProcessor({ logger, encoding: 'utf16be' });
      const document = new InMemoryOutlineDocument(1);

      processor.writeToc(document, [{ title: 'Only', level: 1, pageNo: 1 }]);

      expect(document.setOutlineCalls[0].options).toEqual({
        encoding: 'utf16be',
      });
    });

    test('installs an empty outline for no entries', () => {
      const processor = new TocProcessor({ logger });
      const document = new InMemoryOutlineDocument(2, outline);

      expect(processor.writeToc(document, [])).toEqual([]);
      expect(document.outline).toEqual([]);
    });

    test('leaves the document untouched on a page out of range', () => {
      const processor = new TocProcessor({ logger });
      const document = new InMemoryOutlineDocument(4, outline);

      expect(() =>
        processor.writeToc(document, [
          { title: 'Chapter 1', level: 1, pageNo: 1 },
          { title: 'Appendix', level: 1, pageNo: 5 },
        ]),
      ).toThrow(
        new PageRangeError('Appendix', 5, 4),
      );
      expect(document.setOutlineCalls).toHaveLength(0);
      expect(document.outline).toBe(outline);
    });

    test('rejects every unrepresentable title at once under pdfdoc', () => {
      const processor = new TocProcessor({ logger, encoding: 'pdfdoc' });
      const document = new InMemoryOutlineDocument(5);

      let caught: unknown;
      try {
        processor.writeToc(document, [
          { title: 'Введение', level: 1, pageNo: 1 },
          { title: 'Café', level: 1, pageNo: 2 },
          { title: '第一章', level: 1, pageNo: 3 },
        ]);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(EncodingError);
      if (!(caught instanceof EncodingError)) {
        return;
      }
      expect(caught.message).toBe(
        '2 title(s) contain characters not representable in pdfdoc',
      );
      expect(
        caught.validationResult.issues.map((issue) => issue.index),
      ).toEqual([0, 2]);
      expect(document.setOutlineCalls).toHaveLength(0);
    });

    test('accepts any well-formed title under auto', () => {
      const processor = new TocProcessor({ logger });
      const document = new InMemoryOutlineDocument(2);

      const installed = processor.writeToc(document, [
        { title: '第一章', level: 1, pageNo: 1 },
        { title: 'Café', level: 1, pageNo: 2 },
      ]);

      expect(installed.map((node) => node.title)).toEqual(['第一章', 'Café']);
    });

    test('rejects a NUL character even under auto', () => {
      const processor = new TocProcessor({ logger });
      const document = new InMemoryOutlineDocument(1);

      expect(() =>
        processor.writeToc(document, [
          { title: 'Bad\u0000Title', level: 1, pageNo: 1 },
        ]),
      ).toThrow(EncodingError);
    });

    test('substitutes unsupported characters under the replace policy', () => {
      const processor = new TocProcessor({
        logger,
        encoding: 'pdfdoc',
        onUnsupportedCharacter: 'replace',
      });
      const document = new InMemoryOutlineDocument(3);

      const installed = processor.writeToc(document, [
        { title: 'Глава 1', level: 1, pageNo: 1 },
        { title: 'Plain', level: 2, pageNo: 2 },
        { title: 'Ω-Notes', level: 1, pageNo: 3 },
      ]);

      expect(installed).toEqual([
        {
          title: '????? 1',
          pageNo: 1,
          children: [{ title: 'Plain', pageNo: 2, children: [] }],
        },
        { title: '?-Notes', pageNo: 3, children: [] },
      ]);
      expect(logger.warn).toHaveBeenCalledTimes(2);
      expect(logger.warn).toHaveBeenCalledWith(
        '[TocProcessor] Replaced 5 unsupported character(s) in "????? 1" (page 1)',
      );
      expect(logger.warn).toHaveBeenCalledWith(
        '[TocProcessor] Replaced 1 unsupported character(s) in "?-Notes" (page 3)',
      );
    });

    test('uses a custom replacement character', () => {
      const processor = new TocProcessor({
        logger,
        encoding: 'pdfdoc',
        onUnsupportedCharacter: 'replace',
        replacementCharacter: '_',
      });
      const document = new InMemoryOutlineDocument(1);

      const installed = processor.writeToc(document, [
        { title: 'a→b', level: 1, pageNo: 1 },
      ]);

      expect(installed[0].title).toBe('a_b');
    });

    test('counts astral characters as one position when replacing', () => {
      const processor = new TocProcessor({
        logger,
        encoding: 'pdfdoc',
        onUnsupportedCharacter: 'replace',
      });
      const document = new InMemoryOutlineDocument(1);

      const installed = processor.writeToc(document, [
        { title: 'x\u{1F600}y', level: 1, pageNo: 1 },
      ]);

      expect(installed[0].title).toBe('x?y');
    });
  });

  describe('writeTocText', () => {
    test('parses and installs text', () => {
      const processor = new TocProcessor({ logger });
      const document = new InMemoryOutlineDocument(10);

      const installed = processor.writeTocText(
        document,
        'Chapter 1|1\n\tSection 1.1|2|120\nChapter 2|5\n',
      );

      expect(installed).toEqual(outline);
      expect(document.outline).toEqual(outline);
    });

    test('reports the line of a format error and installs nothing', () => {
      const processor = new TocProcessor({ logger });
      const document = new InMemoryOutlineDocument(10);

      expect(() =>
        processor.writeTocText(document, 'Chapter 1|1\n\t\tDeep|2\n'),
      ).toThrow(new FormatError('skipped indentation level', { lineNo: 2 }));
      expect(document.setOutlineCalls).toHaveLength(0);
    });

    test('round-trips what readTocText produced', () => {
      const processor = new TocProcessor({ logger });
      const source = new InMemoryOutlineDocument(10, outline);
      const target = new InMemoryOutlineDocument(10);

      processor.writeTocText(target, processor.readTocText(source));

      expect(target.outline).toEqual(outline);
    });
  });

  describe('serializeToc and renderToc', () => {
    test('format entries without a document', () => {
      const processor = new TocProcessor({ logger });
      const entries = processor.parseToc(['A|1', '\tB|2']);

      expect(processor.serializeToc(entries)).toBe('A|1\n\tB|2\n');
      expect(processor.renderToc(entries)).toBe('• A (1)\n  • B (2)');
    });
  });

  test('rejects a replacement character outside PDFDocEncoding', () => {
    expect(
      () => new TocProcessor({ logger, replacementCharacter: '�' }),
    ).toThrow('Replacement character must be representable in every encoding');
  });
});
