import type { LoggerMethods } from '@tocio/logger';
import type { OutlineNode } from '@tocio/model';

import {
  PDFArray,
  PDFDict,
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFNull,
  PDFNumber,
  PDFRef,
} from 'pdf-lib';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { installRawOutline } from '../__fixtures__/raw-outline';
import { OutlineReader } from './outline-reader';
import { OutlineWriter } from './outline-writer';

describe('OutlineWriter', () => {
  let logger: LoggerMethods;
  let pdf: PDFDocument;

  const outline: OutlineNode[] = [
    {
      title: 'Chapter 1',
      pageNo: 1,
      children: [
        { title: 'Section 1.1', pageNo: 2, topOffset: 100, children: [] },
        { title: 'Section 1.2', pageNo: 2, children: [] },
      ],
    },
    { title: 'Chapter 2', pageNo: 3, children: [] },
  ];

  const lookupDict = (value: unknown): PDFDict => {
    const resolved =
      value instanceof PDFRef ? pdf.context.lookup(value) : value;
    if (!(resolved instanceof PDFDict)) {
      throw new Error('expected a dictionary');
    }
    return resolved;
  };

  const outlinesDict = (): PDFDict =>
    lookupDict(pdf.catalog.get(PDFName.of('Outlines')));

  beforeEach(async () => {
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    pdf = await PDFDocument.create();
    pdf.addPage([612, 792]);
    pdf.addPage([612, 792]);
    pdf.addPage([300, 400]);
  });

  test('writes the /Outlines root with visible item count', () => {
    new OutlineWriter(pdf, logger).write(outline, 'auto');

    const root = outlinesDict();
    expect(root.get(PDFName.of('Type'))).toBe(PDFName.of('Outlines'));
    expect(root.get(PDFName.of('Count'))).toEqual(PDFNumber.of(4));
    expect(logger.debug).toHaveBeenCalledWith(
      '[OutlineWriter] Wrote 4 outline item(s)',
    );
  });

  test('links siblings, parents and children', () => {
    new OutlineWriter(pdf, logger).write(outline, 'auto');

    const root = outlinesDict();
    const rootRef = pdf.catalog.get(PDFName.of('Outlines'));
    const chapter1Ref = root.get(PDFName.of('First'));
    const chapter2Ref = root.get(PDFName.of('Last'));
    const chapter1 = lookupDict(chapter1Ref);
    const chapter2 = lookupDict(chapter2Ref);

    expect(chapter1.get(PDFName.of('Parent'))).toBe(rootRef);
    expect(chapter1.get(PDFName.of('Next'))).toBe(chapter2Ref);
    expect(chapter1.get(PDFName.of('Prev'))).toBeUndefined();
    expect(chapter2.get(PDFName.of('Prev'))).toBe(chapter1Ref);
    expect(chapter2.get(PDFName.of('Next'))).toBeUndefined();
    expect(chapter1.get(PDFName.of('Count'))).toEqual(PDFNumber.of(2));
    expect(chapter2.get(PDFName.of('Count'))).toBeUndefined();

    const section = lookupDict(chapter1.get(PDFName.of('First')));
    expect(section.get(PDFName.of('Parent'))).toBe(chapter1Ref);
    expect(section.get(PDFName.of('Next'))).toBe(
      chapter1.get(PDFName.of('Last')),
    );
  });

  test('writes /XYZ with an offset and /Fit without', () => {
    new OutlineWriter(pdf, logger).write(
      [
        { title: 'Offset', pageNo: 3, topOffset: 150.5, children: [] },
        { title: 'Plain', pageNo: 2, children: [] },
      ],
      'auto',
    );

    const [, page2, page3] = pdf.getPages();
    const first = lookupDict(outlinesDict().get(PDFName.of('First')));
    const last = lookupDict(outlinesDict().get(PDFName.of('Last')));

    const xyz = first.get(PDFName.of('Dest'));
    expect(xyz).toBeInstanceOf(PDFArray);
    if (!(xyz instanceof PDFArray)) {
      return;
    }
    expect(xyz.asArray()).toEqual([
      page3.ref,
      PDFName.of('XYZ'),
      PDFNull,
      PDFNumber.of(249.5),
      PDFNull,
    ]);

    const fit = last.get(PDFName.of('Dest'));
    expect(fit).toBeInstanceOf(PDFArray);
    if (!(fit instanceof PDFArray)) {
      return;
    }
    expect(fit.asArray()).toEqual([page2.ref, PDFName.of('Fit')]);
  });

  test('places the /XYZ top below the MediaBox top edge', () => {
    const page = pdf.addPage([600, 800]);
    page.setMediaBox(0, 100, 600, 800);
    const shifted: OutlineNode[] = [
      { title: 'Shifted', pageNo: 4, topOffset: 50, children: [] },
    ];

    new OutlineWriter(pdf, logger).write(shifted, 'auto');

    const item = lookupDict(outlinesDict().get(PDFName.of('First')));
    const destination = item.get(PDFName.of('Dest'));
    if (!(destination instanceof PDFArray)) {
      throw new Error('expected an explicit destination');
    }
    expect(destination.get(3)).toEqual(PDFNumber.of(850));
    expect(new OutlineReader(pdf, logger).read()).toEqual(shifted);
  });

  test('writes PDFDocEncoding titles as hex strings', () => {
    new OutlineWriter(pdf, logger).write(
      [{ title: 'Café', pageNo: 1, children: [] }],
      'auto',
    );

    const item = lookupDict(outlinesDict().get(PDFName.of('First')));
    const title = item.get(PDFName.of('Title'));
    expect(title).toBeInstanceOf(PDFHexString);
    if (!(title instanceof PDFHexString)) {
      return;
    }
    expect(title.asString()).toBe('436166E9');
    expect(title.decodeText()).toBe('Café');
  });

  test('writes UTF-16BE titles with a byte order mark', () => {
    new OutlineWriter(pdf, logger).write(
      [
        { title: '第', pageNo: 1, children: [] },
        { title: 'Plain', pageNo: 1, children: [] },
      ],
      'auto',
    );

    const first = lookupDict(outlinesDict().get(PDFName.of('First')));
    const last = lookupDict(outlinesDict().get(PDFName.of('Last')));
    const wide = first.get(PDFName.of('Title'));
    const narrow = last.get(PDFName.of('Title'));
    if (!(wide instanceof PDFHexString) || !(narrow instanceof PDFHexString)) {
      throw new Error('expected hex string titles');
    }
    expect(wide.asString().toUpperCase()).toBe('FEFF7B2C');
    expect(narrow.asString()).toBe('506C61696E');
  });

  test('writes titles that would read as a byte order mark in UTF-16BE', () => {
    const marked: OutlineNode[] = [
      { title: '\u00FE\u00FFAB', pageNo: 1, children: [] },
    ];

    new OutlineWriter(pdf, logger).write(marked, 'auto');

    const item = lookupDict(outlinesDict().get(PDFName.of('First')));
    const title = item.get(PDFName.of('Title'));
    if (!(title instanceof PDFHexString)) {
      throw new Error('expected a hex string title');
    }
    expect(title.asString().toUpperCase()).toBe('FEFF00FE00FF00410042');
    expect(new OutlineReader(pdf, logger).read()).toEqual(marked);
  });

  test('uses UTF-16BE for every title when asked to', () => {
    new OutlineWriter(pdf, logger).write(
      [{ title: 'A', pageNo: 1, children: [] }],
      'utf16be',
    );

    const item = lookupDict(outlinesDict().get(PDFName.of('First')));
    const title = item.get(PDFName.of('Title'));
    if (!(title instanceof PDFHexString)) {
      throw new Error('expected a hex string title');
    }
    expect(title.asString().toUpperCase()).toBe('FEFF0041');
  });

  test('deletes the previous outline objects', () => {
    const oldRoot = installRawOutline(pdf, [
      {
        title: 'Old',
        dest: pdf.context.obj([pdf.getPage(0).ref, 'Fit']),
        children: [
          {
            title: 'Old child',
            dest: pdf.context.obj([pdf.getPage(1).ref, 'Fit']),
          },
        ],
      },
    ]);
    const oldItem = lookupDict(oldRoot).get(PDFName.of('First'));
    if (!(oldItem instanceof PDFRef)) {
      throw new Error('expected an indirect item');
    }

    new OutlineWriter(pdf, logger).write(outline, 'auto');

    expect(pdf.context.lookup(oldRoot)).toBeUndefined();
    expect(pdf.context.lookup(oldItem)).toBeUndefined();
    expect(logger.debug).toHaveBeenCalledWith(
      '[OutlineWriter] Removed 3 previous outline object(s)',
    );
    expect(new OutlineReader(pdf, logger).read()).toEqual(outline);
  });

  test('removes /Outlines for an empty outline', () => {
    new OutlineWriter(pdf, logger).write(outline, 'auto');
    new OutlineWriter(pdf, logger).write([], 'auto');

    expect(pdf.catalog.get(PDFName.of('Outlines'))).toBeUndefined();
    expect(new OutlineReader(pdf, logger).read()).toEqual([]);
  });

  test('reads back what it wrote', () => {
    new OutlineWriter(pdf, logger).write(outline, 'pdfdoc');

    expect(new OutlineReader(pdf, logger).read()).toEqual(outline);
  });
});
