import type { LoggerMethods } from '@tocio/logger';
import type { OutlineNode, TitleEncodingMode } from '@tocio/model';
import type { PDFDocument, PDFObject } from 'pdf-lib';

import { encodePdfDocString, resolveTitleEncoding } from '@tocio/toc-processor';
import {
  PDFArray,
  PDFDict,
  PDFHexString,
  PDFName,
  PDFNull,
  PDFNumber,
  PDFRef,
} from 'pdf-lib';

import { pageTop, roundOffset } from './destination-resolver';

/**
 * Outline node paired with the reference its item is written to
 */
interface PlannedItem {
  node: OutlineNode;
  ref: PDFRef;
  children: PlannedItem[];
}

/**
 * OutlineWriter
 *
 * Replaces the `/Outlines` tree of a PDF.
 *
 * The previous item objects are deleted, then a fresh tree is written with
 * every item open. Nodes are expected to be validated already: page numbers
 * in range and titles representable in the chosen encoding.
 */
export class OutlineWriter {
  constructor(
    private readonly pdf: PDFDocument,
    private readonly logger: LoggerMethods,
  ) {}

  write(nodes: readonly OutlineNode[], encoding: TitleEncodingMode): void {
    const removed = this.removeOutline();
    if (removed > 0) {
      this.logger.debug(
        `[OutlineWriter] Removed ${removed} previous outline object(s)`,
      );
    }

    if (nodes.length === 0) {
      return;
    }

    const context = this.pdf.context;
    const outlinesRef = context.nextRef();
    const items = this.plan(nodes);

    this.writeItems(items, outlinesRef, encoding);

    const outlines = context.obj({});
    outlines.set(PDFName.of('Type'), PDFName.of('Outlines'));
    outlines.set(PDFName.of('First'), items[0].ref);
    outlines.set(PDFName.of('Last'), items[items.length - 1].ref);
    outlines.set(PDFName.of('Count'), PDFNumber.of(countItems(items)));
    context.assign(outlinesRef, outlines);

    this.pdf.catalog.set(PDFName.of('Outlines'), outlinesRef);
    this.logger.debug(
      `[OutlineWriter] Wrote ${countItems(items)} outline item(s)`,
    );
  }

  /**
   * Delete the current outline objects and unlink `/Outlines`
   *
   * @returns Number of deleted indirect objects
   */
  private removeOutline(): number {
    const context = this.pdf.context;
    const root = this.pdf.catalog.get(PDFName.of('Outlines'));
    const refs = new Set<PDFRef>();
    const visited = new Set<PDFDict>();

    const collect = (value: PDFObject | undefined): void => {
      let current = value;
      while (current !== undefined) {
        const item = context.lookup(current);
        if (!(item instanceof PDFDict) || visited.has(item)) {
          return;
        }
        visited.add(item);
        if (current instanceof PDFRef) {
          refs.add(current);
        }
        collect(item.get(PDFName.of('First')));
        current = item.get(PDFName.of('Next'));
      }
    };

    const outlines = context.lookup(root);
    if (outlines instanceof PDFDict) {
      collect(outlines.get(PDFName.of('First')));
    }
    if (root instanceof PDFRef) {
      refs.add(root);
    }

    for (const ref of refs) {
      context.delete(ref);
    }
    this.pdf.catalog.delete(PDFName.of('Outlines'));

    return refs.size;
  }

  private plan(nodes: readonly OutlineNode[]): PlannedItem[] {
    return nodes.map((node) => ({
      node,
      ref: this.pdf.context.nextRef(),
      children: this.plan(node.children),
    }));
  }

  private writeItems(
    items: readonly PlannedItem[],
    parentRef: PDFRef,
    encoding: TitleEncodingMode,
  ): void {
    const context = this.pdf.context;

    items.forEach((item, index) => {
      const dict = context.obj({});
      dict.set(PDFName.of('Title'), encodeTitle(item.node.title, encoding));
      dict.set(PDFName.of('Parent'), parentRef);
      dict.set(PDFName.of('Dest'), this.createDestination(item.node));

      if (index > 0) {
        dict.set(PDFName.of('Prev'), items[index - 1].ref);
      }
      if (index < items.length - 1) {
        dict.set(PDFName.of('Next'), items[index + 1].ref);
      }

      if (item.children.length > 0) {
        dict.set(PDFName.of('First'), item.children[0].ref);
        dict.set(
          PDFName.of('Last'),
          item.children[item.children.length - 1].ref,
        );
        dict.set(PDFName.of('Count'), PDFNumber.of(countItems(item.children)));
        this.writeItems(item.children, item.ref, encoding);
      }

      context.assign(item.ref, dict);
    });
  }

  /**
   * `[page /XYZ null top null]` with an offset, `[page /Fit]` without
   */
  private createDestination(node: OutlineNode): PDFArray {
    const page = this.pdf.getPage(node.pageNo - 1);
    const destination = PDFArray.withContext(this.pdf.context);
    destination.push(page.ref);

    if (node.topOffset === undefined) {
      destination.push(PDFName.of('Fit'));
      return destination;
    }

    const bottom = page.getMediaBox().y;
    const top = Math.max(bottom, roundOffset(pageTop(page) - node.topOffset));
    destination.push(PDFName.of('XYZ'));
    destination.push(PDFNull);
    destination.push(PDFNumber.of(top));
    destination.push(PDFNull);
    return destination;
  }
}

/**
 * All items open, so every descendant is visible
 */
function countItems(items: readonly PlannedItem[]): number {
  return items.reduce((count, item) => count + 1 + countItems(item.children), 0);
}

/**
 * Hex string in PDFDocEncoding, or UTF-16BE with a byte order mark
 */
function encodeTitle(title: string, mode: TitleEncodingMode): PDFHexString {
  if (resolveTitleEncoding(title, mode) === 'utf16be') {
    return PDFHexString.fromText(title);
  }

  const hex = Array.from(encodePdfDocString(title), (byte) =>
    byte.toString(16).toUpperCase().padStart(2, '0'),
  ).join('');
  return PDFHexString.of(hex);
}
