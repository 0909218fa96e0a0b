import type { LoggerMethods } from '@tocio/logger';
import type { OutlineNode } from '@tocio/model';
import type { PDFDocument, PDFObject } from 'pdf-lib';

import { PDFDict, PDFHexString, PDFName, PDFString } from 'pdf-lib';

import { PDF_OUTLINE } from '../config/constants';
import { DestinationResolver } from './destination-resolver';

/**
 * OutlineReader
 *
 * Reads the `/Outlines` tree of a PDF into outline nodes.
 *
 * Items are walked through their `/First` and `/Next` links; an item seen
 * twice ends the chain it appears in. Items that do not point to a page of
 * the document are dropped and their children take their place, so the
 * result never has a level gap.
 */
export class OutlineReader {
  private readonly resolver: DestinationResolver;

  constructor(
    private readonly pdf: PDFDocument,
    private readonly logger: LoggerMethods,
  ) {
    this.resolver = new DestinationResolver(pdf);
  }

  read(): OutlineNode[] {
    const outlines = this.pdf.context.lookup(
      this.pdf.catalog.get(PDFName.of('Outlines')),
    );
    if (!(outlines instanceof PDFDict)) {
      this.logger.debug('[OutlineReader] Document has no /Outlines');
      return [];
    }

    const visited = new Set<PDFDict>();
    const nodes = this.readSiblings(outlines.get(PDFName.of('First')), visited);

    this.logger.debug(
      `[OutlineReader] Read ${visited.size} outline item(s)`,
    );
    return nodes;
  }

  private readSiblings(
    first: PDFObject | undefined,
    visited: Set<PDFDict>,
  ): OutlineNode[] {
    const nodes: OutlineNode[] = [];
    let current = this.pdf.context.lookup(first);

    while (current instanceof PDFDict && !visited.has(current)) {
      visited.add(current);

      const title = this.readTitle(current);
      const children = this.readSiblings(
        current.get(PDFName.of('First')),
        visited,
      );
      const destination = this.resolver.resolve(current);

      if (destination) {
        const node: OutlineNode = {
          title,
          pageNo: destination.pageIndex + 1,
          children,
        };
        if (destination.topOffset !== undefined) {
          node.topOffset = destination.topOffset;
        }
        nodes.push(node);
      } else {
        this.logger.warn(
          `[OutlineReader] Skipped "${title}": destination is not a page of this document`,
        );
        nodes.push(...children);
      }

      current = this.pdf.context.lookup(current.get(PDFName.of('Next')));
    }

    return nodes;
  }

  private readTitle(item: PDFDict): string {
    const value = this.pdf.context.lookup(item.get(PDFName.of('Title')));
    const title =
      value instanceof PDFString || value instanceof PDFHexString
        ? value.decodeText().trim()
        : '';
    return title === '' ? PDF_OUTLINE.UNTITLED : title;
  }
}
