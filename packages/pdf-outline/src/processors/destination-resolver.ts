import type { PDFDocument, PDFObject, PDFPage } from 'pdf-lib';

import {
  PDFArray,
  PDFDict,
  PDFHexString,
  PDFName,
  PDFNumber,
  PDFRef,
  PDFString,
} from 'pdf-lib';

import { PDF_OUTLINE } from '../config/constants';

/**
 * Page target of an outline item
 */
export interface ResolvedDestination {
  /**
   * 0-based page index
   */
  pageIndex: number;

  /**
   * Points below the top edge of the page, when the destination sets a top
   */
  topOffset?: number;
}

/**
 * Position of the `top` operand for the fit types that carry one
 */
const TOP_OPERAND_INDEX = new Map<PDFName, number>([
  [PDFName.of('XYZ'), 3],
  [PDFName.of('FitH'), 2],
  [PDFName.of('FitBH'), 2],
]);

/**
 * Round to the precision offsets are kept at
 */
export function roundOffset(value: number): number {
  const factor = 10 ** PDF_OUTLINE.OFFSET_DECIMALS;
  return Math.round(value * factor) / factor;
}

/**
 * Y coordinate of the top edge of the page's MediaBox
 */
export function pageTop(page: PDFPage): number {
  const { y, height } = page.getMediaBox();
  return y + height;
}

/**
 * DestinationResolver
 *
 * Resolves the destination of an outline item to a page of the document.
 *
 * Destinations come from the item's `/Dest`, or from the `/D` of a `/GoTo`
 * action. A destination is either an explicit array `[page /Fit ...]`, a
 * name looked up in the catalog `/Dests` dictionary, a string looked up in
 * the `/Names` `/Dests` name tree, or a dictionary wrapping one of these in
 * its `/D`. Anything else (URI, launch or remote actions) does not resolve.
 */
export class DestinationResolver {
  private readonly pageIndexByRef = new Map<string, number>();
  private namedDestinations?: Map<string, PDFObject>;

  constructor(private readonly pdf: PDFDocument) {
    pdf.getPages().forEach((page, index) => {
      this.pageIndexByRef.set(page.ref.toString(), index);
    });
  }

  /**
   * Resolve the destination of an outline item dictionary
   */
  resolve(item: PDFDict): ResolvedDestination | undefined {
    const destination = item.get(PDFName.of('Dest'));
    if (destination !== undefined) {
      return this.resolveDestination(destination, 0);
    }

    const action = this.pdf.context.lookup(item.get(PDFName.of('A')));
    if (
      action instanceof PDFDict &&
      action.get(PDFName.of('S')) === PDFName.of('GoTo')
    ) {
      return this.resolveDestination(action.get(PDFName.of('D')), 0);
    }

    return undefined;
  }

  private resolveDestination(
    value: PDFObject | undefined,
    depth: number,
  ): ResolvedDestination | undefined {
    if (depth > PDF_OUTLINE.MAX_RESOLVE_DEPTH) {
      return undefined;
    }

    const destination = this.pdf.context.lookup(value);

    if (destination instanceof PDFArray) {
      return this.resolveExplicit(destination);
    }
    if (destination instanceof PDFName) {
      return this.resolveDestination(
        this.lookupDestsDictionary(destination),
        depth + 1,
      );
    }
    if (
      destination instanceof PDFString ||
      destination instanceof PDFHexString
    ) {
      return this.resolveDestination(
        this.lookupNamedDestination(destination.decodeText()),
        depth + 1,
      );
    }
    if (destination instanceof PDFDict) {
      return this.resolveDestination(
        destination.get(PDFName.of('D')),
        depth + 1,
      );
    }

    return undefined;
  }

  /**
   * `[pageRef /XYZ left top zoom]`, `[pageRef /FitH top]`, `[pageRef /Fit]`, ...
   */
  private resolveExplicit(array: PDFArray): ResolvedDestination | undefined {
    if (array.size() === 0) {
      return undefined;
    }

    const target = array.get(0);
    if (!(target instanceof PDFRef)) {
      return undefined;
    }

    const pageIndex = this.pageIndexByRef.get(target.toString());
    if (pageIndex === undefined) {
      return undefined;
    }

    const fit = array.size() > 1 ? array.lookup(1) : undefined;
    const topIndex =
      fit instanceof PDFName ? TOP_OPERAND_INDEX.get(fit) : undefined;
    const top =
      topIndex !== undefined && topIndex < array.size()
        ? array.lookup(topIndex)
        : undefined;

    if (!(top instanceof PDFNumber)) {
      return { pageIndex };
    }

    const edge = pageTop(this.pdf.getPage(pageIndex));
    return {
      pageIndex,
      topOffset: Math.max(0, roundOffset(edge - top.asNumber())),
    };
  }

  /**
   * Catalog `/Dests`: name -> destination
   */
  private lookupDestsDictionary(name: PDFName): PDFObject | undefined {
    const dests = this.pdf.context.lookup(
      this.pdf.catalog.get(PDFName.of('Dests')),
    );
    return dests instanceof PDFDict ? dests.get(name) : undefined;
  }

  /**
   * `/Names` `/Dests` name tree, falling back to the catalog `/Dests`
   */
  private lookupNamedDestination(name: string): PDFObject | undefined {
    if (!this.namedDestinations) {
      this.namedDestinations = this.collectNameTree();
    }
    return (
      this.namedDestinations.get(name) ??
      this.lookupDestsDictionary(PDFName.of(name))
    );
  }

  private collectNameTree(): Map<string, PDFObject> {
    const entries = new Map<string, PDFObject>();
    const names = this.pdf.context.lookup(
      this.pdf.catalog.get(PDFName.of('Names')),
    );
    if (!(names instanceof PDFDict)) {
      return entries;
    }

    const visited = new Set<PDFDict>();
    const visit = (value: PDFObject | undefined, depth: number): void => {
      const node = this.pdf.context.lookup(value);
      if (
        !(node instanceof PDFDict) ||
        visited.has(node) ||
        depth > PDF_OUTLINE.MAX_RESOLVE_DEPTH
      ) {
        return;
      }
      visited.add(node);

      const pairs = this.pdf.context.lookup(node.get(PDFName.of('Names')));
      if (pairs instanceof PDFArray) {
        for (let i = 0; i + 1 < pairs.size(); i += 2) {
          const key = pairs.lookup(i);
          if (
            (key instanceof PDFString || key instanceof PDFHexString) &&
            !entries.has(key.decodeText())
          ) {
            entries.set(key.decodeText(), pairs.get(i + 1));
          }
        }
      }

      const kids = this.pdf.context.lookup(node.get(PDFName.of('Kids')));
      if (kids instanceof PDFArray) {
        for (let i = 0; i < kids.size(); i++) {
          visit(kids.get(i), depth + 1);
        }
      }
    };

    visit(names.get(PDFName.of('Dests')), 0);
    return entries;
  }
}
