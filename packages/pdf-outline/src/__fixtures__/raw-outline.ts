import type { PDFDocument, PDFObject, PDFRef } from 'pdf-lib';

import { PDFHexString, PDFName } from 'pdf-lib';

/**
 * Outline item written field by field, bypassing OutlineWriter
 */
export interface RawOutlineItem {
  title?: string;
  dest?: PDFObject;
  action?: PDFObject;
  children?: RawOutlineItem[];
}

/**
 * Install an outline the way an arbitrary producer might
 *
 * @returns Reference of the `/Outlines` dictionary
 */
export function installRawOutline(
  pdf: PDFDocument,
  items: RawOutlineItem[],
): PDFRef {
  const context = pdf.context;
  const outlinesRef = context.nextRef();

  const writeSiblings = (siblings: RawOutlineItem[], parent: PDFRef): PDFRef[] => {
    const refs = siblings.map(() => context.nextRef());

    siblings.forEach((item, index) => {
      const dict = context.obj({});
      if (item.title !== undefined) {
        dict.set(PDFName.of('Title'), PDFHexString.fromText(item.title));
      }
      dict.set(PDFName.of('Parent'), parent);
      if (item.dest !== undefined) {
        dict.set(PDFName.of('Dest'), item.dest);
      }
      if (item.action !== undefined) {
        dict.set(PDFName.of('A'), item.action);
      }
      if (index > 0) {
        dict.set(PDFName.of('Prev'), refs[index - 1]);
      }
      if (index < refs.length - 1) {
        dict.set(PDFName.of('Next'), refs[index + 1]);
      }

      const children = writeSiblings(item.children ?? [], refs[index]);
      if (children.length > 0) {
        dict.set(PDFName.of('First'), children[0]);
        dict.set(PDFName.of('Last'), children[children.length - 1]);
      }

      context.assign(refs[index], dict);
    });

    return refs;
  };

  const top = writeSiblings(items, outlinesRef);
  const outlines = context.obj({ Type: 'Outlines' });
  if (top.length > 0) {
    outlines.set(PDFName.of('First'), top[0]);
    outlines.set(PDFName.of('Last'), top[top.length - 1]);
  }
  context.assign(outlinesRef, outlines);
  pdf.catalog.set(PDFName.of('Outlines'), outlinesRef);

  return outlinesRef;
}
