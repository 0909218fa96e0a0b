import type { LoggerMethods } from '@tocio/logger';
import type { OutlineNode, TocEntry } from '@tocio/model';

import { FormatError, PageRangeError } from '../errors';

/**
 * Options for building an outline tree
 */
export interface BuildOutlineOptions {
  /**
   * Page count of the target document; every entry must target `1..pageCount`
   */
  pageCount: number;
}

/**
 * Open ancestor while building the tree
 */
interface OpenNode {
  level: number;
  node: OutlineNode;
}

/**
 * OutlineConverter
 *
 * Converts between the flat, leveled entry sequence and the outline tree.
 *
 * ## Flatten
 *
 * Pre-order walk assigning `level = depth + 1`. The result always satisfies
 * the level rules of the text format.
 *
 * ## Build
 *
 * One pass with a stack of open ancestors. For each entry, ancestors at the
 * entry's level or deeper are closed; the entry becomes the last child of the
 * remaining top of the stack, or a new root when the stack is empty; then it
 * is opened itself. The whole build fails on the first bad entry, so no
 * partial tree is ever returned.
 */
export class OutlineConverter {
  private readonly logger: LoggerMethods;

  constructor(logger: LoggerMethods) {
    this.logger = logger;
  }

  /**
   * Flatten an outline tree into entries in document order
   */
  flatten(nodes: readonly OutlineNode[]): TocEntry[] {
    const entries: TocEntry[] = [];

    const visit = (siblings: readonly OutlineNode[], level: number): void => {
      for (const node of siblings) {
        const entry: TocEntry = {
          title: node.title,
          level,
          pageNo: node.pageNo,
        };
        if (node.topOffset !== undefined) {
          entry.topOffset = node.topOffset;
        }
        entries.push(entry);
        visit(node.children, level + 1);
      }
    };

    visit(nodes, 1);

    this.logger.debug(
      `[OutlineConverter] Flattened outline into ${entries.length} entries`,
    );
    return entries;
  }

  /**
   * Build an outline tree from leveled entries
   *
   * @throws {PageRangeError} When an entry targets a page outside the document
   * @throws {FormatError} When levels do not start at 1 or skip a step
   */
  build(
    entries: readonly TocEntry[],
    options: BuildOutlineOptions,
  ): OutlineNode[] {
    const roots: OutlineNode[] = [];
    const stack: OpenNode[] = [];
    let previousLevel = 0;

    for (const entry of entries) {
      this.assertPageInRange(entry, options.pageCount);
      this.assertLevel(entry, previousLevel);

      while (stack.length > 0 && stack[stack.length - 1].level >= entry.level) {
        stack.pop();
      }

      const node: OutlineNode = {
        title: entry.title,
        pageNo: entry.pageNo,
        children: [],
      };
      if (entry.topOffset !== undefined) {
        node.topOffset = entry.topOffset;
      }

      const parent = stack[stack.length - 1];
      if (parent) {
        parent.node.children.push(node);
      } else {
        roots.push(node);
      }

      stack.push({ level: entry.level, node });
      previousLevel = entry.level;
    }

    this.logger.debug(
      `[OutlineConverter] Built ${roots.length} top-level node(s) from ${entries.length} entries`,
    );
    return roots;
  }

  private assertPageInRange(entry: TocEntry, pageCount: number): void {
    if (
      !Number.isInteger(entry.pageNo) ||
      entry.pageNo < 1 ||
      entry.pageNo > pageCount
    ) {
      throw new PageRangeError(entry.title, entry.pageNo, pageCount);
    }
  }

  private assertLevel(entry: TocEntry, previousLevel: number): void {
    if (!Number.isInteger(entry.level) || entry.level < 1) {
      throw new FormatError('bad level', { title: entry.title });
    }
    if (previousLevel === 0 && entry.level !== 1) {
      throw new FormatError('first entry must be top-level', {
        title: entry.title,
      });
    }
    if (entry.level > previousLevel + 1) {
      throw new FormatError('skipped indentation level', {
        title: entry.title,
      });
    }
  }
}
