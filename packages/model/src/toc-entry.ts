/**
 * Table of Contents Entry
 *
 * One line of a table of contents in its flat form. Nesting is carried by
 * `level` instead of child pointers; a sequence of entries describes a tree
 * only through the order and levels of its items.
 *
 * @interface TocEntry
 */
export interface TocEntry {
  /**
   * Entry title
   *
   * Non-empty after trimming. May contain any Unicode scalar value.
   *
   * @type {string}
   */
  title: string;

  /**
   * Hierarchy depth (1 = top-level, 2 = child of the previous level-1 entry, ...)
   *
   * In any sequence produced by the text parser or by flattening an outline,
   * the first entry has level 1 and every entry's level is at most one more
   * than the level of the entry before it.
   *
   * @type {number}
   */
  level: number;

  /**
   * Target page number (1-indexed)
   * @type {number}
   */
  pageNo: number;

  /**
   * Vertical position on the target page, in points measured down from the
   * top edge of the page
   *
   * Absent means the top of the page.
   *
   * @type {number}
   */
  topOffset?: number;
}
