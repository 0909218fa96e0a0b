/**
 * Outline Node
 *
 * One node of a document outline (bookmark) tree. Nesting is structural:
 * a node's level is its depth in the tree, starting at 1 for the nodes of
 * the outline root.
 *
 * @interface OutlineNode
 */
export interface OutlineNode {
  /**
   * Bookmark title
   * @type {string}
   */
  title: string;

  /**
   * Target page number (1-indexed)
   * @type {number}
   */
  pageNo: number;

  /**
   * Vertical position on the target page, in points from the top edge
   * @type {number}
   */
  topOffset?: number;

  /**
   * Child nodes in document order
   *
   * Owned by this node only. Trees are always built fresh and never share
   * subtrees.
   *
   * @type {OutlineNode[]}
   */
  children: OutlineNode[];
}
