/**
 * Configuration constants for reading and writing outlines
 */
export const PDF_OUTLINE = {
  /**
   * Decimal places kept when converting between PDF y coordinates and
   * offsets from the top of the page
   */
  OFFSET_DECIMALS: 3,

  /**
   * Maximum number of indirections followed when resolving a named
   * destination or walking a name tree
   */
  MAX_RESOLVE_DEPTH: 32,

  /**
   * Title given to outline items without a usable title
   */
  UNTITLED: 'Untitled',
} as const;
