import type { TocEntry } from '@tocio/model';

/**
 * Options for HumanReadableRenderer
 */
export interface HumanReadableRendererOptions {
  /**
   * Indentation per level below the top (default: two spaces)
   */
  indent?: string;

  /**
   * Marker in front of each title (default: '•')
   */
  bullet?: string;
}

const DEFAULT_OPTIONS: Required<HumanReadableRendererOptions> = {
  indent: '  ',
  bullet: '•',
};

// C0 and C1 controls, DEL, and bidi embedding/override/isolate marks
const UNSAFE_DISPLAY_CHARACTERS =
  /[\u0000-\u001F\u007F-\u009F\u202A-\u202E\u2066-\u2069]/g;

/**
 * HumanReadableRenderer
 *
 * Renders entries as a bulleted tree for terminal display:
 *
 * ```
 * • Chapter 1 (1)
 *   • Section 1.1 (2)
 * • Chapter 2 (5)
 * ```
 *
 * The output is for reading only and is never parsed back.
 */
export class HumanReadableRenderer {
  private readonly options: Required<HumanReadableRendererOptions>;

  constructor(options?: HumanReadableRendererOptions) {
    this.options = {
      ...DEFAULT_OPTIONS,
      ...options,
    };
  }

  render(entries: readonly TocEntry[]): string {
    const { indent, bullet } = this.options;

    return entries
      .map((entry) => {
        const title = entry.title.replace(UNSAFE_DISPLAY_CHARACTERS, ' ');
        const prefix = indent.repeat(Math.max(entry.level - 1, 0));
        return `${prefix}${bullet} ${title} (${entry.pageNo})`;
      })
      .join('\n');
  }
}
