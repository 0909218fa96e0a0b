import { extname } from 'node:path';

/**
 * Output path next to the input: `book.pdf` -> `book<suffix>.pdf`
 */
export function defaultOutputPath(input: string, suffix: string): string {
  const extension = extname(input);
  return `${input.slice(0, input.length - extension.length)}${suffix}${extension}`;
}
