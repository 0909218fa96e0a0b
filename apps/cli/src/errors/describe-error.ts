import type { TocError } from '@tocio/toc-processor';

function assertNever(value: never): never {
  throw new Error(`Unhandled error kind: ${JSON.stringify(value)}`);
}

/**
 * One message per error kind, printed after `error: `
 */
export function describeError(error: TocError): string {
  switch (error.kind) {
    case 'format':
      return `invalid table of contents: ${error.message}`;
    case 'range':
      return error.message;
    case 'encoding':
      return error.getSummary();
    case 'empty-outline':
      return error.message;
    case 'io':
      return error.message;
    default:
      return assertNever(error);
  }
}
