export { HumanReadableRenderer } from './human-readable-renderer';
export type { HumanReadableRendererOptions } from './human-readable-renderer';
export { TocTextSerializer } from './toc-text-serializer';
