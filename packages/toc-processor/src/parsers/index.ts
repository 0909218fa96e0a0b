export { TocTextParser } from './toc-text-parser';
