export type {
  OutlineDocument,
  SetOutlineOptions,
  TitleEncoding,
  TitleEncodingMode,
} from './outline-document';
export type { OutlineNode } from './outline-node';
export type { TocEntry } from './toc-entry';
