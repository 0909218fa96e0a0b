export { OutlineConverter } from './outline-converter';
export type { BuildOutlineOptions } from './outline-converter';
