export {
  DEFAULT_TOC_GRAMMAR,
  ESCAPE_CHARACTER,
  escapeTitle,
  resolveTocGrammar,
  splitFields,
  unescapeTitle,
} from './toc-grammar';
export type { TocGrammar, TocGrammarOptions } from './toc-grammar';
