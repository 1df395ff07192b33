/**
 * LeanDoc Module
 * Exports the line classifier, parser, inline scanner, tree utilities and
 * AST types
 */

export { classifyLine, tokenize } from './lexer/index.js';
export {
  parse,
  parseAnchor,
  parseAttributeList,
  splitUnescapedPipe,
  stripOuter,
  tryParse,
  type Anchor,
} from './parser/index.js';
export { scanInline, URL_SCHEMES } from './inline/index.js';
export {
  checkContract,
  childrenOf,
  DEFAULT_TEXT_WIDTH,
  dumpTokens,
  dumpTree,
  type DumpOptions,
  type NodeVisitor,
  type PayloadMeta,
  type PayloadNode,
  toPayload,
  visitNode,
} from './tree/index.js';
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  type DumpMode,
  type ErrorFormat,
  type LeanDocConfig,
  loadConfig,
  resolveConfig,
} from './config.js';
export * from './types.js';
