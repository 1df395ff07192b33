/**
 * LeanDoc Tree Utilities
 * Public exports
 */

export { childrenOf, type NodeVisitor, visitNode } from './visitor.js';
export {
  type PayloadMeta,
  type PayloadNode,
  toPayload,
} from './payload.js';
export {
  DEFAULT_TEXT_WIDTH,
  type DumpOptions,
  dumpTokens,
  dumpTree,
} from './dump.js';
export { checkContract } from './contract.js';
