/**
 * LeanDoc Line Classifier
 * Public exports
 */

export { classifyLine, tokenize } from './tokenizer.js';
export {
  atEnd,
  createLineStream,
  type LineStream,
  peek,
  take,
} from './state.js';
export { ADMONITION_LABELS, FENCES } from './markers.js';
