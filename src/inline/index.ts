/**
 * LeanDoc Inline Scanner
 * Public exports
 */

export { scanInline } from './scanner.js';
export { URL_SCHEMES } from './helpers.js';
