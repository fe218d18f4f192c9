export * from './filter.js';
export { compileDomain, combineIntegerRanges, combineBytesRanges } from './compiler.js';
export { filterAccepts } from './evaluate.js';
