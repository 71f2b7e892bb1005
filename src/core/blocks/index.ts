export type { MatchBlock, BlockAlignment, MatchOptions } from './types.js';
export { matchBlocks, blockRatio, alignSequences, alignLines } from './matcher.js';
