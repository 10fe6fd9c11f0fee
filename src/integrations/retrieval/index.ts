export * from './types.js';
export * from './LexicalVectorIndex.js';
