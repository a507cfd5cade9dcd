// Re-export all protocol types

export * from './common.js';
export * from './aspects.js';
export * from './changes.js';
export * from './indexing.js';
export * from './declarations.js';
export * from './urns.js';
