// Bundle import/export functionality.
// Moves aspect state to and from the aspect bundle format.

export * from './types.js';
export * from './export.js';
export * from './import.js';
export * from './fs.js';
