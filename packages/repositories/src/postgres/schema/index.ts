// Re-export all schema tables
export * from './aspects.js';
export * from './timeseries.js';
