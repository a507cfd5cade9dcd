// @metagraph/protocol
// Shared types and wire contracts for aspects, change events and index updates

export * from './types/index.js';
export * from './aspects/index.js';
export * from './validation/descriptors.js';
export * from './validation/change-events.js';
export * from './bundle/ndjson.js';
export * from './bundle/paths.js';
export * from './bundle/records.js';
