// @rvlink/protocol
// Types, identifier helpers, capture formats and table validation shared by every package

export * from './types/index.js';
export * from './identifiers.js';
export * from './capture/ndjson.js';
export * from './capture/candump.js';
export * from './validation/tables.js';
