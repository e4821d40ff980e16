// Re-export all protocol types
export * from './common.js';
export * from './messages.js';
export * from './frames.js';
export * from './entities.js';
export * from './commands.js';
export * from './diagnostics.js';
