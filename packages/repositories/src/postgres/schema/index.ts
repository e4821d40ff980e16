// Re-export all schema tables
export * from './history.js';
