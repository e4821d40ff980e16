// Repository interfaces
export type { EntityHistoryRepository, HistoryEntry, HistoryQuery } from './history-repository.js';
