export { MemoryStore } from './memory-store.js';
export type { CloneRecord, StoreDraft, StoreView, TransactionCallback } from './memory-store.js';
