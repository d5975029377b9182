export { JsonlFileStore } from './jsonl';
export type { FileStoreOptions } from './jsonl';
export { MemoryStore } from './memory';
export type { MatchRecord, default as MatchStore } from './store.interface';
