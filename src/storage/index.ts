export { type KeyValueStorage, generateId } from './base.js';
export { LowDBStorage } from './lowdb.adapter.js';
export { SQLiteStorage } from './sqlite.adapter.js';
export { MemoryStorage } from './memory.adapter.js';
