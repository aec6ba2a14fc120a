import type { KeyValueStorage } from './base.js';

/**
 * In-memory storage for tests and hosts that keep nothing across restarts
 */
export class MemoryStorage implements KeyValueStorage {
  private values = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  async init(): Promise<void> {}

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async delete(key: string): Promise<boolean> {
    return this.values.delete(key);
  }

  async keys(): Promise<string[]> {
    return Array.from(this.values.keys());
  }

  async close(): Promise<void> {}
}
