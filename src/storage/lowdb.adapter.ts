import { Low } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { KeyValueStorage } from './base.js';

interface LowDBData {
  values: Record<string, string>;
}

export class LowDBStorage implements KeyValueStorage {
  private db: Low<LowDBData> | null = null;
  private path: string;

  constructor(path: string = './.faultline/settings.json') {
    // Use absolute path to avoid issues with temp file paths
    this.path = resolve(path);
  }

  async init(): Promise<void> {
    const dir = dirname(this.path);
    await mkdir(dir, { recursive: true });

    const adapter = new JSONFile<LowDBData>(this.path);
    this.db = new Low<LowDBData>(adapter, { values: {} });

    await this.db.read();
    // Files written by hand may lack the values map
    this.db.data.values ??= {};
  }

  private getDb(): Low<LowDBData> {
    if (!this.db) {
      throw new Error('Storage not initialized. Call init() first.');
    }
    return this.db;
  }

  async get(key: string): Promise<string | null> {
    const db = this.getDb();
    return Object.prototype.hasOwnProperty.call(db.data.values, key) ? db.data.values[key] : null;
  }

  async set(key: string, value: string): Promise<void> {
    const db = this.getDb();
    db.data.values[key] = value;
    await db.write();
  }

  async delete(key: string): Promise<boolean> {
    const db = this.getDb();
    if (!Object.prototype.hasOwnProperty.call(db.data.values, key)) {
      return false;
    }
    delete db.data.values[key];
    await db.write();
    return true;
  }

  async keys(): Promise<string[]> {
    const db = this.getDb();
    return Object.keys(db.data.values);
  }

  async close(): Promise<void> {
    this.db = null;
  }
}
