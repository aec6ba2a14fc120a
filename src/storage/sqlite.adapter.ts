import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { KeyValueStorage } from './base.js';

interface SQLiteRow {
  key: string;
  value: string;
  updated_at: number;
}

/**
 * SQLite-based key-value storage
 */
export class SQLiteStorage implements KeyValueStorage {
  private db: DatabaseType | null = null;
  private path: string;

  constructor(path: string = './.faultline/settings.db') {
    this.path = resolve(path);
  }

  async init(): Promise<void> {
    const dir = dirname(this.path);
    await mkdir(dir, { recursive: true });

    this.db = new Database(this.path);
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS kv (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );
    `);
  }

  private getDb(): DatabaseType {
    if (!this.db) {
      throw new Error('Storage not initialized. Call init() first.');
    }
    return this.db;
  }

  async get(key: string): Promise<string | null> {
    const db = this.getDb();
    const row = db.prepare<[string], SQLiteRow>('SELECT * FROM kv WHERE key = ?').get(key);
    return row ? row.value : null;
  }

  async set(key: string, value: string): Promise<void> {
    const db = this.getDb();
    db.prepare<[string, string, number]>(`
      INSERT INTO kv (key, value, updated_at) VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
    `).run(key, value, Date.now());
  }

  async delete(key: string): Promise<boolean> {
    const db = this.getDb();
    const result = db.prepare<[string]>('DELETE FROM kv WHERE key = ?').run(key);
    return result.changes > 0;
  }

  async keys(): Promise<string[]> {
    const db = this.getDb();
    const rows = db.prepare<[], SQLiteRow>('SELECT * FROM kv ORDER BY key').all();
    return rows.map((row) => row.key);
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
