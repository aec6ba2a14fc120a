import { randomUUID } from 'node:crypto';

/**
 * Durable key-value capability used for persisted settings
 */
export interface KeyValueStorage {
  /**
   * Initialize the storage (create files/tables if needed)
   */
  init(): Promise<void>;

  /**
   * Read a value, null when the key is absent
   */
  get(key: string): Promise<string | null>;

  /**
   * Store a value under a key, replacing any previous value
   */
  set(key: string, value: string): Promise<void>;

  /**
   * Remove a key, returns whether it existed
   */
  delete(key: string): Promise<boolean>;

  /**
   * List stored keys
   */
  keys(): Promise<string[]>;

  /**
   * Release underlying resources
   */
  close(): Promise<void>;
}

/**
 * Generate a unique ID for requests and records
 */
export function generateId(): string {
  return randomUUID();
}
