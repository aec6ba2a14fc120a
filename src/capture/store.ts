import type { CaptureInput, CaptureRecord } from '../types/index.js';
import { matchesAnyWildcard } from '../core/wildcard.js';
import type { EncryptionService } from './encryption.js';

export const DEFAULT_CAPTURE_CAPACITY = 10_000;

export interface CaptureFilters {
  /** When non-empty, only matching URLs are kept */
  allow: string[];
  /** Matching URLs are dropped; ignored while allow is non-empty */
  deny: string[];
}

export interface CaptureStoreOptions {
  capacity?: number;
  filters?: Partial<CaptureFilters>;
  decryptionEnabled?: boolean;
  encryption?: EncryptionService;
  onCapture?: (record: CaptureRecord) => void;
}

/**
 * Bounded, ordered history of captured exchanges, unique by id.
 * The oldest record is evicted once the capacity is reached.
 */
export class CaptureStore {
  private records: CaptureRecord[] = [];
  private ids = new Set<string>();
  private filters: CaptureFilters;
  private decryptionEnabled: boolean;
  private encryption?: EncryptionService;
  readonly capacity: number;

  constructor(private readonly options: CaptureStoreOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_CAPTURE_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('Capture capacity must be a positive integer');
    }
    this.capacity = capacity;
    this.filters = {
      allow: [...(options.filters?.allow ?? [])],
      deny: [...(options.filters?.deny ?? [])],
    };
    this.decryptionEnabled = options.decryptionEnabled ?? false;
    this.encryption = options.encryption;
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Append a record. Returns false when it was filtered out or its id is taken.
   */
  addRecord(input: CaptureInput): boolean {
    const url = input.url?.trim() ?? '';
    if (url.length === 0) {
      return false;
    }

    if (!this.passesFilters(url.toLowerCase())) {
      return false;
    }

    if (this.ids.has(input.id)) {
      return false;
    }

    if (this.records.length >= this.capacity) {
      this.evictOldest();
    }

    const record: CaptureRecord = {
      ...input,
      url,
      isEncrypted: false,
      sequenceIndex: this.records.length,
    };
    this.decryptInto(record);

    this.records.push(record);
    this.ids.add(record.id);
    this.options.onCapture?.(record);
    return true;
  }

  list(): CaptureRecord[] {
    return [...this.records];
  }

  get(id: string): CaptureRecord | undefined {
    return this.records.find((record) => record.id === id);
  }

  removeAll(): void {
    this.records = [];
    this.ids.clear();
  }

  /**
   * Remove every record with this id, returns how many were removed
   */
  remove(id: string): number {
    const before = this.records.length;
    this.records = this.records.filter((record) => record.id !== id);
    this.ids.delete(id);
    return before - this.records.length;
  }

  getFilters(): CaptureFilters {
    return { allow: [...this.filters.allow], deny: [...this.filters.deny] };
  }

  setFilters(filters: Partial<CaptureFilters>): void {
    this.filters = {
      allow: [...(filters.allow ?? this.filters.allow)],
      deny: [...(filters.deny ?? this.filters.deny)],
    };
  }

  isDecryptionEnabled(): boolean {
    return this.decryptionEnabled;
  }

  setDecryptionEnabled(enabled: boolean): void {
    this.decryptionEnabled = enabled;
  }

  setEncryptionService(service: EncryptionService | undefined): void {
    this.encryption = service;
  }

  // Filter patterns only expand `*`; a `?` is the query delimiter here
  private passesFilters(url: string): boolean {
    if (this.filters.allow.length > 0) {
      return matchesAnyWildcard(url, this.filters.allow, 'contains', true, 'star');
    }
    if (this.filters.deny.length > 0) {
      return !matchesAnyWildcard(url, this.filters.deny, 'contains', true, 'star');
    }
    return true;
  }

  private evictOldest(): void {
    const evicted = this.records.shift();
    if (evicted) {
      this.ids.delete(evicted.id);
    }
  }

  /**
   * Fill in decrypted bytes when the response looks encrypted.
   * Any miss leaves the record as captured.
   */
  private decryptInto(record: CaptureRecord): void {
    const encryption = this.encryption;
    const bytes = record.responseBytes;
    if (!this.decryptionEnabled || !encryption || !bytes) {
      return;
    }

    try {
      record.isEncrypted = encryption.isEncrypted(bytes);
      if (!record.isEncrypted) return;

      const decrypted =
        encryption.customDecrypt(bytes, record.url) ??
        encryption.decrypt(bytes, encryption.getDecryptionKey(record.url));
      if (decrypted) {
        record.decryptedResponseBytes = decrypted;
      }
    } catch {
      // Raw bytes stay untouched
      delete record.decryptedResponseBytes;
    }
  }
}
