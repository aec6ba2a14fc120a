import { matchesWildcard } from '../core/wildcard.js';

/**
 * Decryption capability consulted for captured responses
 */
export interface EncryptionService {
  isEncrypted(bytes: Uint8Array): boolean;
  customDecrypt(bytes: Uint8Array, url: string): Uint8Array | null;
  getDecryptionKey(url: string): Uint8Array | null;
  decrypt(bytes: Uint8Array, key: Uint8Array | null): Uint8Array | null;
}

export type CustomDecryptor = (bytes: Uint8Array, url: string) => Uint8Array | null;

export type Cipher = (bytes: Uint8Array, key: Uint8Array) => Uint8Array | null;

/**
 * Encryption service whose keys and decryptors are registered per URL pattern.
 * The cipher itself is supplied by the host.
 */
export class KeyedEncryptionService implements EncryptionService {
  private keys: Array<{ pattern: string; key: Uint8Array }> = [];
  private decryptors: Array<{ pattern: string; decryptor: CustomDecryptor }> = [];
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(private readonly cipher?: Cipher) {}

  registerKey(urlPattern: string, key: Uint8Array): void {
    this.keys.push({ pattern: urlPattern, key });
  }

  registerDecryptor(urlPattern: string, decryptor: CustomDecryptor): void {
    this.decryptors.push({ pattern: urlPattern, decryptor });
  }

  clear(): void {
    this.keys = [];
    this.decryptors = [];
  }

  /**
   * Bytes that do not decode as UTF-8 text are treated as encrypted
   */
  isEncrypted(bytes: Uint8Array): boolean {
    if (bytes.length === 0) return false;
    try {
      this.decoder.decode(bytes);
      return false;
    } catch {
      return true;
    }
  }

  customDecrypt(bytes: Uint8Array, url: string): Uint8Array | null {
    const entry = this.decryptors.find(({ pattern }) => matchesWildcard(url, pattern));
    if (!entry) return null;
    try {
      return entry.decryptor(bytes, url);
    } catch {
      return null;
    }
  }

  getDecryptionKey(url: string): Uint8Array | null {
    return this.keys.find(({ pattern }) => matchesWildcard(url, pattern))?.key ?? null;
  }

  decrypt(bytes: Uint8Array, key: Uint8Array | null): Uint8Array | null {
    if (!key || !this.cipher) return null;
    try {
      return this.cipher(bytes, key);
    } catch {
      return null;
    }
  }
}
