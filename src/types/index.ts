export type MatchStrategy = 'contains' | 'full';
export type QueryMatchStrategy = 'ignore' | 'subset' | 'exact';
export type StorageType = 'lowdb' | 'sqlite' | 'memory';

/**
 * Uniform random source in [0, 1)
 */
export type RandomSource = () => number;

export interface FaultlineConfig {
  port: number;
  storage: StorageConfig;
  cors?: CorsConfig;
  capture?: CaptureConfig;
  delay?: DelaySettings;
  failure?: FailureSettings;
  rewrite?: RewriteSettings;
}

export interface StorageConfig {
  type: StorageType;
  path: string;
}

export interface CorsConfig {
  enabled: boolean;
  origins?: string[];
}

export interface CaptureConfig {
  /** Maximum number of records kept in history */
  capacity: number;
  /** When non-empty, only URLs matching one of these are captured */
  allow: string[];
  /** URLs matching one of these are dropped (ignored when allow is non-empty) */
  deny: string[];
  decryption: boolean;
}

export interface DelaySettings {
  enabled: boolean;
  fixedDelay?: number;
  minDelay?: number;
  maxDelay?: number;
  urlPatterns?: string[];
  httpMethods?: string[];
}

export interface FailureSettings {
  enabled: boolean;
  failureRate?: number;
  kind?: string;
  statusCode?: number;
  /** Domain, code and message of a custom kind */
  domain?: string;
  code?: number;
  message?: string;
  urlPatterns?: string[];
  httpMethods?: string[];
  candidateStatusCodes?: number[];
}

export interface RewriteSettings {
  enabled: boolean;
}

/**
 * What the engine needs to know about an outbound request
 */
export interface RequestDescriptor {
  url: string;
  method: string;
  headers?: Record<string, string>;
  body?: Uint8Array;
}

/**
 * A request paired with the identity assigned when it was first observed
 */
export interface TrackedRequest {
  id: string;
  startTime: number;
  request: RequestDescriptor;
}

export interface CaptureRecord {
  id: string;
  url: string;
  method?: string;
  statusCode?: number;
  requestBytes?: Uint8Array;
  responseBytes?: Uint8Array;
  isEncrypted: boolean;
  decryptedResponseBytes?: Uint8Array;
  /** Position in the store at insertion time */
  sequenceIndex: number;
  startTime?: number;
  duration?: number;
  error?: { domain: string; code: number; message: string };
}

/**
 * A record as handed over by an interceptor, before the store stamps it
 */
export type CaptureInput = Omit<
  CaptureRecord,
  'url' | 'sequenceIndex' | 'isEncrypted' | 'decryptedResponseBytes'
> & {
  url?: string | null;
};
