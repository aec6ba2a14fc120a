import type { FaultlineConfig, StorageType } from '../types/index.js';

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: FaultlineConfig = {
  port: 3900,
  storage: {
    type: 'lowdb',
    path: './.faultline/settings.json',
  },
  cors: {
    enabled: true,
    origins: undefined,
  },
  capture: {
    capacity: 10000,
    allow: [],
    deny: [],
    decryption: false,
  },
  delay: {
    enabled: false,
    minDelay: 1000,
    maxDelay: 3000,
    urlPatterns: [],
    httpMethods: [],
  },
  failure: {
    enabled: false,
    failureRate: 0.5,
    kind: 'timeout',
    urlPatterns: [],
    httpMethods: [],
  },
  rewrite: {
    enabled: false,
  },
};

/**
 * Default storage file per storage type
 */
export const DEFAULT_STORAGE_PATHS: Record<StorageType, string> = {
  lowdb: './.faultline/settings.json',
  sqlite: './.faultline/settings.db',
  memory: '',
};

/**
 * Default config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'faultline.config.yml',
  'faultline.config.yaml',
  '.faultlinerc.yml',
  '.faultlinerc.yaml',
];
