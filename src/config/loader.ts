import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type {
  FaultlineConfig,
  StorageType,
  CaptureConfig,
  DelaySettings,
  FailureSettings,
} from '../types/index.js';
import { FAILURE_KIND_TYPES } from '../chaos/failure.js';
import { DEFAULT_CONFIG, DEFAULT_STORAGE_PATHS, CONFIG_FILE_NAMES } from './defaults.js';

/**
 * Configuration file structure (YAML format)
 */
export interface ConfigFile {
  server?: {
    port?: number;
  };
  storage?: {
    type?: StorageType;
    path?: string;
  };
  cors?: {
    enabled?: boolean;
    origins?: string[];
  };
  capture?: Partial<CaptureConfig>;
  delay?: Partial<DelaySettings>;
  failure?: Partial<FailureSettings>;
  rewrite?: {
    enabled?: boolean;
  };
}

/**
 * CLI options that can override config file
 */
export interface CliOptions {
  port?: string;
  storage?: string;
  storageType?: string;
  config?: string;
  cors?: boolean;
}

/**
 * Find config file in current directory or parent directories
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(currentDir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

/**
 * Load and parse a YAML config file
 */
export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  try {
    const content = await readFile(filePath, 'utf-8');
    const parsed = parseYaml(content) as ConfigFile | null;
    return parsed ?? {};
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Config file not found: ${filePath}`);
    }
    throw new Error(`Failed to parse config file: ${(error as Error).message}`);
  }
}

/**
 * Convert config file structure to FaultlineConfig
 */
export function configFileToFaultlineConfig(file: ConfigFile): Partial<FaultlineConfig> {
  const config: Partial<FaultlineConfig> = {};

  if (file.server?.port !== undefined) {
    config.port = file.server.port;
  }

  if (file.storage !== undefined) {
    const type = file.storage.type ?? DEFAULT_CONFIG.storage.type;
    config.storage = {
      type,
      path: file.storage.path ?? DEFAULT_STORAGE_PATHS[type] ?? DEFAULT_CONFIG.storage.path,
    };
  }

  if (file.cors !== undefined) {
    config.cors = {
      enabled: file.cors.enabled ?? true,
      origins: file.cors.origins,
    };
  }

  if (file.capture !== undefined) {
    config.capture = {
      capacity: file.capture.capacity ?? 10000,
      allow: file.capture.allow ?? [],
      deny: file.capture.deny ?? [],
      decryption: file.capture.decryption ?? false,
    };
  }

  if (file.delay !== undefined) {
    config.delay = { ...file.delay, enabled: file.delay.enabled ?? false };
  }

  if (file.failure !== undefined) {
    config.failure = { ...file.failure, enabled: file.failure.enabled ?? false };
  }

  if (file.rewrite !== undefined) {
    config.rewrite = { enabled: file.rewrite.enabled ?? false };
  }

  return config;
}

/**
 * Convert CLI options to FaultlineConfig
 */
function cliOptionsToFaultlineConfig(cli: CliOptions): Partial<FaultlineConfig> {
  const config: Partial<FaultlineConfig> = {};

  if (cli.port !== undefined) {
    const port = parseInt(cli.port, 10);
    if (!isNaN(port)) {
      config.port = port;
    }
  }

  if (cli.storageType !== undefined) {
    if (!isStorageType(cli.storageType)) {
      throw new Error(`Invalid storage type: ${cli.storageType}. Must be: lowdb, sqlite, or memory.`);
    }
    config.storage = {
      type: cli.storageType,
      path: cli.storage ?? DEFAULT_STORAGE_PATHS[cli.storageType],
    };
  } else if (cli.storage !== undefined) {
    config.storage = { type: DEFAULT_CONFIG.storage.type, path: cli.storage };
  }

  if (cli.cors !== undefined) {
    config.cors = {
      enabled: cli.cors,
    };
  }

  return config;
}

/**
 * Merge config objects (source overrides target)
 */
export function mergeConfig(
  target: FaultlineConfig,
  source: Partial<FaultlineConfig>
): FaultlineConfig {
  return {
    port: source.port ?? target.port,
    storage: source.storage ? { ...target.storage, ...source.storage } : target.storage,
    cors: source.cors ? { ...target.cors, ...source.cors } : target.cors,
    capture: source.capture ? mergeCapture(target.capture, source.capture) : target.capture,
    delay: source.delay ? { ...target.delay, ...source.delay } : target.delay,
    failure: source.failure ? { ...target.failure, ...source.failure } : target.failure,
    rewrite: source.rewrite ? { ...target.rewrite, ...source.rewrite } : target.rewrite,
  };
}

function mergeCapture(target: CaptureConfig | undefined, source: CaptureConfig): CaptureConfig {
  return target ? { ...target, ...source } : source;
}

/**
 * Load configuration from file and CLI options
 * Priority: CLI options > Config file > Defaults
 */
export async function loadConfig(cliOptions: CliOptions = {}): Promise<FaultlineConfig> {
  let fileConfig: Partial<FaultlineConfig> = {};

  const configPath = cliOptions.config ?? (await findConfigFile());

  if (configPath) {
    try {
      const configFile = await loadConfigFile(configPath);
      fileConfig = configFileToFaultlineConfig(configFile);
    } catch (error) {
      // If config was explicitly specified, throw error
      if (cliOptions.config) {
        throw error;
      }
      // Otherwise, just ignore missing auto-discovered config
    }
  }

  const cliConfig = cliOptionsToFaultlineConfig(cliOptions);

  // Merge: defaults <- file <- cli
  const merged = mergeConfig(DEFAULT_CONFIG, fileConfig);
  return mergeConfig(merged, cliConfig);
}

/**
 * Validate configuration
 */
export function validateConfig(config: FaultlineConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push(`Invalid port: ${config.port}. Must be between 0 and 65535.`);
  }

  if (!isStorageType(config.storage.type)) {
    errors.push(`Invalid storage type: ${config.storage.type}. Must be: lowdb, sqlite, or memory.`);
  }

  if (config.capture) {
    if (!Number.isInteger(config.capture.capacity) || config.capture.capacity < 1) {
      errors.push('Capture capacity must be a positive integer');
    }
  }

  if (config.delay) {
    errors.push(...validateDelaySettings(config.delay));
  }

  if (config.failure) {
    errors.push(...validateFailureSettings(config.failure));
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

export function validateDelaySettings(delay: Partial<DelaySettings>): string[] {
  const errors: string[] = [];

  if (delay.fixedDelay !== undefined && (typeof delay.fixedDelay !== 'number' || delay.fixedDelay < 0)) {
    errors.push('Delay fixedDelay must be >= 0');
  }
  const min = delay.minDelay ?? DEFAULT_CONFIG.delay?.minDelay ?? 0;
  const max = delay.maxDelay ?? DEFAULT_CONFIG.delay?.maxDelay ?? 0;
  if (typeof min !== 'number' || min < 0) {
    errors.push('Delay minDelay must be >= 0');
  }
  if (typeof max !== 'number' || max < min) {
    errors.push('Delay maxDelay must be >= minDelay');
  }
  if (delay.urlPatterns !== undefined && !isStringArray(delay.urlPatterns)) {
    errors.push('Delay urlPatterns must be a list of strings');
  }
  if (delay.httpMethods !== undefined && !isStringArray(delay.httpMethods)) {
    errors.push('Delay httpMethods must be a list of strings');
  }

  return errors;
}

export function validateFailureSettings(failure: Partial<FailureSettings>): string[] {
  const errors: string[] = [];

  if (failure.failureRate !== undefined && typeof failure.failureRate !== 'number') {
    errors.push('Failure rate must be a number');
  }
  if (failure.kind !== undefined && !FAILURE_KIND_TYPES.some((type) => type === failure.kind)) {
    errors.push(`Invalid failure kind: ${failure.kind}. Must be one of: ${FAILURE_KIND_TYPES.join(', ')}.`);
  }
  if (
    failure.statusCode !== undefined &&
    (!Number.isInteger(failure.statusCode) || failure.statusCode < 100 || failure.statusCode > 599)
  ) {
    errors.push('Failure statusCode must be between 100 and 599');
  }
  if (failure.candidateStatusCodes !== undefined) {
    const valid =
      Array.isArray(failure.candidateStatusCodes) &&
      failure.candidateStatusCodes.every((code) => Number.isInteger(code) && code >= 100 && code <= 599);
    if (!valid) {
      errors.push('Failure candidateStatusCodes must be status codes between 100 and 599');
    }
  }
  if (failure.urlPatterns !== undefined && !isStringArray(failure.urlPatterns)) {
    errors.push('Failure urlPatterns must be a list of strings');
  }
  if (failure.httpMethods !== undefined && !isStringArray(failure.httpMethods)) {
    errors.push('Failure httpMethods must be a list of strings');
  }

  return errors;
}

function isStorageType(value: string): value is StorageType {
  return value === 'lowdb' || value === 'sqlite' || value === 'memory';
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}
