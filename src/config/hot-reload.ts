/**
 * Hot Reload - watch the config file and re-apply injection settings on change
 */

import { watch, type FSWatcher } from 'chokidar';
import { loadConfigFile, configFileToFaultlineConfig, validateConfig, mergeConfig } from './loader.js';
import { DEFAULT_CONFIG } from './defaults.js';
import type { FaultlineConfig } from '../types/index.js';

/** Sections that can be re-applied to a running instance */
export type ReloadableSection = 'capture' | 'delay' | 'failure' | 'rewrite';

export interface HotReloadConfig {
  /** Config file path to watch */
  configPath: string;
  /** Debounce delay in milliseconds */
  debounceMs?: number;
  /** Called with the sections present in the reloaded file */
  onReload?: (config: Partial<FaultlineConfig>, sections: ReloadableSection[]) => void;
  /** Called when the file cannot be read or is invalid */
  onError?: (error: Error) => void;
}

export interface HotReloadStats {
  watching: boolean;
  reloadCount: number;
  lastReloadAt: number | null;
  lastError: Error | null;
  configPath: string;
}

const RELOADABLE_SECTIONS: readonly ReloadableSection[] = ['capture', 'delay', 'failure', 'rewrite'];

/**
 * Watches one config file; server and storage settings need a restart and are
 * left out of the reload.
 */
export class HotReloadService {
  private watcher: FSWatcher | null = null;
  private readonly debounceMs: number;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private stats: HotReloadStats;

  constructor(private readonly config: HotReloadConfig) {
    this.debounceMs = config.debounceMs ?? 300;
    this.stats = {
      watching: false,
      reloadCount: 0,
      lastReloadAt: null,
      lastError: null,
      configPath: config.configPath,
    };
  }

  start(): void {
    if (this.watcher) {
      return;
    }

    this.watcher = watch(this.config.configPath, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 100,
        pollInterval: 50,
      },
    });

    this.watcher.on('change', () => this.scheduleReload());
    this.watcher.on('add', () => this.scheduleReload());
    this.watcher.on('error', (error) => this.handleError(toError(error)));

    this.stats.watching = true;
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }

    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }

    this.stats.watching = false;
  }

  private scheduleReload(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }

    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.reload().catch((error: unknown) => this.handleError(toError(error)));
    }, this.debounceMs);
  }

  /**
   * Read the file now and hand the reloadable sections to onReload
   */
  async reload(): Promise<void> {
    const file = await loadConfigFile(this.config.configPath);
    const loaded = configFileToFaultlineConfig(file);

    const validation = validateConfig(mergeConfig(DEFAULT_CONFIG, loaded));
    if (!validation.valid) {
      throw new Error(`Invalid config: ${validation.errors.join('; ')}`);
    }

    const sections = RELOADABLE_SECTIONS.filter((section) => loaded[section] !== undefined);

    this.stats.reloadCount++;
    this.stats.lastReloadAt = Date.now();
    this.stats.lastError = null;
    this.config.onReload?.(loaded, sections);
  }

  private handleError(error: Error): void {
    this.stats.lastError = error;
    this.config.onError?.(error);
  }

  getStats(): HotReloadStats {
    return { ...this.stats };
  }

  isWatching(): boolean {
    return this.stats.watching;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

