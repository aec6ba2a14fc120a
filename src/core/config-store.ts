import type { KeyValueStorage } from '../storage/base.js';
import { createDelayConfig, type DelayConfig } from '../chaos/latency.js';
import { createFailureConfig, type FailureConfig } from '../chaos/failure.js';
import {
  createRewriteConfig,
  decodeRewriteRules,
  encodeRewriteRules,
  rewriteRulesEqual,
  type RewriteConfig,
  type RewriteRule,
} from '../chaos/rewrite.js';
import { Mutex } from './mutex.js';

export const REWRITE_RULES_KEY = 'faultline.injection.rewriteRules';

export type ConfigKind = 'delay' | 'failure' | 'rewrite';

export type ConfigChangeListener = (kind: ConfigKind) => void;

export interface InjectionConfigStoreOptions {
  /** Called when persisted rules cannot be read or written */
  onError?: (error: Error) => void;
}

/**
 * Holds the delay, failure and rewrite configs.
 *
 * Reads hand out frozen snapshots and never wait. Each setter swaps its own
 * snapshot in one step; rewrite updates are serialized so storage follows the
 * order of writes.
 */
export class InjectionConfigStore {
  private delayConfig: Readonly<DelayConfig> = freezeDelay(createDelayConfig());
  private failureConfig: Readonly<FailureConfig> = freezeFailure(createFailureConfig());
  private rewriteConfig: Readonly<RewriteConfig> = freezeRewrite(createRewriteConfig());
  private readonly writeLock = new Mutex();
  private readonly listeners = new Set<ConfigChangeListener>();
  private initialized = false;

  constructor(
    private readonly storage: KeyValueStorage,
    private readonly options: InjectionConfigStoreOptions = {}
  ) {}

  /**
   * Load persisted rewrite rules. Rewriting always starts disabled.
   */
  async init(): Promise<void> {
    await this.writeLock.runExclusive(async () => {
      const rules = await this.loadPersistedRules();
      this.rewriteConfig = freezeRewrite({ enabled: false, rules });
      this.initialized = true;
    });
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  getDelayConfig(): Readonly<DelayConfig> {
    return this.delayConfig;
  }

  setDelayConfig(config: DelayConfig): void {
    this.delayConfig = freezeDelay(createDelayConfig(config));
    this.emit('delay');
  }

  getFailureConfig(): Readonly<FailureConfig> {
    return this.failureConfig;
  }

  setFailureConfig(config: FailureConfig): void {
    this.failureConfig = freezeFailure(createFailureConfig(config));
    this.emit('failure');
  }

  getRewriteConfig(): Readonly<RewriteConfig> {
    return this.rewriteConfig;
  }

  /**
   * Replace the rewrite config, persisting the rules when they changed
   */
  async setRewriteConfig(config: RewriteConfig): Promise<void> {
    await this.updateRewriteConfig(() => config);
  }

  /**
   * Derive the next rewrite config from the current one. The read, the
   * update and the persist happen under the write lock, after every earlier
   * write has finished. Returning null from the updater leaves the config
   * as it is and resolves with null.
   */
  async updateRewriteConfig(
    update: (current: Readonly<RewriteConfig>) => RewriteConfig | null
  ): Promise<Readonly<RewriteConfig> | null> {
    const next = await this.writeLock.runExclusive(async () => {
      const previous = this.rewriteConfig;
      const config = update(previous);
      if (!config) {
        return null;
      }
      this.rewriteConfig = freezeRewrite(config);
      if (!rewriteRulesEqual(previous.rules, this.rewriteConfig.rules)) {
        await this.persistRules(this.rewriteConfig.rules);
      }
      return this.rewriteConfig;
    });
    if (next) {
      this.emit('rewrite');
    }
    return next;
  }

  /**
   * Subscribe to config replacements, returns an unsubscribe function
   */
  onChange(listener: ConfigChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(kind: ConfigKind): void {
    for (const listener of this.listeners) {
      listener(kind);
    }
  }

  private async loadPersistedRules(): Promise<RewriteRule[]> {
    try {
      const stored = await this.storage.get(REWRITE_RULES_KEY);
      return stored === null ? [] : decodeRewriteRules(stored);
    } catch (error) {
      this.reportError(error, 'Failed to load rewrite rules');
      return [];
    }
  }

  private async persistRules(rules: readonly RewriteRule[]): Promise<void> {
    try {
      if (rules.length === 0) {
        await this.storage.delete(REWRITE_RULES_KEY);
        return;
      }
      await this.storage.set(REWRITE_RULES_KEY, encodeRewriteRules(rules));
    } catch (error) {
      this.reportError(error, 'Failed to persist rewrite rules');
    }
  }

  private reportError(error: unknown, context: string): void {
    const message = error instanceof Error ? error.message : String(error);
    this.options.onError?.(new Error(`${context}: ${message}`));
  }
}

function freezeDelay(config: DelayConfig): Readonly<DelayConfig> {
  return Object.freeze({
    ...config,
    urlPatterns: Object.freeze([...config.urlPatterns]),
    httpMethods: Object.freeze([...config.httpMethods]),
  });
}

function freezeFailure(config: FailureConfig): Readonly<FailureConfig> {
  return Object.freeze({
    ...config,
    failureKind: Object.freeze({ ...config.failureKind }),
    urlPatterns: Object.freeze([...config.urlPatterns]),
    httpMethods: Object.freeze([...config.httpMethods]),
    candidateStatusCodes: Object.freeze([...config.candidateStatusCodes]),
  });
}

function freezeRewrite(config: RewriteConfig): Readonly<RewriteConfig> {
  return Object.freeze({
    enabled: config.enabled,
    rules: Object.freeze(config.rules.map((rule) => Object.freeze({ ...rule }))),
  });
}
