/**
 * Fault Injector - per-request delay, failure and rewrite decisions
 */

import type { RandomSource, RequestDescriptor } from '../types/index.js';
import type { InjectionConfigStore } from '../core/config-store.js';
import { getDelay, shouldApplyDelay, sleep, type DelayConfig } from './latency.js';
import {
  failureToError,
  resolveStatusCode,
  shouldInjectFailure,
  type FailureConfig,
  type FailureKind,
  type NetworkFailureError,
} from './failure.js';
import { findRewriteRule, type RewriteRule } from './rewrite.js';
import { defaultRandom } from './random.js';

export {
  createDelayConfig,
  getDelay,
  shouldApplyDelay,
  sleep,
  DEFAULT_DELAY_CONFIG,
  type DelayConfig,
} from './latency.js';
export {
  createFailureConfig,
  shouldInjectFailure,
  resolveStatusCode,
  failureToError,
  parseFailureKind,
  getStatusText,
  NetworkFailureError,
  NETWORK_ERROR_DOMAIN,
  FAILURE_KIND_TYPES,
  DEFAULT_CANDIDATE_STATUS_CODES,
  type FailureConfig,
  type FailureKind,
  type FailureKindType,
} from './failure.js';
export {
  createRewriteConfig,
  findRewriteRule,
  rewriteRuleEquals,
  rewriteRulesEqual,
  finalStatusCode,
  validateRewriteRule,
  encodeRewriteRules,
  decodeRewriteRules,
  type RewriteRule,
  type RewriteConfig,
  type RewriteRuleInput,
  type RewriteRuleValidation,
} from './rewrite.js';
export { matchesRequestFilter, type RequestFilter } from './filter.js';
export { defaultRandom, randomInRange, pickRandom } from './random.js';

export type FailureDecision =
  | { inject: false }
  | { inject: true; kind: FailureKind; statusCode?: number; error: NetworkFailureError };

export interface FaultInjectorOptions {
  random?: RandomSource;
  /** Suspends the caller; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
  onDelay?: (request: RequestDescriptor, delayMs: number) => void;
  onFailure?: (request: RequestDescriptor, error: NetworkFailureError) => void;
  onRewrite?: (request: RequestDescriptor, rule: RewriteRule) => void;
}

export interface FaultStats {
  requestsProcessed: number;
  delaysApplied: number;
  totalDelayMs: number;
  averageDelayMs: number;
  failuresInjected: number;
  rewritesMatched: number;
}

/**
 * Evaluates each request against the store's current snapshot
 */
export class FaultInjector {
  private readonly random: RandomSource;
  private readonly sleep: (ms: number) => Promise<void>;
  private stats = {
    requestsProcessed: 0,
    delaysApplied: 0,
    totalDelayMs: 0,
    failuresInjected: 0,
    rewritesMatched: 0,
  };

  constructor(
    private readonly store: InjectionConfigStore,
    private readonly options: FaultInjectorOptions = {}
  ) {
    this.random = options.random ?? defaultRandom;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Hold the request for the configured delay. Resolves with the milliseconds
   * waited (0 when no delay applies). Once started the wait runs to the end.
   */
  async applyDelay(request: RequestDescriptor): Promise<number> {
    this.stats.requestsProcessed++;

    const config = this.store.getDelayConfig();
    if (!shouldApplyDelay(config, request)) {
      return 0;
    }

    const delay = getDelay(config, this.random);
    this.stats.delaysApplied++;
    this.stats.totalDelayMs += delay;
    this.options.onDelay?.(request, delay);

    if (delay > 0) {
      await this.sleep(delay);
    }
    return delay;
  }

  /**
   * Draw whether this request fails, and how
   */
  decideFailure(request: RequestDescriptor): FailureDecision {
    const config = this.store.getFailureConfig();
    if (!shouldInjectFailure(config, request, this.random)) {
      return { inject: false };
    }

    const statusCode = resolveStatusCode(config, this.random);
    const error = failureToError(config.failureKind, statusCode);
    this.stats.failuresInjected++;
    this.options.onFailure?.(request, error);

    return { inject: true, kind: config.failureKind, statusCode, error };
  }

  /**
   * First rewrite rule matching the request URL, or null
   */
  matchingRewriteRule(request: RequestDescriptor): RewriteRule | null {
    const rule = findRewriteRule(this.store.getRewriteConfig(), request.url);
    if (rule) {
      this.stats.rewritesMatched++;
      this.options.onRewrite?.(request, rule);
    }
    return rule;
  }

  getStats(): FaultStats {
    return {
      ...this.stats,
      averageDelayMs:
        this.stats.delaysApplied > 0 ? Math.round(this.stats.totalDelayMs / this.stats.delaysApplied) : 0,
    };
  }

  resetStats(): void {
    this.stats = {
      requestsProcessed: 0,
      delaysApplied: 0,
      totalDelayMs: 0,
      failuresInjected: 0,
      rewritesMatched: 0,
    };
  }
}

/**
 * Ready-made configs for common network conditions
 */
export const FaultPresets = {
  /**
   * Slow network (100-500ms)
   */
  slowNetwork(): Partial<DelayConfig> {
    return { enabled: true, minDelay: 100, maxDelay: 500 };
  },

  /**
   * Very slow network (500-2000ms)
   */
  verySlowNetwork(): Partial<DelayConfig> {
    return { enabled: true, minDelay: 500, maxDelay: 2000 };
  },

  /**
   * Every request fails as if the device were offline
   */
  offline(): Partial<FailureConfig> {
    return { enabled: true, failureRate: 1, failureKind: { type: 'offline' } };
  },

  /**
   * One in ten requests loses its connection
   */
  flaky(): Partial<FailureConfig> {
    return { enabled: true, failureRate: 0.1, failureKind: { type: 'connectionLost' } };
  },

  /**
   * A fifth of requests get a random HTTP error status
   */
  serverErrors(): Partial<FailureConfig> {
    return {
      enabled: true,
      failureRate: 0.2,
      failureKind: { type: 'httpError' },
      candidateStatusCodes: [500, 502, 503],
    };
  },
};
