/**
 * Request delay injection
 */

import type { RandomSource, RequestDescriptor } from '../types/index.js';
import { matchesRequestFilter } from './filter.js';
import { defaultRandom, randomInRange } from './random.js';

export interface DelayConfig {
  enabled: boolean;
  /** Fixed delay in milliseconds; wins over the random range when set */
  fixedDelay?: number;
  /** Lower bound of the random range in milliseconds */
  minDelay: number;
  /** Upper bound of the random range in milliseconds */
  maxDelay: number;
  /** URL patterns to match (empty means all URLs) */
  urlPatterns: readonly string[];
  /** HTTP methods to delay (empty means all methods) */
  httpMethods: readonly string[];
}

export const DEFAULT_DELAY_CONFIG: Readonly<DelayConfig> = Object.freeze({
  enabled: false,
  fixedDelay: undefined,
  minDelay: 1000,
  maxDelay: 3000,
  urlPatterns: [],
  httpMethods: [],
});

/**
 * Build a delay config from defaults and overrides
 */
export function createDelayConfig(overrides: Partial<DelayConfig> = {}): DelayConfig {
  const config: DelayConfig = {
    enabled: overrides.enabled ?? DEFAULT_DELAY_CONFIG.enabled,
    fixedDelay: overrides.fixedDelay,
    minDelay: overrides.minDelay ?? DEFAULT_DELAY_CONFIG.minDelay,
    maxDelay: overrides.maxDelay ?? DEFAULT_DELAY_CONFIG.maxDelay,
    urlPatterns: [...(overrides.urlPatterns ?? DEFAULT_DELAY_CONFIG.urlPatterns)],
    httpMethods: [...(overrides.httpMethods ?? DEFAULT_DELAY_CONFIG.httpMethods)],
  };

  if (config.fixedDelay !== undefined && config.fixedDelay < 0) {
    throw new Error('Delay fixedDelay must be >= 0');
  }
  if (config.minDelay < 0) {
    throw new Error('Delay minDelay must be >= 0');
  }
  if (config.minDelay > config.maxDelay) {
    throw new Error('Delay minDelay must be less than or equal to maxDelay');
  }

  return config;
}

/**
 * Delay to apply in milliseconds
 */
export function getDelay(config: DelayConfig, random: RandomSource = defaultRandom): number {
  if (config.fixedDelay !== undefined) {
    return config.fixedDelay;
  }
  return randomInRange(config.minDelay, config.maxDelay, random);
}

export function shouldApplyDelay(config: DelayConfig, request: RequestDescriptor): boolean {
  if (!config.enabled) return false;
  return matchesRequestFilter(config, request);
}

/**
 * Suspend the caller for the given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
