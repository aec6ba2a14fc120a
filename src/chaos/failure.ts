/**
 * Network failure injection
 */

import type { RandomSource, RequestDescriptor } from '../types/index.js';
import { matchesRequestFilter } from './filter.js';
import { defaultRandom, pickRandom } from './random.js';

export const NETWORK_ERROR_DOMAIN = 'faultline.network';

export type FailureKind =
  | { type: 'timeout' }
  | { type: 'connectionLost' }
  | { type: 'offline' }
  | { type: 'hostNotFound' }
  | { type: 'dnsFailure' }
  | { type: 'httpError'; statusCode?: number }
  | { type: 'sslFailure' }
  | { type: 'cancelled' }
  | { type: 'custom'; domain: string; code: number; message: string };

export type FailureKindType = FailureKind['type'];

export const FAILURE_KIND_TYPES: readonly FailureKindType[] = [
  'timeout',
  'connectionLost',
  'offline',
  'hostNotFound',
  'dnsFailure',
  'httpError',
  'sslFailure',
  'cancelled',
  'custom',
];

export interface FailureConfig {
  enabled: boolean;
  /** Probability in [0, 1] that a matching request fails */
  failureRate: number;
  failureKind: FailureKind;
  /** URL patterns to match (empty means all URLs) */
  urlPatterns: readonly string[];
  /** HTTP methods to fail (empty means all methods) */
  httpMethods: readonly string[];
  /** Status codes drawn from when an httpError kind has no explicit code */
  candidateStatusCodes: readonly number[];
}

export const DEFAULT_CANDIDATE_STATUS_CODES: readonly number[] = Object.freeze([
  400, 401, 403, 404, 500, 502, 503,
]);

/**
 * Build a failure config from defaults and overrides. The rate is clamped into [0, 1].
 */
export function createFailureConfig(overrides: Partial<FailureConfig> = {}): FailureConfig {
  const rate = overrides.failureRate ?? 0.5;
  return {
    enabled: overrides.enabled ?? false,
    failureRate: Number.isNaN(rate) ? 0 : Math.max(0, Math.min(1, rate)),
    failureKind: overrides.failureKind ?? { type: 'timeout' },
    urlPatterns: [...(overrides.urlPatterns ?? [])],
    httpMethods: [...(overrides.httpMethods ?? [])],
    candidateStatusCodes: [...(overrides.candidateStatusCodes ?? DEFAULT_CANDIDATE_STATUS_CODES)],
  };
}

/**
 * Whether a request qualifies and the random draw lands inside the failure rate
 */
export function shouldInjectFailure(
  config: FailureConfig,
  request: RequestDescriptor,
  random: RandomSource = defaultRandom
): boolean {
  if (!config.enabled) return false;
  if (!matchesRequestFilter(config, request)) return false;
  return random() <= config.failureRate;
}

/**
 * Status code for an httpError kind: the configured one, else a random candidate.
 * Returns undefined for every other kind.
 */
export function resolveStatusCode(
  config: FailureConfig,
  random: RandomSource = defaultRandom
): number | undefined {
  const kind = config.failureKind;
  if (kind.type !== 'httpError') return undefined;
  if (kind.statusCode !== undefined) return kind.statusCode;
  return pickRandom(config.candidateStatusCodes, random) ?? 500;
}

/**
 * Error surfaced in place of a real response
 */
export class NetworkFailureError extends Error {
  readonly domain: string;
  readonly code: number;
  readonly kind: FailureKind;
  readonly statusCode?: number;

  constructor(kind: FailureKind, domain: string, code: number, message: string, statusCode?: number) {
    super(message);
    this.name = 'NetworkFailureError';
    this.kind = kind;
    this.domain = domain;
    this.code = code;
    this.statusCode = statusCode;
  }

  toJSON(): { domain: string; code: number; message: string; statusCode?: number } {
    return {
      domain: this.domain,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

const CANONICAL_ERRORS: Record<Exclude<FailureKindType, 'custom'>, { code: number; message: string }> = {
  timeout: { code: -1001, message: 'The request timed out.' },
  connectionLost: { code: -1005, message: 'The network connection was lost.' },
  offline: { code: -1009, message: 'The Internet connection appears to be offline.' },
  hostNotFound: { code: -1003, message: 'A server with the specified hostname could not be found.' },
  dnsFailure: { code: -1006, message: 'The DNS lookup failed.' },
  httpError: { code: -1011, message: 'The server responded with an error.' },
  sslFailure: { code: -1200, message: 'A secure connection could not be established.' },
  cancelled: { code: -999, message: 'The request was cancelled.' },
};

export function failureToError(kind: FailureKind, statusCode?: number): NetworkFailureError {
  if (kind.type === 'custom') {
    return new NetworkFailureError(kind, kind.domain, kind.code, kind.message, statusCode);
  }
  const { code, message } = CANONICAL_ERRORS[kind.type];
  return new NetworkFailureError(kind, NETWORK_ERROR_DOMAIN, code, message, statusCode);
}

/**
 * Build a failure kind from its flat description (config files, admin API)
 */
export function parseFailureKind(input: {
  kind?: string;
  statusCode?: number;
  domain?: string;
  code?: number;
  message?: string;
}): FailureKind | null {
  switch (input.kind ?? 'timeout') {
    case 'timeout':
      return { type: 'timeout' };
    case 'connectionLost':
      return { type: 'connectionLost' };
    case 'offline':
      return { type: 'offline' };
    case 'hostNotFound':
      return { type: 'hostNotFound' };
    case 'dnsFailure':
      return { type: 'dnsFailure' };
    case 'httpError':
      return { type: 'httpError', statusCode: input.statusCode };
    case 'sslFailure':
      return { type: 'sslFailure' };
    case 'cancelled':
      return { type: 'cancelled' };
    case 'custom':
      return {
        type: 'custom',
        domain: input.domain ?? NETWORK_ERROR_DOMAIN,
        code: input.code ?? -1,
        message: input.message ?? 'Injected failure',
      };
    default:
      return null;
  }
}

/**
 * Standard HTTP status text
 */
export function getStatusText(status: number): string {
  const statusTexts: Record<number, string> = {
    200: 'OK',
    201: 'Created',
    202: 'Accepted',
    204: 'No Content',
    301: 'Moved Permanently',
    302: 'Found',
    304: 'Not Modified',
    400: 'Bad Request',
    401: 'Unauthorized',
    403: 'Forbidden',
    404: 'Not Found',
    408: 'Request Timeout',
    429: 'Too Many Requests',
    500: 'Internal Server Error',
    502: 'Bad Gateway',
    503: 'Service Unavailable',
    504: 'Gateway Timeout',
  };
  return statusTexts[status] ?? 'Error';
}
