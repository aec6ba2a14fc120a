/**
 * Response body rewriting
 */

import { matchUrl } from '../core/matcher.js';

export interface RewriteRule {
  /** URL pattern, `*` and `?` wildcards plus optional query items */
  urlPattern: string;
  /** Replacement response body */
  responseBody: string;
  /** Status code override in [100, 599] */
  responseStatusCode?: number;
}

export interface RewriteConfig {
  enabled: boolean;
  /** Ordered rules, first match wins */
  rules: readonly RewriteRule[];
}

export interface RewriteRuleInput {
  urlPattern?: unknown;
  responseBody?: unknown;
  responseStatusCode?: unknown;
}

export type RewriteRuleValidation =
  | { valid: true; rule: RewriteRule }
  | { valid: false; errors: string[] };

export function createRewriteConfig(overrides: Partial<RewriteConfig> = {}): RewriteConfig {
  return {
    enabled: overrides.enabled ?? false,
    rules: (overrides.rules ?? []).map((rule) => ({ ...rule })),
  };
}

/**
 * First rule whose pattern fully matches the URL, query items included exactly
 */
export function findRewriteRule(config: RewriteConfig, url: string | undefined): RewriteRule | null {
  if (!config.enabled || !url) return null;

  const rule = config.rules.find((candidate) =>
    matchUrl(url, candidate.urlPattern, { strategy: 'full', queryStrategy: 'exact' })
  );
  return rule ?? null;
}

export function rewriteRuleEquals(a: RewriteRule, b: RewriteRule): boolean {
  return (
    a.urlPattern === b.urlPattern &&
    a.responseBody === b.responseBody &&
    a.responseStatusCode === b.responseStatusCode
  );
}

export function rewriteRulesEqual(a: readonly RewriteRule[], b: readonly RewriteRule[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((rule, index) => rewriteRuleEquals(rule, b[index]));
}

/**
 * Validate a rule submitted by an editing surface
 */
export function validateRewriteRule(input: RewriteRuleInput): RewriteRuleValidation {
  const errors: string[] = [];

  const urlPattern = typeof input.urlPattern === 'string' ? input.urlPattern.trim() : '';
  if (urlPattern.length === 0) {
    errors.push('URL pattern cannot be empty');
  }

  let responseBody = '';
  if (input.responseBody !== undefined && input.responseBody !== null) {
    if (typeof input.responseBody === 'string') {
      responseBody = input.responseBody;
    } else {
      errors.push('Response body must be a string');
    }
  }

  let responseStatusCode: number | undefined;
  const rawStatus = input.responseStatusCode;
  if (rawStatus !== undefined && rawStatus !== null && rawStatus !== '') {
    const status = typeof rawStatus === 'string' ? parseStrictInt(rawStatus.trim()) : rawStatus;
    if (typeof status !== 'number' || !Number.isInteger(status)) {
      errors.push('Status code must be an integer');
    } else if (status < 100 || status > 599) {
      errors.push('Status code must be between 100 and 599');
    } else {
      responseStatusCode = status;
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  const rule: RewriteRule = { urlPattern, responseBody };
  if (responseStatusCode !== undefined) {
    rule.responseStatusCode = responseStatusCode;
  }
  return { valid: true, rule };
}

/**
 * Status to answer with for a rewritten response. Informational codes cannot
 * end an exchange, so they are served as 200.
 */
export function finalStatusCode(status: number): number {
  return status >= 200 && status <= 599 ? status : 200;
}

function parseStrictInt(value: string): number | undefined {
  return /^-?\d+$/.test(value) ? parseInt(value, 10) : undefined;
}

interface StoredRewriteRule {
  urlPattern: string;
  responseBody: string;
  responseStatusCode: number | null;
}

/**
 * Serialize rules for durable storage
 */
export function encodeRewriteRules(rules: readonly RewriteRule[]): string {
  const stored: StoredRewriteRule[] = rules.map((rule) => ({
    urlPattern: rule.urlPattern,
    responseBody: rule.responseBody,
    responseStatusCode: rule.responseStatusCode ?? null,
  }));
  return JSON.stringify(stored);
}

/**
 * Parse rules read from durable storage. Throws on malformed input.
 */
export function decodeRewriteRules(text: string): RewriteRule[] {
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) {
    throw new Error('Stored rewrite rules must be an array');
  }

  return parsed.map((item: unknown, index) => {
    if (typeof item !== 'object' || item === null) {
      throw new Error(`Stored rewrite rule ${index} must be an object`);
    }
    const urlPattern = 'urlPattern' in item ? item.urlPattern : undefined;
    const responseBody = 'responseBody' in item ? item.responseBody : undefined;
    const responseStatusCode = 'responseStatusCode' in item ? item.responseStatusCode : undefined;
    if (typeof urlPattern !== 'string' || typeof responseBody !== 'string') {
      throw new Error(`Stored rewrite rule ${index} is missing urlPattern or responseBody`);
    }
    if (responseStatusCode !== undefined && responseStatusCode !== null && typeof responseStatusCode !== 'number') {
      throw new Error(`Stored rewrite rule ${index} has an invalid status code`);
    }

    const rule: RewriteRule = { urlPattern, responseBody };
    if (typeof responseStatusCode === 'number') {
      rule.responseStatusCode = responseStatusCode;
    }
    return rule;
  });
}
