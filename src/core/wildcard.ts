import type { MatchStrategy } from '../types/index.js';

const CACHE_LIMIT = 512;

/**
 * `glob` reads both `*` and `?` as wildcards, `star` only `*`
 */
export type WildcardSyntax = 'glob' | 'star';

/**
 * Compiled form of a wildcard literal.
 *
 * `*` matches any run of characters (including none), `?` matches exactly one
 * character under the `glob` syntax, everything else is literal text.
 */
export class WildcardPattern {
  readonly source: string;
  private readonly body: string;
  private readonly compiled = new Map<string, RegExp>();

  constructor(pattern: string, syntax: WildcardSyntax = 'glob') {
    this.source = pattern;
    const escaped = pattern.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/\\\*/g, '.*');
    this.body = syntax === 'glob' ? escaped.replace(/\\\?/g, '.') : escaped;
  }

  /**
   * Test a value against the pattern
   */
  matches(value: string, strategy: MatchStrategy = 'contains', caseInsensitive = true): boolean {
    return this.regex(strategy, caseInsensitive).test(value);
  }

  private regex(strategy: MatchStrategy, caseInsensitive: boolean): RegExp {
    const key = `${strategy}:${caseInsensitive ? 'i' : ''}`;
    let regex = this.compiled.get(key);
    if (!regex) {
      const source = strategy === 'full' ? `^${this.body}$` : this.body;
      regex = new RegExp(source, caseInsensitive ? 'is' : 's');
      this.compiled.set(key, regex);
    }
    return regex;
  }
}

const patternCache = new Map<string, WildcardPattern>();

/**
 * Compile a wildcard literal, reusing earlier compilations of the same text
 */
export function compileWildcard(pattern: string, syntax: WildcardSyntax = 'glob'): WildcardPattern {
  const key = `${syntax}:${pattern}`;
  let compiled = patternCache.get(key);
  if (!compiled) {
    if (patternCache.size >= CACHE_LIMIT) {
      patternCache.clear();
    }
    compiled = new WildcardPattern(pattern, syntax);
    patternCache.set(key, compiled);
  }
  return compiled;
}

export function matchesWildcard(
  value: string,
  pattern: string,
  strategy: MatchStrategy = 'contains',
  caseInsensitive = true,
  syntax: WildcardSyntax = 'glob'
): boolean {
  return compileWildcard(pattern, syntax).matches(value, strategy, caseInsensitive);
}

export function matchesAnyWildcard(
  value: string,
  patterns: readonly string[],
  strategy: MatchStrategy = 'contains',
  caseInsensitive = true,
  syntax: WildcardSyntax = 'glob'
): boolean {
  return patterns.some((pattern) => matchesWildcard(value, pattern, strategy, caseInsensitive, syntax));
}
