import type { MatchStrategy, QueryMatchStrategy } from '../types/index.js';
import { matchesWildcard } from './wildcard.js';

export interface QueryItemPattern {
  namePattern: string;
  valuePattern?: string;
  /** False for a bare `key` token: the key must be present, any value */
  hasExplicitValue: boolean;
}

export interface ParsedUrlPattern {
  basePattern: string;
  queryItems: QueryItemPattern[];
  hasQuery: boolean;
}

export interface UrlMatchOptions {
  strategy?: MatchStrategy;
  queryStrategy?: QueryMatchStrategy;
  caseInsensitive?: boolean;
}

export interface UrlQueryItem {
  name: string;
  value: string;
}

/**
 * Split a URL pattern into its base part and its query item patterns.
 * Returns null for an empty pattern.
 */
export function parseUrlPattern(pattern: string): ParsedUrlPattern | null {
  if (pattern.length === 0) return null;

  const withoutFragment = stripFragment(pattern);
  const queryIndex = findQueryDelimiter(withoutFragment);

  if (queryIndex === -1) {
    return {
      basePattern: withoutFragment.length > 0 ? withoutFragment : '*',
      queryItems: [],
      hasQuery: false,
    };
  }

  const base = withoutFragment.slice(0, queryIndex);
  return {
    basePattern: base.length > 0 ? base : '*',
    queryItems: parseQueryItems(withoutFragment.slice(queryIndex + 1)),
    hasQuery: true,
  };
}

/**
 * Find the `?` that starts the query string, skipping `?` wildcards in the
 * path. A candidate counts when the text up to the next `?` holds `=` or `&`,
 * or is non-empty and free of `/`.
 */
function findQueryDelimiter(pattern: string): number {
  let searchFrom = 0;

  while (searchFrom < pattern.length) {
    const questionIndex = pattern.indexOf('?', searchFrom);
    if (questionIndex === -1) return -1;

    const segmentStart = questionIndex + 1;
    const nextQuestion = pattern.indexOf('?', segmentStart);
    const segment = pattern.slice(segmentStart, nextQuestion === -1 ? pattern.length : nextQuestion);

    const looksLikePairs = segment.includes('=') || segment.includes('&');
    const looksLikeKeyOnly = segment.length > 0 && !segment.includes('/');
    if (looksLikePairs || looksLikeKeyOnly) {
      return questionIndex;
    }

    searchFrom = segmentStart;
  }

  return -1;
}

function parseQueryItems(query: string): QueryItemPattern[] {
  return query
    .split('&')
    .filter((token) => token.length > 0)
    .map((token) => {
      const equalIndex = token.indexOf('=');
      if (equalIndex === -1) {
        return { namePattern: percentDecode(token), hasExplicitValue: false };
      }
      return {
        namePattern: percentDecode(token.slice(0, equalIndex)),
        valuePattern: percentDecode(token.slice(equalIndex + 1)),
        hasExplicitValue: true,
      };
    });
}

function percentDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Malformed escapes stay as written
    return value;
  }
}

function stripFragment(value: string): string {
  const hashIndex = value.indexOf('#');
  return hashIndex === -1 ? value : value.slice(0, hashIndex);
}

function stripQuery(value: string): string {
  const questionIndex = value.indexOf('?');
  return questionIndex === -1 ? value : value.slice(0, questionIndex);
}

function urlQueryItems(url: string): UrlQueryItem[] {
  const withoutFragment = stripFragment(url);
  const questionIndex = withoutFragment.indexOf('?');
  if (questionIndex === -1) return [];

  const items: UrlQueryItem[] = [];
  for (const [name, value] of new URLSearchParams(withoutFragment.slice(questionIndex + 1))) {
    items.push({ name, value });
  }
  return items;
}

/**
 * Test a URL against a wildcard pattern that may carry query item patterns.
 *
 * The base part is matched with `strategy`; query items are then assigned one
 * to one to the URL's query items according to `queryStrategy`.
 */
export function matchUrl(url: string, pattern: string, options: UrlMatchOptions = {}): boolean {
  const strategy = options.strategy ?? 'contains';
  const queryStrategy = options.queryStrategy ?? 'subset';
  const caseInsensitive = options.caseInsensitive ?? true;

  const parsed = parseUrlPattern(pattern);
  if (!parsed) {
    return matchesWildcard(url, pattern, strategy, caseInsensitive);
  }

  const withoutFragment = stripFragment(url);

  if (!parsed.hasQuery) {
    const value = queryStrategy === 'ignore' ? stripQuery(withoutFragment) : withoutFragment;
    return matchesWildcard(value, parsed.basePattern, strategy, caseInsensitive);
  }

  if (!matchesWildcard(stripQuery(withoutFragment), parsed.basePattern, strategy, caseInsensitive)) {
    return false;
  }

  if (queryStrategy === 'ignore' || parsed.queryItems.length === 0) {
    return true;
  }

  return matchQueryItems(parsed.queryItems, urlQueryItems(url), queryStrategy === 'exact', caseInsensitive);
}

export function matchesAnyUrl(
  url: string,
  patterns: readonly string[],
  options: UrlMatchOptions = {}
): boolean {
  return patterns.some((pattern) => matchUrl(url, pattern, options));
}

/**
 * Search for a one-to-one assignment of pattern items to URL items.
 * Stops at the first complete assignment.
 */
export function matchQueryItems(
  patternItems: readonly QueryItemPattern[],
  urlItems: readonly UrlQueryItem[],
  requireExact: boolean,
  caseInsensitive = true
): boolean {
  if (requireExact && patternItems.length !== urlItems.length) {
    return false;
  }
  if (patternItems.length === 0) {
    return !requireExact || urlItems.length === 0;
  }

  const used = new Array<boolean>(urlItems.length).fill(false);

  const backtrack = (patternIndex: number): boolean => {
    if (patternIndex === patternItems.length) {
      return !requireExact || used.every(Boolean);
    }

    const patternItem = patternItems[patternIndex];
    for (let urlIndex = 0; urlIndex < urlItems.length; urlIndex++) {
      if (used[urlIndex]) continue;
      if (!queryItemMatches(patternItem, urlItems[urlIndex], caseInsensitive)) continue;

      used[urlIndex] = true;
      if (backtrack(patternIndex + 1)) {
        return true;
      }
      used[urlIndex] = false;
    }
    return false;
  };

  return backtrack(0);
}

function queryItemMatches(pattern: QueryItemPattern, item: UrlQueryItem, caseInsensitive: boolean): boolean {
  if (!matchesWildcard(item.name, pattern.namePattern, 'full', caseInsensitive)) {
    return false;
  }
  if (!pattern.hasExplicitValue) {
    return true;
  }
  return matchesWildcard(item.value, pattern.valuePattern ?? '', 'full', caseInsensitive);
}
