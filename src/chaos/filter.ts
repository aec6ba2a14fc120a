import type { RequestDescriptor } from '../types/index.js';
import { matchesAnyUrl } from '../core/matcher.js';

export interface RequestFilter {
  /** URL wildcard patterns (empty means all URLs) */
  urlPatterns: readonly string[];
  /** HTTP methods (empty means all methods) */
  httpMethods: readonly string[];
}

/**
 * Check a request against URL and method filters.
 * URLs use substring base matching and subset query matching.
 */
export function matchesRequestFilter(filter: RequestFilter, request: RequestDescriptor): boolean {
  if (filter.urlPatterns.length > 0) {
    if (!request.url) return false;
    const matches = matchesAnyUrl(request.url, filter.urlPatterns, {
      strategy: 'contains',
      queryStrategy: 'subset',
    });
    if (!matches) return false;
  }

  if (filter.httpMethods.length > 0) {
    if (!request.method) return false;
    const method = request.method.toUpperCase();
    if (!filter.httpMethods.some((m) => m.toUpperCase() === method)) return false;
  }

  return true;
}
