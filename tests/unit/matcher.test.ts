import { describe, it, expect } from 'vitest';
import { parseUrlPattern, matchUrl, matchesAnyUrl, matchQueryItems } from '../../src/core/matcher.js';

describe('parseUrlPattern', () => {
  it('should return null for an empty pattern', () => {
    expect(parseUrlPattern('')).toBeNull();
  });

  it('should split base and query items', () => {
    expect(parseUrlPattern('https://api.com/users?page=1&sort')).toEqual({
      basePattern: 'https://api.com/users',
      queryItems: [
        { namePattern: 'page', valuePattern: '1', hasExplicitValue: true },
        { namePattern: 'sort', hasExplicitValue: false },
      ],
      hasQuery: true,
    });
  });

  it('should read a ? followed by a path as a wildcard', () => {
    expect(parseUrlPattern('/api/v?/users')).toEqual({
      basePattern: '/api/v?/users',
      queryItems: [],
      hasQuery: false,
    });
  });

  it('should read a trailing ? as a wildcard', () => {
    expect(parseUrlPattern('/items?')).toEqual({ basePattern: '/items?', queryItems: [], hasQuery: false });
  });

  it('should find the query after a wildcard ?', () => {
    const parsed = parseUrlPattern('/api/v?/users?id=7');

    expect(parsed?.basePattern).toBe('/api/v?/users');
    expect(parsed?.queryItems).toEqual([{ namePattern: 'id', valuePattern: '7', hasExplicitValue: true }]);
  });

  it('should percent-decode query items', () => {
    expect(parseUrlPattern('/search?q=a%20b')?.queryItems).toEqual([
      { namePattern: 'q', valuePattern: 'a b', hasExplicitValue: true },
    ]);
  });

  it('should keep malformed escapes as written', () => {
    expect(parseUrlPattern('/search?q%zz')?.queryItems).toEqual([{ namePattern: 'q%zz', hasExplicitValue: false }]);
  });

  it('should drop the fragment', () => {
    expect(parseUrlPattern('/path#section?x=1')).toEqual({ basePattern: '/path', queryItems: [], hasQuery: false });
  });

  it('should use * as the base of a query-only pattern', () => {
    expect(parseUrlPattern('?debug')).toEqual({
      basePattern: '*',
      queryItems: [{ namePattern: 'debug', hasExplicitValue: false }],
      hasQuery: true,
    });
  });
});

describe('matchUrl', () => {
  const url = 'https://api.com/users?page=1&sort=asc';

  describe('subset query strategy', () => {
    it('should match when every pattern item finds a URL item', () => {
      expect(matchUrl(url, '*/users?page=1')).toBe(true);
      expect(matchUrl(url, '*/users?sort=asc&page=1')).toBe(true);
    });

    it('should fail when a pattern item is missing', () => {
      expect(matchUrl('https://api.com/users?sort=asc', '*/users?page=1')).toBe(false);
    });

    it('should accept any value for a key-only item', () => {
      expect(matchUrl('https://api.com/users?sort=desc', '*/users?sort')).toBe(true);
      expect(matchUrl('https://api.com/users?page=1', '*/users?sort')).toBe(false);
    });

    it('should match values with wildcards', () => {
      expect(matchUrl('https://api.com/search?q=foobar', '*/search?q=foo*')).toBe(true);
      expect(matchUrl('https://api.com/search?q=barfoo', '*/search?q=foo*')).toBe(false);
    });
  });

  describe('exact query strategy', () => {
    it('should require the same number of items', () => {
      expect(matchUrl(url, '*/users?page=1', { queryStrategy: 'exact' })).toBe(false);
      expect(matchUrl(url, '*/users?sort=asc&page=1', { queryStrategy: 'exact' })).toBe(true);
    });

    it('should treat repeated items as a multiset', () => {
      expect(matchUrl('https://x.com/a?tag=1&tag=2', '*/a?tag=1&tag=1', { queryStrategy: 'exact' })).toBe(false);
      expect(matchUrl('https://x.com/a?tag=1&tag=1', '*/a?tag=1&tag=1', { queryStrategy: 'exact' })).toBe(true);
    });

    it('should backtrack when a greedy assignment fails', () => {
      expect(matchUrl('https://x.com/a?tag=1&tag=2', '*/a?tag=*&tag=1', { queryStrategy: 'exact' })).toBe(true);
    });
  });

  describe('ignore query strategy', () => {
    it('should skip query items entirely', () => {
      expect(matchUrl('https://api.com/users?page=1', '*/users?page=2', { queryStrategy: 'ignore' })).toBe(true);
    });

    it('should strip the URL query for patterns without one', () => {
      expect(
        matchUrl('https://api.com/users?page=1', 'https://api.com/users', { strategy: 'full', queryStrategy: 'ignore' })
      ).toBe(true);
    });
  });

  it('should compare the whole URL for patterns without a query', () => {
    expect(matchUrl('https://api.com/users?page=1', 'https://api.com/users', { strategy: 'full' })).toBe(false);
    expect(matchUrl('https://api.com/users?page=1', 'https://api.com/users*', { strategy: 'full' })).toBe(true);
  });

  it('should compare the base without the query for patterns with one', () => {
    expect(matchUrl(url, 'https://api.com/users?page=1', { strategy: 'full' })).toBe(true);
  });

  it('should ignore URL fragments', () => {
    expect(
      matchUrl('https://api.com/users?page=1#top', 'https://api.com/users?page=1', {
        strategy: 'full',
        queryStrategy: 'exact',
      })
    ).toBe(true);
  });

  it('should match a ? wildcard in the path', () => {
    expect(matchUrl('https://api.com/api/v2/users', '*/api/v?/users', { strategy: 'full' })).toBe(true);
  });

  it('should decode + in URL query values', () => {
    expect(matchUrl('https://api.com/search?q=a+b', '*/search?q=a%20b')).toBe(true);
  });

  it('should match a query with no items once the base matches', () => {
    expect(matchUrl('https://api.com/users?anything=1', '*/users?&', { queryStrategy: 'exact' })).toBe(true);
  });

  it('should ignore case unless told otherwise', () => {
    expect(matchUrl('https://API.com/Users?Page=1', '*/users?page=1')).toBe(true);
    expect(matchUrl('https://API.com/Users?Page=1', '*/users?page=1', { caseInsensitive: false })).toBe(false);
  });

  it('should fall back to plain wildcard matching for an empty pattern', () => {
    expect(matchUrl('https://api.com', '')).toBe(true);
    expect(matchUrl('https://api.com', '', { strategy: 'full' })).toBe(false);
  });
});

describe('matchesAnyUrl', () => {
  it('should match when any pattern matches', () => {
    expect(matchesAnyUrl('https://api.com/users?page=1', ['*/posts', '*/users?page=1'])).toBe(true);
    expect(matchesAnyUrl('https://api.com/users?page=1', ['*/posts', '*/users?page=2'])).toBe(false);
    expect(matchesAnyUrl('https://api.com/users', [])).toBe(false);
  });
});

describe('matchQueryItems', () => {
  const item = { namePattern: 'a', valuePattern: '1', hasExplicitValue: true };

  it('should handle empty pattern lists', () => {
    expect(matchQueryItems([], [], true)).toBe(true);
    expect(matchQueryItems([], [{ name: 'a', value: '1' }], true)).toBe(false);
    expect(matchQueryItems([], [{ name: 'a', value: '1' }], false)).toBe(true);
  });

  it('should not reuse a URL item for two pattern items', () => {
    expect(matchQueryItems([item, item], [{ name: 'a', value: '1' }], false)).toBe(false);
    expect(
      matchQueryItems(
        [item, item],
        [
          { name: 'a', value: '1' },
          { name: 'a', value: '1' },
        ],
        false
      )
    ).toBe(true);
  });
});
