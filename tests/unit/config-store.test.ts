import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rm } from 'node:fs/promises';
import { InjectionConfigStore, REWRITE_RULES_KEY, type ConfigKind } from '../../src/core/config-store.js';
import { Mutex } from '../../src/core/mutex.js';
import { MemoryStorage } from '../../src/storage/memory.adapter.js';
import { LowDBStorage } from '../../src/storage/lowdb.adapter.js';
import { SQLiteStorage } from '../../src/storage/sqlite.adapter.js';
import { createDelayConfig } from '../../src/chaos/latency.js';
import { createFailureConfig } from '../../src/chaos/failure.js';
import { encodeRewriteRules, type RewriteRule } from '../../src/chaos/rewrite.js';

const TEST_DIR = './test-config-store';

class CountingStorage extends MemoryStorage {
  writes = 0;
  deletes = 0;

  async set(key: string, value: string): Promise<void> {
    this.writes++;
    await super.set(key, value);
  }

  async delete(key: string): Promise<boolean> {
    this.deletes++;
    return super.delete(key);
  }
}

class SlowStorage extends MemoryStorage {
  async set(key: string, value: string): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, 20));
    await super.set(key, value);
  }
}

class BrokenStorage extends MemoryStorage {
  async set(): Promise<void> {
    throw new Error('disk full');
  }
}

const users: RewriteRule = { urlPattern: 'https://api.test/users', responseBody: '[]', responseStatusCode: 200 };
const posts: RewriteRule = { urlPattern: 'https://api.test/posts', responseBody: '{}' };

describe('Mutex', () => {
  it('should run tasks one at a time in order', async () => {
    const mutex = new Mutex();
    const log: string[] = [];
    const task = (name: string) => async () => {
      log.push(`${name}:start`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      log.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([mutex.runExclusive(task('a')), mutex.runExclusive(task('b'))]);

    expect(results).toEqual(['a', 'b']);
    expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(mutex.isLocked()).toBe(false);
  });

  it('should keep going after a task fails', async () => {
    const mutex = new Mutex();
    const failed = mutex.runExclusive(() => {
      throw new Error('task failed');
    });

    await expect(failed).rejects.toThrow('task failed');
    await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
  });
});

describe('InjectionConfigStore', () => {
  describe('init', () => {
    it('should load persisted rules with rewriting disabled', async () => {
      const storage = new MemoryStorage({ [REWRITE_RULES_KEY]: encodeRewriteRules([users, posts]) });
      const store = new InjectionConfigStore(storage);

      await store.init();

      expect(store.isInitialized()).toBe(true);
      expect(store.getRewriteConfig()).toEqual({ enabled: false, rules: [users, posts] });
    });

    it('should start empty and report unreadable rules', async () => {
      const errors: string[] = [];
      const storage = new MemoryStorage({ [REWRITE_RULES_KEY]: 'not json' });
      const store = new InjectionConfigStore(storage, { onError: (error) => errors.push(error.message) });

      await store.init();

      expect(store.getRewriteConfig().rules).toEqual([]);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatch(/^Failed to load rewrite rules: /);
    });
  });

  describe('delay and failure configs', () => {
    let store: InjectionConfigStore;

    beforeEach(async () => {
      store = new InjectionConfigStore(new MemoryStorage());
      await store.init();
    });

    it('should start from defaults', () => {
      expect(store.getDelayConfig()).toEqual(createDelayConfig());
      expect(store.getFailureConfig()).toEqual(createFailureConfig());
    });

    it('should hand out frozen snapshots', () => {
      const before = store.getDelayConfig();
      store.setDelayConfig(createDelayConfig({ enabled: true, fixedDelay: 50 }));

      expect(Object.isFrozen(before)).toBe(true);
      expect(Object.isFrozen(store.getDelayConfig().urlPatterns)).toBe(true);
      expect(before.enabled).toBe(false);
      expect(store.getDelayConfig().fixedDelay).toBe(50);
    });

    it('should not keep a reference to the caller config', () => {
      const config = createDelayConfig({ enabled: true, urlPatterns: ['*/a'] });
      store.setDelayConfig(config);
      config.enabled = false;

      expect(store.getDelayConfig().enabled).toBe(true);
    });

    it('should reject an invalid delay config and keep the previous one', () => {
      expect(() => store.setDelayConfig({ ...createDelayConfig(), minDelay: 10, maxDelay: 5 })).toThrow(
        'Delay minDelay must be less than or equal to maxDelay'
      );
      expect(store.getDelayConfig().minDelay).toBe(1000);
    });

    it('should clamp the failure rate', () => {
      store.setFailureConfig({ ...createFailureConfig(), failureRate: 2 });

      expect(store.getFailureConfig().failureRate).toBe(1);
    });

    it('should notify listeners until they unsubscribe', async () => {
      const seen: ConfigKind[] = [];
      const unsubscribe = store.onChange((kind) => seen.push(kind));

      store.setDelayConfig(createDelayConfig());
      store.setFailureConfig(createFailureConfig());
      await store.setRewriteConfig({ enabled: true, rules: [] });
      unsubscribe();
      store.setDelayConfig(createDelayConfig());

      expect(seen).toEqual(['delay', 'failure', 'rewrite']);
    });
  });

  describe('rewrite persistence', () => {
    it('should persist changed rules', async () => {
      const storage = new CountingStorage();
      const store = new InjectionConfigStore(storage);
      await store.init();

      await store.setRewriteConfig({ enabled: true, rules: [users] });

      expect(await storage.get(REWRITE_RULES_KEY)).toBe(encodeRewriteRules([users]));
      expect(storage.writes).toBe(1);
    });

    it('should not write when only the enabled flag changes', async () => {
      const storage = new CountingStorage();
      const store = new InjectionConfigStore(storage);
      await store.init();
      await store.setRewriteConfig({ enabled: false, rules: [users] });

      await store.setRewriteConfig({ enabled: true, rules: [{ ...users }] });

      expect(storage.writes).toBe(1);
      expect(store.getRewriteConfig().enabled).toBe(true);
    });

    it('should delete the key when the rules become empty', async () => {
      const storage = new CountingStorage({ [REWRITE_RULES_KEY]: encodeRewriteRules([users]) });
      const store = new InjectionConfigStore(storage);
      await store.init();

      await store.setRewriteConfig({ enabled: false, rules: [] });

      expect(await storage.get(REWRITE_RULES_KEY)).toBeNull();
      expect(storage.deletes).toBe(1);
    });

    it('should apply writes in call order', async () => {
      const storage = new MemoryStorage();
      const store = new InjectionConfigStore(storage);
      await store.init();

      await Promise.all([
        store.setRewriteConfig({ enabled: true, rules: [users] }),
        store.setRewriteConfig({ enabled: true, rules: [posts] }),
      ]);

      expect(store.getRewriteConfig().rules).toEqual([posts]);
      expect(await storage.get(REWRITE_RULES_KEY)).toBe(encodeRewriteRules([posts]));
    });

    it('should apply every update while earlier writes are still persisting', async () => {
      const storage = new SlowStorage();
      const store = new InjectionConfigStore(storage);
      await store.init();
      const append = (rule: RewriteRule) =>
        store.updateRewriteConfig((current) => ({ enabled: current.enabled, rules: [...current.rules, rule] }));

      await Promise.all([append(users), append(posts), append({ ...users, responseBody: 'third' })]);

      const expected = [users, posts, { ...users, responseBody: 'third' }];
      expect(store.getRewriteConfig().rules).toEqual(expected);
      expect(await storage.get(REWRITE_RULES_KEY)).toBe(encodeRewriteRules(expected));
    });

    it('should leave the config alone when the updater returns null', async () => {
      const storage = new CountingStorage();
      const store = new InjectionConfigStore(storage);
      await store.init();
      const seen: ConfigKind[] = [];
      store.onChange((kind) => seen.push(kind));

      const result = await store.updateRewriteConfig(() => null);

      expect(result).toBeNull();
      expect(store.getRewriteConfig()).toEqual({ enabled: false, rules: [] });
      expect(storage.writes).toBe(0);
      expect(seen).toEqual([]);
    });

    it('should resolve with the snapshot it wrote', async () => {
      const store = new InjectionConfigStore(new MemoryStorage());
      await store.init();

      const result = await store.updateRewriteConfig(() => ({ enabled: true, rules: [posts] }));

      expect(result).toEqual({ enabled: true, rules: [posts] });
      expect(Object.isFrozen(result)).toBe(true);
    });

    it('should keep the new rules in memory when storage fails', async () => {
      const errors: string[] = [];
      const store = new InjectionConfigStore(new BrokenStorage(), { onError: (error) => errors.push(error.message) });
      await store.init();

      await store.setRewriteConfig({ enabled: true, rules: [users] });

      expect(store.getRewriteConfig().rules).toEqual([users]);
      expect(errors).toEqual(['Failed to persist rewrite rules: disk full']);
    });
  });

  describe('durable storage', () => {
    afterEach(async () => {
      await rm(TEST_DIR, { recursive: true, force: true });
    });

    it('should reload rules from a LowDB file', async () => {
      const first = new LowDBStorage(`${TEST_DIR}/settings.json`);
      await first.init();
      const store = new InjectionConfigStore(first);
      await store.init();
      await store.setRewriteConfig({ enabled: true, rules: [users, posts] });
      await first.close();

      const second = new LowDBStorage(`${TEST_DIR}/settings.json`);
      await second.init();
      const reloaded = new InjectionConfigStore(second);
      await reloaded.init();

      expect(reloaded.getRewriteConfig()).toEqual({ enabled: false, rules: [users, posts] });
    });

    it('should reload rules from a SQLite database', async () => {
      const first = new SQLiteStorage(`${TEST_DIR}/settings.db`);
      await first.init();
      const store = new InjectionConfigStore(first);
      await store.init();
      await store.setRewriteConfig({ enabled: true, rules: [posts] });
      await first.close();

      const second = new SQLiteStorage(`${TEST_DIR}/settings.db`);
      await second.init();
      const reloaded = new InjectionConfigStore(second);
      await reloaded.init();
      await second.close();

      expect(reloaded.getRewriteConfig()).toEqual({ enabled: false, rules: [posts] });
    });
  });
});
