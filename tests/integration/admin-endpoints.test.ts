import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Faultline, ADMIN_PREFIX } from '../../src/core/server.js';
import { MemoryStorage } from '../../src/storage/memory.adapter.js';

class SlowStorage extends MemoryStorage {
  async set(key: string, value: string): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, 50));
    await super.set(key, value);
  }
}

describe('Admin endpoints', () => {
  let faultline: Faultline;
  let base: string;

  const call = async (path: string, init: RequestInit = {}): Promise<{ status: number; body: unknown }> => {
    const res = await fetch(`${base}${path}`, init);
    const body: unknown = await res.json();
    return { status: res.status, body };
  };

  const send = (method: string, path: string, payload: unknown) =>
    call(path, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });

  beforeEach(async () => {
    faultline = new Faultline({ port: 0, storage: { type: 'memory', path: '' } });
    const port = await faultline.start();
    base = `http://127.0.0.1:${port}${ADMIN_PREFIX}`;
  });

  afterEach(async () => {
    await faultline.stop();
  });

  describe('GET /health', () => {
    it('should report the server is up', async () => {
      const { status, body } = await call('/health');

      expect(status).toBe(200);
      expect(body).toMatchObject({ status: 'ok' });
    });

    it('should reflect the request origin', async () => {
      const res = await fetch(`${base}/health`, { headers: { Origin: 'http://app.test' } });

      expect(res.headers.get('access-control-allow-origin')).toBe('http://app.test');
    });
  });

  describe('GET /status', () => {
    it('should summarize the current settings', async () => {
      const { body } = await call('/status');

      expect(body).toMatchObject({
        port: faultline.port(),
        delay: { enabled: false, minDelay: 1000, maxDelay: 3000, urlPatterns: [], httpMethods: [] },
        failure: { enabled: false, failureRate: 0.5, kind: 'timeout' },
        rewrite: { enabled: false, rules: 0 },
        captures: { count: 0, capacity: 10000 },
        stats: { requestsProcessed: 0, failuresInjected: 0 },
      });
    });
  });

  describe('/delay', () => {
    it('should replace the delay settings', async () => {
      const { status, body } = await send('PUT', '/delay', {
        enabled: true,
        minDelay: 10,
        maxDelay: 20,
        httpMethods: ['GET'],
      });

      expect(status).toBe(200);
      expect(body).toEqual({ enabled: true, minDelay: 10, maxDelay: 20, urlPatterns: [], httpMethods: ['GET'] });
      expect(faultline.getStore().getDelayConfig()).toMatchObject({ enabled: true, minDelay: 10, maxDelay: 20 });
      expect((await call('/delay')).body).toEqual(body);
    });

    it('should reject fields of the wrong type', async () => {
      const { status, body } = await send('PUT', '/delay', { enabled: 'yes' });

      expect(status).toBe(400);
      expect(body).toEqual({ errors: ['Delay enabled must be a boolean'] });
    });

    it('should reject an inverted range', async () => {
      const { status, body } = await send('PUT', '/delay', { enabled: true, minDelay: 500, maxDelay: 100 });

      expect(status).toBe(400);
      expect(body).toEqual({ errors: ['Delay maxDelay must be >= minDelay'] });
      expect(faultline.getStore().getDelayConfig().enabled).toBe(false);
    });

    it('should reject a body that is not an object', async () => {
      const { status, body } = await send('PUT', '/delay', [1, 2]);

      expect(status).toBe(400);
      expect(body).toEqual({ errors: ['Body must be a JSON object'] });
    });
  });

  describe('/failure', () => {
    it('should replace the failure settings', async () => {
      const { status, body } = await send('PUT', '/failure', {
        enabled: true,
        failureRate: 0.25,
        kind: 'httpError',
        statusCode: 503,
      });

      expect(status).toBe(200);
      expect(body).toEqual({
        enabled: true,
        failureRate: 0.25,
        kind: 'httpError',
        statusCode: 503,
        urlPatterns: [],
        httpMethods: [],
        candidateStatusCodes: [400, 401, 403, 404, 500, 502, 503],
      });
      expect(faultline.getStore().getFailureConfig().failureKind).toEqual({ type: 'httpError', statusCode: 503 });
    });

    it('should reject an unknown kind', async () => {
      const { status, body } = await send('PUT', '/failure', { enabled: true, kind: 'bogus' });

      expect(status).toBe(400);
      expect(body).toEqual({
        errors: [
          'Invalid failure kind: bogus. Must be one of: timeout, connectionLost, offline, hostNotFound, dnsFailure, httpError, sslFailure, cancelled, custom.',
        ],
      });
    });
  });

  describe('/rewrite', () => {
    const rule = { urlPattern: '*/api/users', responseBody: '[]', responseStatusCode: 201 };

    it('should start with no rules', async () => {
      expect((await call('/rewrite')).body).toEqual({ enabled: false, rules: [] });
    });

    it('should add a rule', async () => {
      const { status, body } = await send('POST', '/rewrite/rules', { ...rule, responseStatusCode: '201' });

      expect(status).toBe(201);
      expect(body).toEqual({ index: 0, rule });
      expect(faultline.getStore().getRewriteConfig().rules).toEqual([rule]);
    });

    it('should reject an invalid rule', async () => {
      const { status, body } = await send('POST', '/rewrite/rules', { urlPattern: '  ', responseStatusCode: 700 });

      expect(status).toBe(400);
      expect(body).toEqual({ errors: ['URL pattern cannot be empty', 'Status code must be between 100 and 599'] });
    });

    it('should switch rewriting on and off', async () => {
      await send('POST', '/rewrite/rules', rule);

      const { status, body } = await send('PUT', '/rewrite', { enabled: true });

      expect(status).toBe(200);
      expect(body).toEqual({ enabled: true, rules: [rule] });
    });

    it('should require a boolean enabled flag', async () => {
      const { status, body } = await send('PUT', '/rewrite', { enabled: 'on' });

      expect(status).toBe(400);
      expect(body).toEqual({ errors: ['enabled must be a boolean'] });
    });

    it('should replace the whole rule list', async () => {
      await send('POST', '/rewrite/rules', rule);

      const { status, body } = await send('PUT', '/rewrite', {
        rules: [{ urlPattern: ' */api/posts ', responseBody: '{}' }],
      });

      expect(status).toBe(200);
      expect(body).toEqual({ enabled: false, rules: [{ urlPattern: '*/api/posts', responseBody: '{}' }] });
    });

    it('should report every invalid rule in a replacement', async () => {
      const { status, body } = await send('PUT', '/rewrite', {
        enabled: true,
        rules: [rule, { urlPattern: '', responseStatusCode: 42 }],
      });

      expect(status).toBe(400);
      expect(body).toEqual({
        errors: ['Rule 1: URL pattern cannot be empty', 'Rule 1: Status code must be between 100 and 599'],
      });
      expect(faultline.getStore().getRewriteConfig().enabled).toBe(false);
    });

    it('should require enabled or rules', async () => {
      const { status, body } = await send('PUT', '/rewrite', {});

      expect(status).toBe(400);
      expect(body).toEqual({ errors: ['Body must set enabled or rules'] });
    });

    it('should remove a rule by index', async () => {
      await send('POST', '/rewrite/rules', rule);

      expect(await call('/rewrite/rules/0', { method: 'DELETE' })).toEqual({ status: 200, body: { success: true } });
      expect(faultline.getStore().getRewriteConfig().rules).toEqual([]);
    });

    it('should not find a rule outside the list', async () => {
      await send('POST', '/rewrite/rules', rule);

      expect(await call('/rewrite/rules/3', { method: 'DELETE' })).toEqual({
        status: 404,
        body: { error: 'Rule not found' },
      });
      expect(await call('/rewrite/rules/first', { method: 'DELETE' })).toEqual({
        status: 404,
        body: { error: 'Rule not found' },
      });
    });
  });

  describe('/captures', () => {
    beforeEach(() => {
      faultline.getCaptureStore().addRecord({
        id: 'c1',
        url: 'https://api.test/upload',
        method: 'POST',
        statusCode: 200,
        requestBytes: new Uint8Array([0xff]),
        responseBytes: new TextEncoder().encode('ok'),
      });
    });

    it('should list captured records', async () => {
      const { body } = await call('/captures');

      expect(body).toEqual({
        count: 1,
        records: [
          {
            id: 'c1',
            url: 'https://api.test/upload',
            method: 'POST',
            statusCode: 200,
            sequenceIndex: 0,
            startTime: null,
            duration: null,
            isEncrypted: false,
            error: null,
            request: { encoding: 'base64', data: '/w==' },
            response: { encoding: 'utf8', data: 'ok' },
            decryptedResponse: null,
          },
        ],
      });
    });

    it('should get a record by id', async () => {
      expect(await call('/captures/c1')).toMatchObject({ status: 200, body: { id: 'c1', sequenceIndex: 0 } });
      expect(await call('/captures/missing')).toEqual({ status: 404, body: { error: 'Capture not found' } });
    });

    it('should delete one record', async () => {
      expect(await call('/captures/c1', { method: 'DELETE' })).toEqual({
        status: 200,
        body: { success: true, removed: 1 },
      });
      expect(await call('/captures/c1', { method: 'DELETE' })).toEqual({
        status: 404,
        body: { error: 'Capture not found' },
      });
    });

    it('should clear the history', async () => {
      expect(await call('/captures', { method: 'DELETE' })).toEqual({ status: 200, body: { success: true } });
      expect(faultline.getCaptureStore().size).toBe(0);
    });
  });

  it('should answer unknown routes with 404', async () => {
    expect(await call('/unknown')).toEqual({ status: 404, body: { error: 'Not found' } });
  });

  describe('concurrent rule edits', () => {
    let slow: Faultline;
    let slowBase: string;

    const post = (urlPattern: string) =>
      fetch(`${slowBase}/rewrite/rules`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ urlPattern, responseBody: '[]' }),
      });

    beforeEach(async () => {
      slow = new Faultline({ port: 0 }, {}, { storage: new SlowStorage() });
      const port = await slow.start();
      slowBase = `http://127.0.0.1:${port}${ADMIN_PREFIX}`;
    });

    afterEach(async () => {
      await slow.stop();
    });

    it('should keep every rule added while a write is persisting', async () => {
      const responses = await Promise.all([
        post('https://a.test/1'),
        post('https://a.test/2'),
        post('https://a.test/3'),
      ]);

      expect(responses.map((res) => res.status)).toEqual([201, 201, 201]);
      const patterns = slow
        .getStore()
        .getRewriteConfig()
        .rules.map((rule) => rule.urlPattern)
        .sort();
      expect(patterns).toEqual(['https://a.test/1', 'https://a.test/2', 'https://a.test/3']);
    });

    it('should remove one rule per delete', async () => {
      await post('https://a.test/1');
      await post('https://a.test/2');

      const responses = await Promise.all([
        fetch(`${slowBase}/rewrite/rules/0`, { method: 'DELETE' }),
        fetch(`${slowBase}/rewrite/rules/0`, { method: 'DELETE' }),
      ]);

      expect(responses.map((res) => res.status)).toEqual([200, 200]);
      expect(slow.getStore().getRewriteConfig().rules).toEqual([]);
    });
  });
});
