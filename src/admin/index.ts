/**
 * Admin API - inspect and change the injection settings and the capture history
 */

import express, { type Request, type Response, type Router } from 'express';
import type { CaptureRecord, FaultlineConfig } from '../types/index.js';
import type { InjectionConfigStore } from '../core/config-store.js';
import type { FaultInjector } from '../chaos/index.js';
import { validateRewriteRule, type RewriteRule, type RewriteRuleValidation } from '../chaos/rewrite.js';
import type { CaptureStore } from '../capture/store.js';
import {
  delayConfigToSettings,
  delaySettingsToConfig,
  failureConfigToSettings,
  failureSettingsToConfig,
  readDelaySettings,
  readFailureSettings,
} from '../config/settings.js';

export interface AdminTargets {
  getConfig(): FaultlineConfig;
  /** Bound port while listening */
  port(): number | null;
  getStore(): InjectionConfigStore;
  getInjector(): FaultInjector;
  getCaptureStore(): CaptureStore;
}

export interface SerializedBytes {
  encoding: 'utf8' | 'base64';
  data: string;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Readable text when the bytes are valid UTF-8, base64 otherwise
 */
export function serializeBytes(bytes: Uint8Array | undefined): SerializedBytes | null {
  if (!bytes) return null;
  try {
    return { encoding: 'utf8', data: utf8.decode(bytes) };
  } catch {
    return { encoding: 'base64', data: Buffer.from(bytes).toString('base64') };
  }
}

function serializeRecord(record: CaptureRecord) {
  return {
    id: record.id,
    url: record.url,
    method: record.method ?? null,
    statusCode: record.statusCode ?? null,
    sequenceIndex: record.sequenceIndex,
    startTime: record.startTime ?? null,
    duration: record.duration ?? null,
    isEncrypted: record.isEncrypted,
    error: record.error ?? null,
    request: serializeBytes(record.requestBytes),
    response: serializeBytes(record.responseBytes),
    decryptedResponse: serializeBytes(record.decryptedResponseBytes),
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRule(value: unknown): RewriteRuleValidation {
  const input: Record<string, unknown> = isObject(value) ? value : {};
  return validateRewriteRule({
    urlPattern: input.urlPattern,
    responseBody: input.responseBody,
    responseStatusCode: input.responseStatusCode,
  });
}

export function createAdminRouter(targets: AdminTargets): Router {
  const router = express.Router();
  router.use(express.json());

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', uptime: process.uptime() });
  });

  router.get('/status', (_req: Request, res: Response) => {
    const store = targets.getStore();
    const captures = targets.getCaptureStore();
    res.json({
      port: targets.port() ?? targets.getConfig().port,
      delay: delayConfigToSettings(store.getDelayConfig()),
      failure: failureConfigToSettings(store.getFailureConfig()),
      rewrite: {
        enabled: store.getRewriteConfig().enabled,
        rules: store.getRewriteConfig().rules.length,
      },
      captures: { count: captures.size, capacity: captures.capacity },
      stats: targets.getInjector().getStats(),
    });
  });

  // Delay
  router.get('/delay', (_req: Request, res: Response) => {
    res.json(delayConfigToSettings(targets.getStore().getDelayConfig()));
  });

  router.put('/delay', (req: Request, res: Response) => {
    if (!isObject(req.body)) {
      res.status(400).json({ errors: ['Body must be a JSON object'] });
      return;
    }
    const settings = readDelaySettings(req.body);
    const result = settings.valid ? delaySettingsToConfig(settings.config) : settings;
    if (!result.valid) {
      res.status(400).json({ errors: result.errors });
      return;
    }
    targets.getStore().setDelayConfig(result.config);
    res.json(delayConfigToSettings(targets.getStore().getDelayConfig()));
  });

  // Failure
  router.get('/failure', (_req: Request, res: Response) => {
    res.json(failureConfigToSettings(targets.getStore().getFailureConfig()));
  });

  router.put('/failure', (req: Request, res: Response) => {
    if (!isObject(req.body)) {
      res.status(400).json({ errors: ['Body must be a JSON object'] });
      return;
    }
    const settings = readFailureSettings(req.body);
    const result = settings.valid ? failureSettingsToConfig(settings.config) : settings;
    if (!result.valid) {
      res.status(400).json({ errors: result.errors });
      return;
    }
    targets.getStore().setFailureConfig(result.config);
    res.json(failureConfigToSettings(targets.getStore().getFailureConfig()));
  });

  // Rewrite
  router.get('/rewrite', (_req: Request, res: Response) => {
    const { enabled, rules } = targets.getStore().getRewriteConfig();
    res.json({ enabled, rules });
  });

  router.put('/rewrite', async (req: Request, res: Response) => {
    const body: Record<string, unknown> = isObject(req.body) ? req.body : {};
    const errors: string[] = [];

    let enabled: boolean | undefined;
    if (body.enabled !== undefined) {
      if (typeof body.enabled === 'boolean') {
        enabled = body.enabled;
      } else {
        errors.push('enabled must be a boolean');
      }
    }

    let rules: RewriteRule[] | undefined;
    if (body.rules !== undefined) {
      if (Array.isArray(body.rules)) {
        const replacement: RewriteRule[] = [];
        body.rules.forEach((value: unknown, index) => {
          const validation = readRule(value);
          if (validation.valid) {
            replacement.push(validation.rule);
          } else {
            errors.push(...validation.errors.map((error) => `Rule ${index}: ${error}`));
          }
        });
        rules = replacement;
      } else {
        errors.push('rules must be a list');
      }
    }

    if (body.enabled === undefined && body.rules === undefined) {
      errors.push('Body must set enabled or rules');
    }
    if (errors.length > 0) {
      res.status(400).json({ errors });
      return;
    }

    try {
      const next = await targets.getStore().updateRewriteConfig((current) => ({
        enabled: enabled ?? current.enabled,
        rules: rules ?? [...current.rules],
      }));
      res.json(next);
    } catch {
      res.status(500).json({ error: 'Failed to update rewrite config' });
    }
  });

  router.post('/rewrite/rules', async (req: Request, res: Response) => {
    const validation = readRule(req.body);
    if (!validation.valid) {
      res.status(400).json({ errors: validation.errors });
      return;
    }
    const { rule } = validation;
    let index = 0;
    try {
      await targets.getStore().updateRewriteConfig((current) => {
        index = current.rules.length;
        return { enabled: current.enabled, rules: [...current.rules, rule] };
      });
      res.status(201).json({ index, rule });
    } catch {
      res.status(500).json({ error: 'Failed to add rewrite rule' });
    }
  });

  router.delete('/rewrite/rules/:index', async (req: Request, res: Response) => {
    const index = /^\d+$/.test(req.params.index) ? Number(req.params.index) : -1;
    try {
      const next = await targets.getStore().updateRewriteConfig((current) =>
        index < 0 || index >= current.rules.length
          ? null
          : { enabled: current.enabled, rules: current.rules.filter((_rule, i) => i !== index) }
      );
      if (!next) {
        res.status(404).json({ error: 'Rule not found' });
        return;
      }
      res.json({ success: true });
    } catch {
      res.status(500).json({ error: 'Failed to remove rewrite rule' });
    }
  });

  // Captures
  router.get('/captures', (_req: Request, res: Response) => {
    const records = targets.getCaptureStore().list();
    res.json({ count: records.length, records: records.map(serializeRecord) });
  });

  router.get('/captures/:id', (req: Request, res: Response) => {
    const record = targets.getCaptureStore().get(req.params.id);
    if (!record) {
      res.status(404).json({ error: 'Capture not found' });
      return;
    }
    res.json(serializeRecord(record));
  });

  router.delete('/captures', (_req: Request, res: Response) => {
    targets.getCaptureStore().removeAll();
    res.json({ success: true });
  });

  router.delete('/captures/:id', (req: Request, res: Response) => {
    const removed = targets.getCaptureStore().remove(req.params.id);
    if (removed === 0) {
      res.status(404).json({ error: 'Capture not found' });
      return;
    }
    res.json({ success: true, removed });
  });

  return router;
}
