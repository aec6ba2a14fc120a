import express, { type Express, type Request, type RequestHandler, type Response, type Router } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type {
  FaultlineConfig,
  CaptureRecord,
  RandomSource,
  RequestDescriptor,
} from '../types/index.js';
import type { KeyValueStorage } from '../storage/base.js';
import { LowDBStorage } from '../storage/lowdb.adapter.js';
import { SQLiteStorage } from '../storage/sqlite.adapter.js';
import { MemoryStorage } from '../storage/memory.adapter.js';
import { InjectionConfigStore, type ConfigKind } from './config-store.js';
import { FaultInjector, type NetworkFailureError, type RewriteRule } from '../chaos/index.js';
import { CaptureStore } from '../capture/store.js';
import type { EncryptionService } from '../capture/encryption.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { mergeConfig } from '../config/loader.js';
import { delaySettingsToConfig, failureSettingsToConfig } from '../config/settings.js';
import { HotReloadService, type ReloadableSection } from '../config/hot-reload.js';
import { createAdminRouter } from '../admin/index.js';
import { createInterceptedFetch, type FetchLike } from './interceptor.js';
import { createInjectionMiddleware } from './middleware.js';

export const ADMIN_PREFIX = '/__faultline';

export interface FaultlineEvents {
  onDelay?: (request: RequestDescriptor, delayMs: number) => void;
  onFailure?: (request: RequestDescriptor, error: NetworkFailureError) => void;
  onRewrite?: (request: RequestDescriptor, rule: RewriteRule) => void;
  onCapture?: (record: CaptureRecord) => void;
  onConfigChange?: (kind: ConfigKind) => void;
  onError?: (error: Error) => void;
  onStart?: (port: number) => void;
  onStop?: () => void;
}

export interface FaultlineOptions {
  /** Replaces the storage built from config.storage */
  storage?: KeyValueStorage;
  encryption?: EncryptionService;
  random?: RandomSource;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wires the config store, the fault injector and the capture history
 * together, with an Express app serving the admin API.
 */
export class Faultline {
  private config: FaultlineConfig;
  private app: Express;
  private server: Server | null = null;
  private storage: KeyValueStorage;
  private store: InjectionConfigStore;
  private injector: FaultInjector;
  private captures: CaptureStore;
  private events: FaultlineEvents;
  private hotReload: HotReloadService | null = null;
  private initialized = false;
  private isRunning = false;
  private boundPort: number | null = null;

  constructor(config: Partial<FaultlineConfig> = {}, events: FaultlineEvents = {}, options: FaultlineOptions = {}) {
    this.config = mergeConfig(DEFAULT_CONFIG, config);
    this.events = events;
    this.storage = options.storage ?? this.createStorage();

    this.store = new InjectionConfigStore(this.storage, { onError: events.onError });
    this.store.onChange((kind) => this.events.onConfigChange?.(kind));

    this.injector = new FaultInjector(this.store, {
      random: options.random,
      sleep: options.sleep,
      onDelay: events.onDelay,
      onFailure: events.onFailure,
      onRewrite: events.onRewrite,
    });

    const capture = this.config.capture ?? DEFAULT_CONFIG.capture;
    this.captures = new CaptureStore({
      capacity: capture?.capacity,
      filters: { allow: capture?.allow, deny: capture?.deny },
      decryptionEnabled: capture?.decryption,
      encryption: options.encryption,
      onCapture: events.onCapture,
    });

    this.app = express();
    this.setupMiddleware();
  }

  /**
   * Create storage adapter based on config
   */
  private createStorage(): KeyValueStorage {
    const { type, path } = this.config.storage;

    if (type === 'lowdb') {
      return new LowDBStorage(path);
    }

    if (type === 'sqlite') {
      return new SQLiteStorage(path);
    }

    if (type === 'memory') {
      return new MemoryStorage();
    }

    throw new Error(`Unsupported storage type: ${type}`);
  }

  private setupMiddleware(): void {
    if (this.config.cors?.enabled) {
      const corsOptions: cors.CorsOptions = {
        origin: this.config.cors.origins ?? true,
        methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type'],
      };
      this.app.use(ADMIN_PREFIX, cors(corsOptions));
    }

    this.app.use(ADMIN_PREFIX, this.adminRouter());

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found' });
    });
  }

  /**
   * Load persisted rules and apply the injection settings from config
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    await this.storage.init();
    await this.store.init();
    await this.applyConfig(this.config, ['delay', 'failure', 'rewrite']);
    this.initialized = true;
  }

  /**
   * Apply reloadable sections of a (partial) config to the running instance
   */
  async applyConfig(config: Partial<FaultlineConfig>, sections: ReloadableSection[]): Promise<void> {
    if (sections.includes('delay') && config.delay) {
      const result = delaySettingsToConfig(config.delay);
      if (!result.valid) {
        throw new Error(`Invalid delay settings: ${result.errors.join('; ')}`);
      }
      this.store.setDelayConfig(result.config);
    }

    if (sections.includes('failure') && config.failure) {
      const result = failureSettingsToConfig(config.failure);
      if (!result.valid) {
        throw new Error(`Invalid failure settings: ${result.errors.join('; ')}`);
      }
      this.store.setFailureConfig(result.config);
    }

    if (sections.includes('rewrite') && config.rewrite) {
      const { enabled } = config.rewrite;
      await this.store.updateRewriteConfig((current) =>
        current.enabled === enabled ? null : { enabled, rules: [...current.rules] }
      );
    }

    if (sections.includes('capture') && config.capture) {
      this.captures.setFilters({ allow: config.capture.allow, deny: config.capture.deny });
      this.captures.setDecryptionEnabled(config.capture.decryption);
    }
  }

  /**
   * Re-apply injection settings whenever the config file changes
   */
  watchConfig(configPath: string, debounceMs?: number): HotReloadService {
    if (this.hotReload) {
      return this.hotReload;
    }

    this.hotReload = new HotReloadService({
      configPath,
      debounceMs,
      onReload: (config, sections) => {
        this.applyConfig(config, sections).catch((error: unknown) => {
          this.events.onError?.(error instanceof Error ? error : new Error(String(error)));
        });
      },
      onError: (error) => this.events.onError?.(error),
    });
    this.hotReload.start();
    return this.hotReload;
  }

  /**
   * Start the admin server
   */
  async start(): Promise<number> {
    if (this.isRunning) {
      throw new Error('Server is already running');
    }

    await this.init();

    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.config.port;
        this.server = server;
        this.isRunning = true;
        this.boundPort = port;
        this.events.onStart?.(port);
        resolve(port);
      });

      server.on('error', (error) => {
        this.isRunning = false;
        reject(error);
      });
    });
  }

  /**
   * Stop the admin server and release storage
   */
  async stop(): Promise<void> {
    if (this.hotReload) {
      await this.hotReload.stop();
      this.hotReload = null;
    }

    const server = this.server;
    if (this.isRunning && server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
      this.server = null;
      this.isRunning = false;
      this.boundPort = null;
      this.events.onStop?.();
    }

    await this.storage.close();
    this.initialized = false;
  }

  running(): boolean {
    return this.isRunning;
  }

  /**
   * Port the admin server listens on, null when stopped
   */
  port(): number | null {
    return this.boundPort;
  }

  getConfig(): FaultlineConfig {
    return { ...this.config };
  }

  getApp(): Express {
    return this.app;
  }

  getStorage(): KeyValueStorage {
    return this.storage;
  }

  getStore(): InjectionConfigStore {
    return this.store;
  }

  getInjector(): FaultInjector {
    return this.injector;
  }

  getCaptureStore(): CaptureStore {
    return this.captures;
  }

  /**
   * Admin API router, mountable in a host Express app
   */
  adminRouter(): Router {
    return createAdminRouter(this);
  }

  /**
   * Express middleware applying delay, failure and rewrite to host routes
   */
  middleware(): RequestHandler {
    return createInjectionMiddleware(this, { skipPrefix: ADMIN_PREFIX });
  }

  /**
   * fetch wrapper applying delay, failure and rewrite to outbound calls
   */
  fetch(fetchImpl?: FetchLike): FetchLike {
    return createInterceptedFetch(this, fetchImpl, { onError: (error) => this.events.onError?.(error) });
  }
}
