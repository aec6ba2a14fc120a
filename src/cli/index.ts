#!/usr/bin/env node

import { Command } from 'commander';
import { Faultline, ADMIN_PREFIX } from '../core/server.js';
import { InjectionConfigStore } from '../core/config-store.js';
import { LowDBStorage } from '../storage/lowdb.adapter.js';
import { SQLiteStorage } from '../storage/sqlite.adapter.js';
import type { KeyValueStorage } from '../storage/base.js';
import { findRewriteRule, matchesRequestFilter, shouldApplyDelay, validateRewriteRule } from '../chaos/index.js';
import {
  loadConfig,
  validateConfig,
  findConfigFile,
  delaySettingsToConfig,
  failureSettingsToConfig,
  type CliOptions,
} from '../config/index.js';

const program = new Command();

// Colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  red: '\x1b[31m',
};

function log(message: string, color: keyof typeof colors = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

function logInfo(label: string, value: string): void {
  console.log(`  ${colors.dim}${label}:${colors.reset} ${colors.cyan}${value}${colors.reset}`);
}

function logError(error: unknown): void {
  log(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`, 'red');
}

function timestamp(): string {
  return `${colors.dim}${new Date().toLocaleTimeString()}${colors.reset}`;
}

interface StartOptions {
  port?: string;
  storage?: string;
  storageType?: string;
  config?: string;
  cors?: boolean;
  watch?: boolean;
}

type StorageOptions = Pick<CliOptions, 'storage' | 'storageType' | 'config'>;

interface AddRuleOptions extends StorageOptions {
  body?: string;
  status?: string;
}

interface CheckOptions extends StorageOptions {
  method: string;
}

/**
 * Open the persistent rule store named by config and CLI options
 */
async function openRuleStore(options: StorageOptions): Promise<{ store: InjectionConfigStore; storage: KeyValueStorage }> {
  const config = await loadConfig(options);
  let storage: KeyValueStorage;

  if (config.storage.type === 'sqlite') {
    storage = new SQLiteStorage(config.storage.path);
  } else if (config.storage.type === 'lowdb') {
    storage = new LowDBStorage(config.storage.path);
  } else {
    throw new Error(`Rules cannot be managed on ${config.storage.type} storage`);
  }

  await storage.init();
  const store = new InjectionConfigStore(storage, { onError: (error) => log(`  ${error.message}`, 'red') });
  await store.init();
  return { store, storage };
}

program
  .name('faultline')
  .description('Request matching and fault injection for debugging networked apps')
  .version('0.1.0');

// ============================================================================
// START COMMAND
// ============================================================================
program
  .command('start')
  .description('Start the Faultline admin server')
  .option('-p, --port <port>', 'Server port')
  .option('-s, --storage <path>', 'Storage file path')
  .option('--storage-type <type>', 'Storage type (lowdb|sqlite|memory)')
  .option('-c, --config <path>', 'Config file path')
  .option('--no-cors', 'Disable CORS')
  .option('--no-watch', 'Do not reload the config file on change')
  .action(async (options: StartOptions) => {
    try {
      const config = await loadConfig({
        port: options.port,
        storage: options.storage,
        storageType: options.storageType,
        config: options.config,
        cors: options.cors,
      });

      const validation = validateConfig(config);
      if (!validation.valid) {
        for (const error of validation.errors) {
          log(`Error: ${error}`, 'red');
        }
        process.exit(1);
      }

      const configFile = options.config ?? (await findConfigFile());

      console.log('');
      log('  Faultline', 'bright');
      console.log('');

      const faultline = new Faultline(config, {
        onDelay: (request, delayMs) => {
          console.log(
            `  ${timestamp()} ${colors.yellow}delay${colors.reset} ${Math.round(delayMs)}ms ${colors.magenta}${request.method}${colors.reset} ${request.url}`
          );
        },
        onFailure: (request, error) => {
          console.log(
            `  ${timestamp()} ${colors.red}fail${colors.reset} ${error.kind.type} (${error.code}) ${colors.magenta}${request.method}${colors.reset} ${request.url}`
          );
        },
        onRewrite: (request, rule) => {
          console.log(
            `  ${timestamp()} ${colors.blue}rewrite${colors.reset} ${rule.urlPattern} ${colors.magenta}${request.method}${colors.reset} ${request.url}`
          );
        },
        onConfigChange: (kind) => {
          console.log(`  ${timestamp()} ${colors.cyan}config${colors.reset} ${kind} updated`);
        },
        onError: (error) => log(`  ${error.message}`, 'red'),
      });

      const port = await faultline.start();

      if (configFile && options.watch !== false) {
        faultline.watchConfig(configFile);
      }

      console.log(`  ${colors.green}Server started${colors.reset}`);
      console.log('');
      if (configFile) {
        logInfo('Config', configFile + (options.watch !== false ? ' (watching)' : ''));
      }
      logInfo('Port', String(port));
      logInfo('Storage', `${config.storage.type} ${config.storage.path}`);
      logInfo('Delay', config.delay?.enabled ? 'enabled' : 'disabled');
      logInfo('Failure', config.failure?.enabled ? 'enabled' : 'disabled');
      logInfo('Rewrite', `${faultline.getStore().getRewriteConfig().rules.length} rule(s)`);
      logInfo('CORS', config.cors?.enabled ? 'enabled' : 'disabled');
      console.log('');
      log(`  Listening on http://localhost:${port}`, 'green');
      console.log('');
      logInfo('Health', `http://localhost:${port}${ADMIN_PREFIX}/health`);
      logInfo('Status', `http://localhost:${port}${ADMIN_PREFIX}/status`);
      logInfo('Captures', `http://localhost:${port}${ADMIN_PREFIX}/captures`);
      console.log('');
      log('  Press Ctrl+C to stop', 'dim');
      console.log('');

      const shutdown = async () => {
        console.log('');
        log('  Shutting down...', 'yellow');
        await faultline.stop();
        log('  Server stopped', 'green');
        process.exit(0);
      };

      const onSignal = () => {
        shutdown().catch((error: unknown) => {
          logError(error);
          process.exit(1);
        });
      };
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);
    } catch (error) {
      logError(error);
      process.exit(1);
    }
  });

// ============================================================================
// RULES COMMANDS
// ============================================================================
const rules = program.command('rules').description('Manage persisted rewrite rules');

function addStorageOptions(command: Command): Command {
  return command
    .option('-s, --storage <path>', 'Storage file path')
    .option('--storage-type <type>', 'Storage type (lowdb|sqlite)')
    .option('-c, --config <path>', 'Config file path');
}

addStorageOptions(
  rules
    .command('list')
    .description('List rewrite rules')
    .option('--json', 'Output as JSON')
).action(async (options: StorageOptions & { json?: boolean }) => {
  try {
    const { store, storage } = await openRuleStore(options);
    const list = store.getRewriteConfig().rules;
    await storage.close();

    if (options.json) {
      console.log(JSON.stringify(list, null, 2));
      return;
    }

    console.log('');
    log('  Rewrite Rules', 'bright');
    console.log('');

    if (list.length === 0) {
      log('  No rewrite rules yet.', 'dim');
      console.log('');
      log('  Add one with:', 'dim');
      log('  faultline rules add "*/api/users*" --body \'{"users":[]}\' --status 200', 'cyan');
      console.log('');
      return;
    }

    console.log(`  ${colors.dim}${'#'.padEnd(4)} ${'STATUS'.padEnd(8)} ${'PATTERN'.padEnd(45)} BODY${colors.reset}`);
    console.log(`  ${colors.dim}${'-'.repeat(80)}${colors.reset}`);

    list.forEach((rule, index) => {
      const pattern = rule.urlPattern.length > 43 ? rule.urlPattern.substring(0, 42) + '..' : rule.urlPattern;
      const body = rule.responseBody.length > 30 ? rule.responseBody.substring(0, 29) + '..' : rule.responseBody;
      const status = rule.responseStatusCode === undefined ? '-' : String(rule.responseStatusCode);
      const statusColor = (rule.responseStatusCode ?? 200) >= 400 ? colors.red : colors.green;

      console.log(
        `  ${colors.dim}${String(index).padEnd(4)}${colors.reset} ${statusColor}${status.padEnd(8)}${colors.reset} ${pattern.padEnd(45)} ${colors.dim}${body}${colors.reset}`
      );
    });

    console.log('');
  } catch (error) {
    logError(error);
    process.exit(1);
  }
});

addStorageOptions(
  rules
    .command('add <pattern>')
    .description('Add a rewrite rule')
    .option('-b, --body <body>', 'Response body', '')
    .option('--status <code>', 'Response status code')
).action(async (pattern: string, options: AddRuleOptions) => {
  try {
    const validation = validateRewriteRule({
      urlPattern: pattern,
      responseBody: options.body ?? '',
      responseStatusCode: options.status,
    });
    if (!validation.valid) {
      for (const error of validation.errors) {
        log(`Error: ${error}`, 'red');
      }
      process.exit(1);
    }

    const { store, storage } = await openRuleStore(options);
    const { rule } = validation;
    let index = 0;
    await store.updateRewriteConfig((current) => {
      index = current.rules.length;
      return { enabled: current.enabled, rules: [...current.rules, rule] };
    });
    await storage.close();

    log(`Added rule ${index}: ${rule.urlPattern}`, 'green');
  } catch (error) {
    logError(error);
    process.exit(1);
  }
});

addStorageOptions(rules.command('remove <index>').description('Remove a rewrite rule by index')).action(
  async (index: string, options: StorageOptions) => {
    try {
      const { store, storage } = await openRuleStore(options);
      const current = store.getRewriteConfig();
      const position = /^\d+$/.test(index) ? Number(index) : -1;

      if (position < 0 || position >= current.rules.length) {
        await storage.close();
        log(`Rule not found: ${index}`, 'red');
        process.exit(1);
      }

      await store.setRewriteConfig({
        enabled: current.enabled,
        rules: current.rules.filter((_rule, i) => i !== position),
      });
      await storage.close();
      log(`Removed rule ${position}: ${current.rules[position].urlPattern}`, 'green');
    } catch (error) {
      logError(error);
      process.exit(1);
    }
  }
);

addStorageOptions(
  rules.command('clear').description('Remove all rewrite rules').option('-y, --yes', 'Skip confirmation')
).action(async (options: StorageOptions & { yes?: boolean }) => {
  try {
    const { store, storage } = await openRuleStore(options);
    const count = store.getRewriteConfig().rules.length;

    if (count === 0) {
      await storage.close();
      log('No rules to clear.', 'yellow');
      return;
    }

    if (!options.yes) {
      await storage.close();
      log(`This will delete ${count} rewrite rule(s).`, 'yellow');
      log('Use --yes flag to confirm: faultline rules clear --yes', 'dim');
      return;
    }

    await store.setRewriteConfig({ enabled: false, rules: [] });
    await storage.close();
    log(`Cleared ${count} rule(s)`, 'green');
  } catch (error) {
    logError(error);
    process.exit(1);
  }
});

// ============================================================================
// CHECK COMMAND
// ============================================================================
addStorageOptions(
  program
    .command('check <url>')
    .description('Show which delay, failure and rewrite settings a request would hit')
    .option('-m, --method <method>', 'HTTP method', 'GET')
).action(async (url: string, options: CheckOptions) => {
  try {
    const config = await loadConfig(options);
    const request = { url, method: options.method.toUpperCase() };

    console.log('');
    log(`  ${request.method} ${url}`, 'bright');
    console.log('');

    const delay = delaySettingsToConfig(config.delay ?? { enabled: false });
    if (delay.valid) {
      const applies = shouldApplyDelay(delay.config, request);
      const range =
        delay.config.fixedDelay !== undefined
          ? `${delay.config.fixedDelay}ms`
          : `${delay.config.minDelay}-${delay.config.maxDelay}ms`;
      logInfo('Delay', applies ? `applies (${range})` : delay.config.enabled ? 'filtered out' : 'disabled');
    }

    const failure = failureSettingsToConfig(config.failure ?? { enabled: false });
    if (failure.valid) {
      const { enabled, failureRate, failureKind } = failure.config;
      const applies = enabled && matchesRequestFilter(failure.config, request);
      logInfo(
        'Failure',
        applies ? `${failureKind.type} at rate ${failureRate}` : enabled ? 'filtered out' : 'disabled'
      );
    }

    const { store, storage } = await openRuleStore(options);
    const rule = findRewriteRule({ enabled: true, rules: [...store.getRewriteConfig().rules] }, url);
    await storage.close();

    const rewriteEnabled = config.rewrite?.enabled ?? false;
    if (rule) {
      logInfo('Rewrite', `${rule.urlPattern}${rewriteEnabled ? '' : ' (rewriting disabled)'}`);
    } else {
      logInfo('Rewrite', 'no matching rule');
    }
    console.log('');
  } catch (error) {
    logError(error);
    process.exit(1);
  }
});

await program.parseAsync();
