import type { DelaySettings, FailureSettings } from '../types/index.js';
import { createDelayConfig, type DelayConfig } from '../chaos/latency.js';
import { createFailureConfig, parseFailureKind, type FailureConfig } from '../chaos/failure.js';
import { validateDelaySettings, validateFailureSettings } from './loader.js';

export type SettingsResult<T> = { valid: true; config: T } | { valid: false; errors: string[] };

/**
 * Turn flat delay settings (config file, admin API) into a delay config
 */
export function delaySettingsToConfig(settings: Partial<DelaySettings>): SettingsResult<DelayConfig> {
  const errors = validateDelaySettings(settings);
  if (errors.length > 0) {
    return { valid: false, errors };
  }

  return {
    valid: true,
    config: createDelayConfig({
      enabled: settings.enabled ?? false,
      fixedDelay: settings.fixedDelay,
      minDelay: settings.minDelay,
      maxDelay: settings.maxDelay,
      urlPatterns: settings.urlPatterns,
      httpMethods: settings.httpMethods,
    }),
  };
}

/**
 * Turn flat failure settings into a failure config
 */
export function failureSettingsToConfig(settings: Partial<FailureSettings>): SettingsResult<FailureConfig> {
  const errors = validateFailureSettings(settings);
  const failureKind = parseFailureKind(settings);
  if (errors.length > 0 || !failureKind) {
    return { valid: false, errors: errors.length > 0 ? errors : ['Invalid failure kind'] };
  }

  return {
    valid: true,
    config: createFailureConfig({
      enabled: settings.enabled ?? false,
      failureRate: settings.failureRate,
      failureKind,
      urlPatterns: settings.urlPatterns,
      httpMethods: settings.httpMethods,
      candidateStatusCodes: settings.candidateStatusCodes,
    }),
  };
}

export function delayConfigToSettings(config: Readonly<DelayConfig>): DelaySettings {
  return {
    enabled: config.enabled,
    fixedDelay: config.fixedDelay,
    minDelay: config.minDelay,
    maxDelay: config.maxDelay,
    urlPatterns: [...config.urlPatterns],
    httpMethods: [...config.httpMethods],
  };
}

export function failureConfigToSettings(config: Readonly<FailureConfig>): FailureSettings {
  const kind = config.failureKind;
  const settings: FailureSettings = {
    enabled: config.enabled,
    failureRate: config.failureRate,
    kind: kind.type,
    urlPatterns: [...config.urlPatterns],
    httpMethods: [...config.httpMethods],
    candidateStatusCodes: [...config.candidateStatusCodes],
  };
  if (kind.type === 'httpError') {
    settings.statusCode = kind.statusCode;
  } else if (kind.type === 'custom') {
    settings.domain = kind.domain;
    settings.code = kind.code;
    settings.message = kind.message;
  }
  return settings;
}

type FieldReader = {
  errors: string[];
  boolean(key: string): boolean | undefined;
  number(key: string): number | undefined;
  string(key: string): string | undefined;
  strings(key: string): string[] | undefined;
  numbers(key: string): number[] | undefined;
};

function fieldReader(input: Record<string, unknown>, label: string): FieldReader {
  const errors: string[] = [];
  const read = <T>(key: string, expected: string, guard: (value: unknown) => value is T): T | undefined => {
    const value = input[key];
    if (value === undefined || value === null) return undefined;
    if (guard(value)) return value;
    errors.push(`${label} ${key} must be ${expected}`);
    return undefined;
  };

  return {
    errors,
    boolean: (key) => read(key, 'a boolean', (v): v is boolean => typeof v === 'boolean'),
    number: (key) => read(key, 'a number', (v): v is number => typeof v === 'number'),
    string: (key) => read(key, 'a string', (v): v is string => typeof v === 'string'),
    strings: (key) =>
      read(key, 'a list of strings', (v): v is string[] => Array.isArray(v) && v.every((i) => typeof i === 'string')),
    numbers: (key) =>
      read(key, 'a list of numbers', (v): v is number[] => Array.isArray(v) && v.every((i) => typeof i === 'number')),
  };
}

/**
 * Read delay settings out of an untyped object such as a JSON request body
 */
export function readDelaySettings(input: Record<string, unknown>): SettingsResult<Partial<DelaySettings>> {
  const field = fieldReader(input, 'Delay');
  const settings: Partial<DelaySettings> = {
    enabled: field.boolean('enabled'),
    fixedDelay: field.number('fixedDelay'),
    minDelay: field.number('minDelay'),
    maxDelay: field.number('maxDelay'),
    urlPatterns: field.strings('urlPatterns'),
    httpMethods: field.strings('httpMethods'),
  };
  return field.errors.length > 0 ? { valid: false, errors: field.errors } : { valid: true, config: settings };
}

/**
 * Read failure settings out of an untyped object such as a JSON request body
 */
export function readFailureSettings(input: Record<string, unknown>): SettingsResult<Partial<FailureSettings>> {
  const field = fieldReader(input, 'Failure');
  const settings: Partial<FailureSettings> = {
    enabled: field.boolean('enabled'),
    failureRate: field.number('failureRate'),
    kind: field.string('kind'),
    statusCode: field.number('statusCode'),
    domain: field.string('domain'),
    code: field.number('code'),
    message: field.string('message'),
    urlPatterns: field.strings('urlPatterns'),
    httpMethods: field.strings('httpMethods'),
    candidateStatusCodes: field.numbers('candidateStatusCodes'),
  };
  return field.errors.length > 0 ? { valid: false, errors: field.errors } : { valid: true, config: settings };
}
