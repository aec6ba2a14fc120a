export { DEFAULT_CONFIG, DEFAULT_STORAGE_PATHS, CONFIG_FILE_NAMES } from './defaults.js';
export {
  loadConfig,
  loadConfigFile,
  findConfigFile,
  mergeConfig,
  validateConfig,
  validateDelaySettings,
  validateFailureSettings,
  configFileToFaultlineConfig,
  type ConfigFile,
  type CliOptions,
} from './loader.js';
export {
  delaySettingsToConfig,
  failureSettingsToConfig,
  delayConfigToSettings,
  failureConfigToSettings,
  readDelaySettings,
  readFailureSettings,
  type SettingsResult,
} from './settings.js';
export {
  HotReloadService,
  type ReloadableSection,
  type HotReloadConfig,
  type HotReloadStats,
} from './hot-reload.js';
