export {
  Faultline,
  ADMIN_PREFIX,
  type FaultlineEvents,
  type FaultlineOptions,
} from './core/server.js';
export * from './types/index.js';
export * from './storage/index.js';
export {
  WildcardPattern,
  compileWildcard,
  matchesWildcard,
  matchesAnyWildcard,
  type WildcardSyntax,
} from './core/wildcard.js';
export {
  parseUrlPattern,
  matchUrl,
  matchesAnyUrl,
  matchQueryItems,
  type QueryItemPattern,
  type ParsedUrlPattern,
  type UrlMatchOptions,
  type UrlQueryItem,
} from './core/matcher.js';
export {
  InjectionConfigStore,
  REWRITE_RULES_KEY,
  type ConfigKind,
  type ConfigChangeListener,
  type InjectionConfigStoreOptions,
} from './core/config-store.js';
export { Mutex } from './core/mutex.js';
export {
  createInterceptedFetch,
  type FetchLike,
  type InterceptionTargets,
  type InterceptedFetchOptions,
} from './core/interceptor.js';
export { createInjectionMiddleware, type InjectionMiddlewareOptions } from './core/middleware.js';
export { createAdminRouter, serializeBytes, type AdminTargets, type SerializedBytes } from './admin/index.js';
export * from './chaos/index.js';
export * from './capture/index.js';
export * from './config/index.js';
