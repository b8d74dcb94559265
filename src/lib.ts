/**
 * Library entry point: the engine, its parts, and the stores
 */

export { ContentEngine } from './engine.js';
export type { ContentEngineOptions } from './engine.js';
export { Composer, orderAtomRefs } from './composer.js';
export type { ComposeOptions } from './composer.js';
export {
  VariableResolver,
  PLACEHOLDER_PATTERN,
  scan,
  extractTags,
  joinSegments,
  lookupTag,
  resolveWithChain,
  mergeCollisions,
} from './variables.js';
export type { TierMapping } from './variables.js';
export { RenderCache, signVariables, formatVersionToken, compareVersionTokens, formatCacheKey } from './render-cache.js';
export type { CacheKey, CacheStats, RenderCacheOptions } from './render-cache.js';
export { Assembler, parseMeta } from './assembler.js';
export {
  renderTemplate,
  renderAtom,
  renderMarkdown,
  parseTemplate,
  escapeHtml,
  embeddedAtomIds,
  SafeHtml,
  TemplateSyntaxError,
  UNKNOWN_ATOM,
} from './template.js';
export {
  ContentError,
  NotFoundError,
  IntegrityError,
  StoreUnavailableError,
  ContentValidationError,
  callStore,
} from './errors.js';
export type { ContentErrorCode, EntityKind } from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';
export { loadEngineConfig, validateConfig, CONFIG_FILE, ENV_OVERRIDES } from './config.js';
export type { LoadedConfig, LoadConfigOptions } from './config.js';
export * from './store/index.js';
export * from './types.js';
