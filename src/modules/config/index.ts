/**
 * Config module — barrel export.
 */

export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export { ConfigSystemImpl, createConfigSystem, deepMerge, readEnvOverrides, ENV_VAR_MAP } from './config-system-impl.js'
export {
  RedraftConfigSchema,
  PartialRedraftConfigSchema,
  LogLevelSchema,
} from './config-schema.js'
export type { RedraftConfig, PartialRedraftConfig, LogLevel } from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
