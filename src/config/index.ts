/**
 * Configuration module exports.
 *
 * @module config
 */

export {
  DEFAULT_CONFIG,
  LATEST_SCHEMA_VERSION,
  LogLevelSchema,
  ServiceConfigSchema,
  type LogLevel,
  type ServiceConfig,
} from "./schema.js";

export {
  ConfigError,
  ConfigNotFoundError,
  ConfigParseError,
  ConfigValidationError,
  loadConfigFromPath,
  readRawConfig,
  type RawConfig,
} from "./load.js";

export {
  CONFIG_ENV_VAR,
  resolveConfigPath,
  resolveServiceConfig,
  type ConfigOverrides,
  type ResolveConfigOptions,
  type ResolvedConfig,
} from "./resolve.js";
