/**
 * Combines the configuration file with command-line overrides.
 *
 * Precedence: command-line flag, then configuration file, then default.
 * The file is taken from `--config` or, failing that, from the
 * `EARLY_SERVICE_CONFIG` environment variable.
 *
 * @module config/resolve
 */

import { ZodError } from "zod";
import {
  ConfigValidationError,
  type RawConfig,
  readRawConfig,
} from "./load.js";
import {
  type LogLevel,
  type ServiceConfig,
  ServiceConfigSchema,
} from "./schema.js";

/** Environment variable naming a configuration file */
export const CONFIG_ENV_VAR = "EARLY_SERVICE_CONFIG";

/**
 * Settings given on the command line.
 */
export interface ConfigOverrides {
  timerDelayMs?: number;
  serverSocketPath?: string;
  clientSocketPath?: string;
  surviveSystemdKillSignal?: boolean;
  logLevel?: LogLevel;
}

export interface ResolveConfigOptions {
  /** Explicit configuration file (from --config) */
  configPath?: string | undefined;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedConfig {
  config: ServiceConfig;
  /** File the configuration was read from, if any */
  path: string | undefined;
}

export function resolveConfigPath(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  if (explicit) {
    return explicit;
  }
  const fromEnv = env[CONFIG_ENV_VAR];
  return fromEnv && fromEnv.length > 0 ? fromEnv : undefined;
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function applyOverrides(raw: RawConfig, overrides: ConfigOverrides): RawConfig {
  const merged: RawConfig = { ...raw };

  if (overrides.timerDelayMs !== undefined) {
    merged["timerDelayMs"] = overrides.timerDelayMs;
  }
  if (overrides.serverSocketPath !== undefined) {
    merged["serverSocketPath"] = overrides.serverSocketPath;
  }
  if (overrides.clientSocketPath !== undefined) {
    merged["clientSocketPath"] = overrides.clientSocketPath;
  }
  if (overrides.surviveSystemdKillSignal !== undefined) {
    merged["surviveSystemdKillSignal"] = overrides.surviveSystemdKillSignal;
  }
  if (overrides.logLevel !== undefined) {
    const logging = raw["logging"];
    merged["logging"] = {
      ...(isRecord(logging) ? logging : {}),
      level: overrides.logLevel,
    };
  }

  return merged;
}

/**
 * Loads and validates the effective service configuration.
 *
 * @throws ConfigNotFoundError, ConfigParseError or ConfigValidationError
 */
export function resolveServiceConfig(
  options: ResolveConfigOptions = {},
): ResolvedConfig {
  const path = resolveConfigPath(options.configPath, options.env);
  const raw = path ? readRawConfig(path) : {};
  const merged = applyOverrides(raw, options.overrides ?? {});

  try {
    return { config: ServiceConfigSchema.parse(merged), path };
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigValidationError(path ?? "command line", err);
    }
    throw err;
  }
}
