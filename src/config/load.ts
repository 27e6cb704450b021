import { readFileSync } from "node:fs";
import { parse as parseToml } from "smol-toml";
import { ZodError } from "zod";
import { getErrorCode } from "../errors.js";
import { type ServiceConfig, ServiceConfigSchema } from "./schema.js";

export class ConfigError extends Error {
  override cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "ConfigError";
    this.cause = cause;
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(public readonly filePath: string) {
    super(`Configuration file not found: ${filePath}`);
    this.name = "ConfigNotFoundError";
  }
}

export class ConfigParseError extends ConfigError {
  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    super(`Failed to parse config file: ${filePath}`, cause);
    this.name = "ConfigParseError";
  }
}

export class ConfigValidationError extends ConfigError {
  constructor(
    public readonly filePath: string,
    public readonly zodError: ZodError,
  ) {
    super(`Invalid configuration in ${filePath}:\n${formatIssues(zodError)}`, zodError);
    this.name = "ConfigValidationError";
  }
}

export function formatIssues(zodError: ZodError): string {
  return zodError.issues
    .map((i) => `  - ${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("\n");
}

/**
 * Raw, unvalidated contents of a configuration file.
 */
export type RawConfig = { [key: string]: unknown };

export function readRawConfig(filePath: string): RawConfig {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (err) {
    if (getErrorCode(err) === "ENOENT") {
      throw new ConfigNotFoundError(filePath);
    }
    throw new ConfigParseError(filePath, err);
  }

  try {
    return parseToml(content);
  } catch (err) {
    throw new ConfigParseError(filePath, err);
  }
}

export function loadConfigFromPath(filePath: string): ServiceConfig {
  const rawConfig = readRawConfig(filePath);

  try {
    return ServiceConfigSchema.parse(rawConfig);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigValidationError(filePath, err);
    }
    throw err;
  }
}
