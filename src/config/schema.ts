/**
 * Configuration schema definitions using Zod.
 *
 * Configuration files are TOML with a versioned schema. Every key is
 * optional; command-line flags override whatever the file sets.
 *
 * @module config/schema
 */

import { z } from "zod";
import { MAX_TICK_INTERVAL_MS } from "../counter/ticker.js";

/** Current configuration schema version */
export const LATEST_SCHEMA_VERSION = 1;

/**
 * Schema for log levels (fatal through trace).
 */
export const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
]);

/** Available log levels */
export type LogLevel = z.infer<typeof LogLevelSchema>;

/** Schema for logging configuration */
export const LoggingSchema = z.object({
  level: LogLevelSchema.default("info"),
});

/**
 * Root configuration schema.
 */
export const ServiceConfigSchema = z
  .object({
    schemaVersion: z.literal(LATEST_SCHEMA_VERSION).default(LATEST_SCHEMA_VERSION),
    /** Tick interval in milliseconds; 0 disables the ticker */
    timerDelayMs: z
      .number()
      .int()
      .min(0)
      .max(MAX_TICK_INTERVAL_MS)
      .default(100),
    /** UNIX domain socket to listen on; unset means no server */
    serverSocketPath: z.string().min(1).optional(),
    /** UNIX domain socket to read the starting counter from */
    clientSocketPath: z.string().min(1).optional(),
    /** Prefix the process title with '@' so systemd spares it at switch-root */
    surviveSystemdKillSignal: z.boolean().default(false),
    logging: LoggingSchema.default({ level: "info" }),
  })
  .strict();

/** Complete service configuration type */
export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

/** Default configuration with all defaults applied */
export const DEFAULT_CONFIG: ServiceConfig = ServiceConfigSchema.parse({});
