/**
 * Command-line interface argument parsing.
 *
 * Supports service mode (default) and a one-shot `send` mode that sends a
 * single command to a running service.
 *
 * @module cli
 */

import type { ConfigOverrides } from "../config/resolve.js";
import { type LogLevel, LogLevelSchema } from "../config/schema.js";
import { MAX_TICK_INTERVAL_MS } from "../counter/ticker.js";

/**
 * Parsed command-line arguments.
 */
export interface CliArgs {
  /** Operating mode: run the service, or send one command to a running one */
  mode: "serve" | "send";
  /** Whether --help was requested */
  help: boolean;
  /** Whether --version was requested */
  version: boolean;
  /** Configuration file given with --config */
  configPath: string | undefined;
  /** Settings that override the configuration file */
  overrides: ConfigOverrides;
  /** Send-specific options */
  send: SendArgs;
  /** Problems found while parsing; non-empty means the run should fail */
  errors: string[];
}

/**
 * Send-specific command-line arguments.
 */
export interface SendArgs {
  /** Command words, joined with spaces before sending */
  command: string[];
  /** Socket of the running service */
  socketPath?: string;
  /** Connection and response timeout in milliseconds (default: 5000) */
  timeout: number;
}

function isLogLevel(value: string): value is LogLevel {
  return LogLevelSchema.safeParse(value).success;
}

/**
 * Parses a non-negative decimal integer no larger than a timer accepts;
 * anything else is rejected.
 */
function parseMilliseconds(value: string): number | undefined {
  if (!/^[0-9]+$/.test(value)) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return parsed <= MAX_TICK_INTERVAL_MS ? parsed : undefined;
}

/**
 * Parses command-line arguments into structured CliArgs.
 *
 * Long options take `--flag value` or `--flag=value`; the underscore
 * spellings (`--timer_delay_ms`, ...) are accepted as well.
 *
 * @param args - Array of command-line arguments (without node/script)
 * @returns Parsed CLI arguments
 *
 * @example
 * ```ts
 * const args = parseArgs(["-s", "/run/early.sock", "-d", "250"]);
 * // args.overrides => { serverSocketPath: "/run/early.sock", timerDelayMs: 250 }
 * ```
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    mode: "serve",
    help: false,
    version: false,
    configPath: undefined,
    overrides: {},
    send: {
      command: [],
      timeout: 5000,
    },
    errors: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }

    // Get value for --flag=value format
    const eqIndex = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const argName = eqIndex > 0 ? arg.slice(0, eqIndex) : arg;
    const inlineValue = eqIndex > 0 ? arg.slice(eqIndex + 1) : undefined;

    const takeValue = (): string | undefined => {
      const value = inlineValue ?? args[++i];
      if (value === undefined || value.length === 0) {
        result.errors.push(`Missing value for ${argName}`);
        return undefined;
      }
      return value;
    };

    switch (argName) {
      case "send":
        if (result.mode === "send") {
          result.send.command.push(arg);
        } else {
          result.mode = "send";
        }
        break;

      case "--timer-delay-ms":
      case "--timer_delay_ms":
      case "-d": {
        const value = takeValue();
        if (value !== undefined) {
          const delay = parseMilliseconds(value);
          if (delay === undefined) {
            result.errors.push(
              `Invalid value for ${argName}: '${value}' (expected milliseconds)`,
            );
          } else {
            result.overrides.timerDelayMs = delay;
          }
        }
        break;
      }

      case "--server-socket-path":
      case "--server_socket_path":
      case "-s": {
        const value = takeValue();
        if (value !== undefined) {
          result.overrides.serverSocketPath = value;
        }
        break;
      }

      case "--client-socket-path":
      case "--client_socket_path":
      case "-c": {
        const value = takeValue();
        if (value !== undefined) {
          result.overrides.clientSocketPath = value;
        }
        break;
      }

      case "--survive-systemd-kill-signal":
      case "--survive_systemd_kill_signal":
        result.overrides.surviveSystemdKillSignal = true;
        break;

      case "--config": {
        const value = takeValue();
        if (value !== undefined) {
          result.configPath = value;
        }
        break;
      }

      case "--log-level": {
        const value = takeValue();
        if (value !== undefined) {
          if (isLogLevel(value)) {
            result.overrides.logLevel = value;
          } else {
            result.errors.push(
              `Invalid log level '${value}' (expected one of: ${LogLevelSchema.options.join(", ")})`,
            );
          }
        }
        break;
      }

      case "--socket": {
        const value = takeValue();
        if (value !== undefined) {
          result.send.socketPath = value;
        }
        break;
      }

      case "--timeout": {
        const value = takeValue();
        if (value !== undefined) {
          const timeout = parseMilliseconds(value);
          if (timeout === undefined || timeout === 0) {
            result.errors.push(
              `Invalid value for --timeout: '${value}' (expected milliseconds)`,
            );
          } else {
            result.send.timeout = timeout;
          }
        }
        break;
      }

      case "--help":
      case "-h":
        result.help = true;
        break;

      case "--version":
      case "-v":
        result.version = true;
        break;

      default:
        // Negative numbers are command words, not options
        if (
          result.mode === "send" &&
          (!arg.startsWith("-") || /^-[0-9]/.test(arg))
        ) {
          result.send.command.push(arg);
        } else if (arg.startsWith("-")) {
          result.errors.push(`Unknown option: ${arg}`);
        } else {
          result.errors.push(`Unexpected argument: ${arg}`);
        }
        break;
    }
  }

  if (result.mode === "send" && !result.help && !result.version) {
    if (result.send.command.length === 0) {
      result.errors.push("send: missing command");
    }
    if (!result.send.socketPath) {
      result.errors.push("send: missing --socket=<path>");
    }
  }

  return result;
}

/**
 * Prints the help message to stdout.
 */
export function printHelp(): void {
  console.log(`
early-service - Counter service with state handoff over a UNIX domain socket

Usage:
  early-service [options]                      Run the counter service
  early-service send <command> --socket=<path> Send one command to a running service
  early-service --help                         Show this help message
  early-service --version                      Show version information

Service Options:
  -d, --timer-delay-ms=<ms>       Timer delay in milliseconds (default: 100, 0 disables)
  -s, --server-socket-path=<path> Server UNIX domain socket path to listen on
  -c, --client-socket-path=<path> UNIX domain socket path to read current state
  --survive-systemd-kill-signal   Set the process title's first character to '@' when running in initrd
  --config=<path>                 TOML configuration file (also: $EARLY_SERVICE_CONFIG)
  --log-level=<level>             fatal, error, warn, info (default), debug, trace

Send Options:
  --socket=<path>                 Socket of the running service
  --timeout=<ms>                  Connection and response timeout (default: 5000)

Commands understood by the service:
  get_counter                     Reply with the counter
  get_counter_and_terminate       Reply with the counter, then shut down
  set_counter <n>                 Set the counter, reply with the previous value

Examples:
  early-service -s /run/early.sock
  early-service -c /run/early.sock -s /run/early.sock
  early-service send get_counter --socket=/run/early.sock
  early-service send set_counter 42 --socket=/run/early.sock
`);
}
