#!/usr/bin/env node
/**
 * early-service - Main entry point.
 *
 * A counter service meant to be started early in boot and replaced later by
 * a second instance of itself. The counter is served on a UNIX domain
 * socket; the replacement reads it from there with
 * `get_counter_and_terminate`, which also makes the early instance exit.
 *
 * @module early-service
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { CounterClient } from "./client/counter-client.js";
import { type CliArgs, type SendArgs, parseArgs, printHelp } from "./cli/index.js";
import {
  ConfigError,
  type ServiceConfig,
  resolveServiceConfig,
} from "./config/index.js";
import { BindError } from "./errors.js";
import { EarlyService } from "./service/lifecycle.js";
import { applySurviveKillSignal } from "./service/process-title.js";
import { createLogger } from "./utils/logger.js";
import { VERSION } from "./version.js";

export { VERSION };
export { fetchAndTerminate, type HandoffOptions } from "./client/handoff.js";
export {
  CounterClient,
  type CounterClientOptions,
} from "./client/counter-client.js";
export { CounterState } from "./counter/state.js";
export { Ticker, type TickerOptions } from "./counter/ticker.js";
export {
  CounterServer,
  type CounterServerOptions,
} from "./server/counter-server.js";
export { EarlyService, type EarlyServiceOptions } from "./service/lifecycle.js";
export * from "./errors.js";

/** Teardown budget before the process is forced out */
const SHUTDOWN_TIMEOUT_MS = 2000;

/**
 * Sends one command to a running service and prints the response.
 * @internal
 */
async function runSend(args: SendArgs): Promise<number> {
  const socketPath = args.socketPath;
  if (!socketPath) {
    console.error("Error: send requires --socket=<path>");
    return 1;
  }

  const client = new CounterClient({ socketPath, timeout: args.timeout });
  try {
    await client.connect();
    console.log(await client.send(args.command.join(" ")));
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    return 1;
  } finally {
    client.disconnect();
  }
}

/**
 * Runs the counter service until it is told to terminate.
 * @internal
 */
async function runService(args: CliArgs): Promise<number> {
  let config: ServiceConfig;
  try {
    ({ config } = resolveServiceConfig({
      configPath: args.configPath,
      overrides: args.overrides,
    }));
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error loading configuration: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const logger = createLogger({ level: config.logging.level });

  if (config.surviveSystemdKillSignal) {
    applySurviveKillSignal();
  }

  const service = new EarlyService({
    timerDelayMs: config.timerDelayMs,
    serverSocketPath: config.serverSocketPath,
    clientSocketPath: config.clientSocketPath,
    logger,
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    // Force exit if teardown hangs
    const forceExitTimer = setTimeout(() => {
      logger.error("Forcing shutdown after timeout");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExitTimer.unref();
    service.stop();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  try {
    await service.start();
  } catch (error) {
    if (error instanceof BindError) {
      logger.fatal(error.message);
      return 1;
    }
    throw error;
  }

  await service.run();
  return 0;
}

/**
 * Main entry point for the CLI.
 * Parses arguments and dispatches to the selected mode.
 *
 * @returns Process exit code
 */
export async function main(
  argv: string[] = process.argv.slice(2),
): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    printHelp();
    return 0;
  }

  if (args.version) {
    console.log(`early-service v${VERSION}`);
    return 0;
  }

  if (args.errors.length > 0) {
    for (const message of args.errors) {
      console.error(`option parsing failed: ${message}`);
    }
    console.error("Run 'early-service --help' for usage.");
    return 1;
  }

  switch (args.mode) {
    case "send":
      return runSend(args.send);
    case "serve":
      return runService(args);
  }
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked) {
    return false;
  }
  try {
    return realpathSync(invoked) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().then(
    (code) => {
      process.exit(code);
    },
    (error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Fatal error: ${message}`);
      process.exit(1);
    },
  );
}
