/**
 * Service lifecycle: handoff, ticker and server wired around one counter.
 *
 * @module service/lifecycle
 */

import { type HandoffOptions, fetchAndTerminate } from "../client/handoff.js";
import { CounterState } from "../counter/state.js";
import { DEFAULT_TICK_INTERVAL_MS, Ticker } from "../counter/ticker.js";
import { CounterServer } from "../server/counter-server.js";
import { type Logger, silentLogger } from "../utils/logger.js";

export type ServiceStatus = "idle" | "starting" | "running" | "stopped";

/**
 * Options for creating an EarlyService.
 */
export interface EarlyServiceOptions {
  /** Tick interval in milliseconds; 0 disables the ticker (default: 100) */
  timerDelayMs?: number;
  /** Socket to serve the counter on; unset means no server */
  serverSocketPath?: string | undefined;
  /** Socket of a running instance to take the starting counter from */
  clientSocketPath?: string | undefined;
  /** Timeout for the handoff client (default: 5000) */
  handoffTimeoutMs?: number;
  logger?: Logger;
}

/**
 * One running instance of the counter service.
 *
 * Startup order is handoff, ticker, server; teardown runs the other way
 * round. The instance stops when a client sends `get_counter_and_terminate`
 * (after the reply is flushed) or when {@link EarlyService.stop} is called.
 *
 * @example
 * ```ts
 * const service = new EarlyService({
 *   serverSocketPath: "/run/early.sock",
 *   clientSocketPath: "/run/early.sock",
 * });
 * await service.start();
 * await service.run();
 * ```
 */
export class EarlyService {
  private readonly timerDelayMs: number;
  private readonly serverSocketPath: string | undefined;
  private readonly clientSocketPath: string | undefined;
  private readonly handoffTimeoutMs: number | undefined;
  private readonly logger: Logger;
  private readonly counter = new CounterState();
  private ticker: Ticker | null = null;
  private server: CounterServer | null = null;
  private status: ServiceStatus = "idle";
  private readonly stopped: Promise<void>;
  private resolveStopped: () => void = () => {};

  constructor(options: EarlyServiceOptions = {}) {
    this.timerDelayMs = options.timerDelayMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.serverSocketPath = options.serverSocketPath;
    this.clientSocketPath = options.clientSocketPath;
    this.handoffTimeoutMs = options.handoffTimeoutMs;
    this.logger = options.logger ?? silentLogger;
    this.stopped = new Promise((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  /**
   * Reads the starting counter, then starts the ticker and the server.
   *
   * @throws BindError if the server socket cannot be bound; the service is
   * stopped by then
   */
  async start(): Promise<void> {
    if (this.status !== "idle") {
      return;
    }
    this.status = "starting";

    this.counter.set(await this.readInitialCounter());
    if (this.isStopped()) {
      return;
    }

    this.ticker = new Ticker(this.counter, {
      intervalMs: this.timerDelayMs,
      onTick: (value) => this.logger.info(String(value)),
    });
    this.ticker.start();

    if (!this.serverSocketPath) {
      this.logger.info("Not listening on a UNIX socket.");
      this.status = "running";
      return;
    }

    this.logger.info(`Listening on UNIX socket ${this.serverSocketPath}`);
    const server = new CounterServer({
      socketPath: this.serverSocketPath,
      counter: this.counter,
      onTerminate: () => this.stop(),
      logger: this.logger,
    });
    this.server = server;

    try {
      await server.start();
    } catch (error) {
      this.stop();
      throw error;
    }

    if (this.isStopped()) {
      server.stop();
      return;
    }
    this.status = "running";
  }

  /**
   * Resolves once the service has stopped.
   */
  run(): Promise<void> {
    return this.stopped;
  }

  /**
   * Stops accepting connections, removes the socket file, closes the
   * connections still open and cancels the ticker.
   */
  stop(): void {
    if (this.status === "stopped") {
      return;
    }
    this.status = "stopped";

    this.server?.stop();
    this.ticker?.stop();
    this.logger.debug("Service stopped");
    this.resolveStopped();
  }

  getCounter(): number {
    return this.counter.get();
  }

  getStatus(): ServiceStatus {
    return this.status;
  }

  getServer(): CounterServer | null {
    return this.server;
  }

  private isStopped(): boolean {
    return this.status === "stopped";
  }

  private async readInitialCounter(): Promise<number> {
    if (!this.clientSocketPath) {
      return 0;
    }

    this.logger.info(
      `Reading starting position from socket ${this.clientSocketPath}`,
    );
    const options: HandoffOptions = { logger: this.logger };
    if (this.handoffTimeoutMs !== undefined) {
      options.timeoutMs = this.handoffTimeoutMs;
    }
    return fetchAndTerminate(this.clientSocketPath, options);
  }
}
