/**
 * UNIX domain socket server for the counter protocol.
 *
 * Accepts any number of concurrent clients on a single event loop. Each
 * accepted socket gets its own {@link CounterConnection}; they share one
 * {@link CounterState}.
 *
 * @module server/counter-server
 */

import { existsSync, lstatSync, unlinkSync } from "node:fs";
import { type Server, type Socket, connect, createServer } from "node:net";
import type { CounterState } from "../counter/state.js";
import { BindError, describeCause, getErrorCode } from "../errors.js";
import { type Logger, silentLogger } from "../utils/logger.js";
import { CounterConnection } from "./connection.js";

/**
 * Options for creating a CounterServer.
 */
export interface CounterServerOptions {
  /** Path of the UNIX domain socket to listen on */
  socketPath: string;
  /** Counter shared by every connection */
  counter: CounterState;
  /** Called after a `get_counter_and_terminate` response has been flushed */
  onTerminate: () => void;
  logger?: Logger;
}

/**
 * Resolves true when something accepts connections on `socketPath`.
 * @internal
 */
function probeSocket(socketPath: string, timeoutMs = 1000): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = connect(socketPath);
    const finish = (live: boolean) => {
      clearTimeout(timeoutId);
      socket.destroy();
      resolve(live);
    };
    const timeoutId = setTimeout(() => finish(false), timeoutMs);
    socket.once("connect", () => finish(true));
    socket.once("error", () => finish(false));
  });
}

/**
 * Counter protocol server.
 *
 * @example
 * ```ts
 * const server = new CounterServer({
 *   socketPath: "/run/early.sock",
 *   counter,
 *   onTerminate: () => service.stop(),
 * });
 *
 * await server.start();
 * // ... serve ...
 * server.stop();
 * ```
 */
export class CounterServer {
  private readonly socketPath: string;
  private readonly counter: CounterState;
  private readonly onTerminate: () => void;
  private readonly logger: Logger;
  private server: Server | null = null;
  private readonly connections = new Set<CounterConnection>();
  private nextConnectionId = 1;

  constructor(options: CounterServerOptions) {
    this.socketPath = options.socketPath;
    this.counter = options.counter;
    this.onTerminate = options.onTerminate;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Binds the socket and starts accepting connections.
   *
   * A socket file with no listener behind it is removed first. A live
   * listener on the same path, or a path that is not a socket, is a bind
   * failure.
   *
   * @throws BindError if the socket cannot be bound
   */
  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    await this.clearStaleSocket();

    const server = createServer((socket) => {
      this.handleConnection(socket);
    });

    await new Promise<void>((resolve, reject) => {
      server.once("error", (error) => {
        reject(new BindError(this.socketPath, error));
      });
      try {
        server.listen(this.socketPath, () => resolve());
      } catch (error) {
        reject(new BindError(this.socketPath, error));
      }
    });

    server.on("error", (error) => {
      this.logger.error(`Counter server error: ${error.message}`);
    });
    this.server = server;
  }

  /**
   * Stops accepting connections, removes the socket file and closes every
   * connection still open. A response already flushed stays readable by
   * its peer.
   */
  stop(): void {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    server.close((error) => {
      if (error) {
        this.logger.warn(`Error closing counter server: ${error.message}`);
      }
    });

    try {
      if (existsSync(this.socketPath)) {
        unlinkSync(this.socketPath);
      }
    } catch (error) {
      this.logger.warn(`Could not remove socket file: ${describeCause(error)}`);
    }

    for (const connection of [...this.connections]) {
      connection.close();
    }
  }

  isServerRunning(): boolean {
    return this.server !== null;
  }

  getSocketPath(): string {
    return this.socketPath;
  }

  getConnectionCount(): number {
    return this.connections.size;
  }

  private async clearStaleSocket(): Promise<void> {
    let isSocket: boolean;
    try {
      isSocket = lstatSync(this.socketPath).isSocket();
    } catch (error) {
      if (getErrorCode(error) === "ENOENT") {
        return;
      }
      throw new BindError(this.socketPath, error);
    }

    if (!isSocket) {
      const exists = Object.assign(
        new Error("File exists and is not a socket"),
        { code: "EEXIST" },
      );
      throw new BindError(this.socketPath, exists);
    }

    if (await probeSocket(this.socketPath)) {
      const inUse = Object.assign(new Error("Address already in use"), {
        code: "EADDRINUSE",
      });
      throw new BindError(this.socketPath, inUse);
    }

    try {
      unlinkSync(this.socketPath);
      this.logger.debug(`Removed stale socket file ${this.socketPath}`);
    } catch (error) {
      // listen() reports whatever still blocks the path
      if (getErrorCode(error) !== "ENOENT") {
        this.logger.warn(
          `Could not remove stale socket file: ${describeCause(error)}`,
        );
      }
    }
  }

  private handleConnection(socket: Socket): void {
    const connection = new CounterConnection({
      id: this.nextConnectionId++,
      socket,
      counter: this.counter,
      logger: this.logger,
      onTerminate: this.onTerminate,
      onRelease: (released) => {
        this.connections.delete(released);
      },
    });
    this.connections.add(connection);
    void connection.run();
  }
}
