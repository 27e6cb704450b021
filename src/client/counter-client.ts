/**
 * UNIX domain socket client for the counter protocol.
 *
 * Holds one connection and sends commands over it one at a time.
 *
 * @module client/counter-client
 */

import { type Socket, connect } from "node:net";
import { ConnectError } from "../errors.js";
import { parseIntegerOrZero } from "../server/protocol.js";

const PREVIOUS_VALUE_PREFIX = "previous value ";

/**
 * Options for creating a CounterClient.
 */
export interface CounterClientOptions {
  /** Path to the Unix Domain Socket file */
  socketPath: string;
  /** Connection and response timeout in milliseconds (default: 5000) */
  timeout?: number;
}

/**
 * Counter protocol client.
 *
 * @example
 * ```ts
 * const client = new CounterClient({ socketPath: "/run/early.sock" });
 * await client.connect();
 *
 * const previous = await client.setCounter(42);
 * const current = await client.getCounter();
 *
 * client.disconnect();
 * ```
 */
export class CounterClient {
  private readonly socketPath: string;
  private readonly timeout: number;
  private socket: Socket | null = null;
  private isConnected = false;
  private pending = false;

  constructor(options: CounterClientOptions) {
    this.socketPath = options.socketPath;
    this.timeout = options.timeout ?? 5000;
  }

  /**
   * Connects to the counter server.
   *
   * @throws ConnectError if the socket cannot be reached in time
   */
  async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const socket = connect(this.socketPath);
      this.socket = socket;

      const timeoutId = setTimeout(() => {
        socket.destroy();
        reject(
          new ConnectError(
            this.socketPath,
            new Error(`Connection timeout after ${this.timeout}ms`),
          ),
        );
      }, this.timeout);

      const handleConnectError = (error: Error) => {
        clearTimeout(timeoutId);
        this.isConnected = false;
        reject(new ConnectError(this.socketPath, error));
      };

      socket.once("error", handleConnectError);
      socket.once("connect", () => {
        clearTimeout(timeoutId);
        socket.off("error", handleConnectError);
        // Errors after connect are reported by send().
        socket.on("error", () => {
          this.isConnected = false;
        });
        this.isConnected = true;
        resolve();
      });

      socket.on("close", () => {
        this.isConnected = false;
      });
    });
  }

  disconnect(): void {
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
    this.isConnected = false;
  }

  isClientConnected(): boolean {
    return this.isConnected;
  }

  /**
   * Sends one command and returns the response line without its newline.
   *
   * @throws Error if not connected, if a command is already in flight, on
   * timeout, or if the server closes before answering
   */
  async send(command: string): Promise<string> {
    const socket = this.socket;
    if (!this.isConnected || !socket) {
      throw new Error("Not connected to counter server");
    }
    if (this.pending) {
      throw new Error("A command is already in flight");
    }
    this.pending = true;

    try {
      return await new Promise<string>((resolve, reject) => {
        let buffer = "";

        const cleanup = () => {
          clearTimeout(timeoutId);
          socket.off("data", handleData);
          socket.off("error", handleError);
          socket.off("close", handleClose);
        };

        const handleData = (data: Buffer) => {
          buffer += data.toString("latin1");
          const newline = buffer.indexOf("\n");
          if (newline !== -1) {
            cleanup();
            resolve(buffer.slice(0, newline));
          }
        };

        const handleError = (error: Error) => {
          cleanup();
          reject(new Error(`Socket error: ${error.message}`));
        };

        const handleClose = () => {
          cleanup();
          reject(new Error("Connection closed before a response was received"));
        };

        const timeoutId = setTimeout(() => {
          cleanup();
          reject(new Error(`Command timeout after ${this.timeout}ms`));
        }, this.timeout);

        socket.on("data", handleData);
        socket.on("error", handleError);
        socket.on("close", handleClose);
        socket.write(command.endsWith("\n") ? command : `${command}\n`);
      });
    } finally {
      this.pending = false;
    }
  }

  async getCounter(): Promise<number> {
    return parseIntegerOrZero(await this.send("get_counter"));
  }

  /**
   * Overwrites the counter.
   *
   * @returns The value the counter held before
   */
  async setCounter(value: number): Promise<number> {
    const response = await this.send(`set_counter ${value}`);
    if (!response.startsWith(PREVIOUS_VALUE_PREFIX)) {
      throw new Error(`Unexpected response: ${response}`);
    }
    return parseIntegerOrZero(response.slice(PREVIOUS_VALUE_PREFIX.length));
  }

  /**
   * Reads the counter and asks the server process to stop.
   */
  async getCounterAndTerminate(): Promise<number> {
    return parseIntegerOrZero(await this.send("get_counter_and_terminate"));
  }
}
