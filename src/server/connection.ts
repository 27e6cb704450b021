/**
 * Per-connection protocol state machine.
 *
 * @module server/connection
 */

import type { Socket } from "node:net";
import type { CounterState } from "../counter/state.js";
import { ConnectionIOError } from "../errors.js";
import type { Logger } from "../utils/logger.js";
import { executeCommand, extractCommand, parseCommand } from "./protocol.js";

/**
 * Connection states:
 * `awaiting-command → dispatching → awaiting-flush → (awaiting-command | terminated)`.
 * Any I/O error or peer close also ends in `terminated`.
 */
export type ConnectionState =
  | "awaiting-command"
  | "dispatching"
  | "awaiting-flush"
  | "terminated";

export interface CounterConnectionOptions {
  id: number;
  socket: Socket;
  counter: CounterState;
  logger: Logger;
  /** Called once the response to `get_counter_and_terminate` is flushed */
  onTerminate: () => void;
  /** Called when the connection has been released */
  onRelease?: (connection: CounterConnection) => void;
}

function writeAll(socket: Socket, data: string): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(data, (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

/**
 * One accepted client. Reads a command, writes its response, and reads the
 * next command until the peer goes away or asks the process to terminate.
 * A read is never issued while a write is pending and vice versa.
 */
export class CounterConnection {
  readonly id: number;
  private readonly socket: Socket;
  private readonly counter: CounterState;
  private readonly logger: Logger;
  private readonly onTerminate: () => void;
  private readonly onRelease: ((connection: CounterConnection) => void) | undefined;
  private state: ConnectionState = "awaiting-command";
  private terminateAtEnd = false;
  private closing = false;

  constructor(options: CounterConnectionOptions) {
    this.id = options.id;
    this.socket = options.socket;
    this.counter = options.counter;
    this.logger = options.logger;
    this.onTerminate = options.onTerminate;
    this.onRelease = options.onRelease;
  }

  /**
   * Ends the connection from the server side. No further command is read.
   */
  close(): void {
    this.closing = true;
    this.socket.destroy();
  }

  /**
   * Services the connection until it is released.
   * Never rejects: I/O failures are logged and end the connection.
   */
  async run(): Promise<void> {
    this.logger.debug(`Connection ${this.id} accepted`);
    try {
      for await (const chunk of this.socket) {
        const data: Buffer = Buffer.isBuffer(chunk)
          ? chunk
          : Buffer.from(String(chunk), "latin1");
        if (!(await this.handleRead(data))) {
          return;
        }
      }
      this.logger.debug(`Connection ${this.id} closed by peer`);
    } catch (error) {
      if (!this.closing) {
        this.logger.warn(new ConnectionIOError("read", error).message);
      }
    } finally {
      this.release();
    }
  }

  /**
   * Dispatches one read and flushes the response.
   *
   * @returns Whether another command should be read
   */
  private async handleRead(data: Buffer): Promise<boolean> {
    this.state = "dispatching";
    const line = extractCommand(data);
    const result = executeCommand(parseCommand(line), this.counter, this.logger);
    this.terminateAtEnd = result.terminate;

    this.state = "awaiting-flush";
    try {
      await writeAll(this.socket, result.response);
    } catch (error) {
      if (!this.closing) {
        this.logger.warn(new ConnectionIOError("write", error).message);
      }
      return false;
    }

    if (this.terminateAtEnd) {
      // Stop listening before the peer can observe the end of this stream.
      this.onTerminate();
      return false;
    }

    this.state = "awaiting-command";
    return true;
  }

  private release(): void {
    if (this.state === "terminated") {
      return;
    }
    this.state = "terminated";
    this.socket.destroy();
    this.logger.debug(`Connection ${this.id} released`);
    this.onRelease?.(this);
  }
}
