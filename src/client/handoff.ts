/**
 * Handoff client: reads the counter from a running instance and makes that
 * instance terminate.
 *
 * Runs once at startup, before the ticker and server exist. The caller
 * awaits it, so nothing else is scheduled while it is outstanding.
 *
 * @module client/handoff
 */

import { connect } from "node:net";
import { ConnectError, describeCause } from "../errors.js";
import {
  GET_COUNTER_AND_TERMINATE_COMMAND,
  parseIntegerOrZero,
} from "../server/protocol.js";
import { type Logger, silentLogger } from "../utils/logger.js";

/** Bytes of the reply that are parsed */
const RESPONSE_BUFFER_LEN = 99;

export interface HandoffOptions {
  /**
   * Bound on connecting, and on waiting for the peer to hang up after it
   * answered (default: 5000)
   */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Sends `get_counter_and_terminate` to the instance listening on
 * `peerSocketPath` and returns the value it reports.
 *
 * Every failure resolves to 0: no peer, a peer that is not ready, a failed
 * write, or a peer that hangs up without answering. The first chunk of the
 * reply is trusted to hold the whole response. After the value arrives the
 * client waits for the peer to close the connection, by which time the peer
 * no longer listens on its socket.
 *
 * @example
 * ```ts
 * const initial = await fetchAndTerminate("/run/early.sock");
 * ```
 */
export function fetchAndTerminate(
  peerSocketPath: string,
  options: HandoffOptions = {},
): Promise<number> {
  const timeoutMs = options.timeoutMs ?? 5000;
  const logger = options.logger ?? silentLogger;

  return new Promise((resolve) => {
    let connected = false;
    let value: number | null = null;
    let settled = false;

    const socket = connect(peerSocketPath);

    const settle = (result: number) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timeoutId);
      socket.destroy();
      resolve(result);
    };

    const timeoutId = setTimeout(() => {
      if (!connected) {
        logger.warn(
          new ConnectError(
            peerSocketPath,
            new Error(`Connection timeout after ${timeoutMs}ms`),
          ).message,
        );
        settle(0);
        return;
      }
      if (value !== null) {
        logger.debug("Peer did not close the connection after answering");
        settle(value);
        return;
      }
      logger.warn(`Error reading from socket: no response after ${timeoutMs}ms`);
      settle(0);
    }, timeoutMs);

    socket.once("connect", () => {
      connected = true;
      socket.write(GET_COUNTER_AND_TERMINATE_COMMAND, (error) => {
        if (error) {
          logger.warn(`Error writing to socket: ${error.message}`);
          settle(0);
        }
      });
    });

    socket.once("data", (chunk: Buffer) => {
      const end = Math.min(chunk.length, RESPONSE_BUFFER_LEN);
      value = parseIntegerOrZero(chunk.toString("latin1", 0, end));
      logger.debug(`Peer reported counter ${value}`);
    });

    socket.on("error", (error) => {
      if (!connected) {
        logger.warn(new ConnectError(peerSocketPath, error).message);
      } else if (value === null) {
        logger.warn(`Error reading from socket: ${describeCause(error)}`);
      }
      settle(value ?? 0);
    });

    socket.on("close", () => {
      if (connected && value === null) {
        logger.warn("Error reading from socket: peer closed without a response");
      }
      settle(value ?? 0);
    });
  });
}
