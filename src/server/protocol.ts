/**
 * Line-oriented counter protocol.
 *
 * Requests and responses are ASCII text terminated by `\n`, one command per
 * read and one response per command:
 *
 * | Request                      | Response                     |
 * |------------------------------|------------------------------|
 * | `get_counter`                | `<counter>\n`                |
 * | `get_counter_and_terminate`  | `<counter>\n`, then shutdown |
 * | `set_counter <integer>`      | `previous value <old>\n`     |
 * | anything else                | `Invalid command\n`          |
 *
 * @module server/protocol
 */

import type { CounterState } from "../counter/state.js";
import type { Logger } from "../utils/logger.js";

/** Largest number of bytes of a read that are looked at */
export const READ_BUFFER_LEN = 127;

/** Request sent by the handoff client */
export const GET_COUNTER_AND_TERMINATE_COMMAND = "get_counter_and_terminate\n";

export const INVALID_COMMAND_RESPONSE = "Invalid command\n";

const SET_COUNTER_PREFIX = "set_counter ";

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

/**
 * A parsed request.
 */
export type CounterCommand =
  | { type: "get_counter" }
  | { type: "get_counter_and_terminate" }
  | { type: "set_counter"; value: number }
  | { type: "invalid"; text: string };

/**
 * Outcome of running a command against the counter.
 */
export interface CommandResult {
  /** Bytes to write back, newline included */
  response: string;
  /** Whether the process stops once the response is flushed */
  terminate: boolean;
}

/**
 * Extracts the single command carried by one read.
 *
 * Only the first {@link READ_BUFFER_LEN} bytes count. The command ends at the
 * first `\n` (or NUL byte); whatever follows is dropped, so two commands
 * pipelined in one write yield only the first.
 */
export function extractCommand(chunk: Buffer): string {
  let end = Math.min(chunk.length, READ_BUFFER_LEN);

  const newline = chunk.indexOf(0x0a);
  if (newline !== -1 && newline < end) {
    end = newline;
  }
  const nul = chunk.indexOf(0x00);
  if (nul !== -1 && nul < end) {
    end = nul;
  }

  return chunk.toString("latin1", 0, end);
}

/**
 * Parses a base-10 integer the way `strtoll` does: leading ASCII whitespace,
 * an optional sign, then digits up to the first non-digit. Text without
 * digits parses as 0. Results outside the signed 32-bit range saturate.
 */
export function parseIntegerOrZero(text: string): number {
  const match = /^[ \t\n\v\f\r]*([+-]?)([0-9]+)/.exec(text);
  if (!match) {
    return 0;
  }

  const magnitude = Number(match[2]);
  if (magnitude === 0) {
    return 0;
  }
  const value = match[1] === "-" ? -magnitude : magnitude;

  if (value < INT32_MIN) {
    return INT32_MIN;
  }
  if (value > INT32_MAX) {
    return INT32_MAX;
  }
  return value;
}

/**
 * Classifies one command line. Matching is exact and case-sensitive.
 */
export function parseCommand(line: string): CounterCommand {
  if (line === "get_counter") {
    return { type: "get_counter" };
  }
  if (line === "get_counter_and_terminate") {
    return { type: "get_counter_and_terminate" };
  }
  if (line.startsWith(SET_COUNTER_PREFIX)) {
    return {
      type: "set_counter",
      value: parseIntegerOrZero(line.slice(SET_COUNTER_PREFIX.length)),
    };
  }
  return { type: "invalid", text: line };
}

/**
 * Runs a command against the counter and builds its response.
 */
export function executeCommand(
  command: CounterCommand,
  counter: CounterState,
  logger: Logger,
): CommandResult {
  switch (command.type) {
    case "get_counter":
      logger.info("Returning counter to client");
      return { response: `${counter.get()}\n`, terminate: false };

    case "get_counter_and_terminate":
      logger.info("Returning counter to client and terminating the process");
      return { response: `${counter.get()}\n`, terminate: true };

    case "set_counter": {
      logger.info(`Setting the counter to ${command.value}`);
      const previous = counter.set(command.value);
      return { response: `previous value ${previous}\n`, terminate: false };
    }

    case "invalid":
      logger.info(`Unknown message '${command.text}' from client`);
      return { response: INVALID_COMMAND_RESPONSE, terminate: false };
  }
}
