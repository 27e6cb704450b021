/**
 * Error classes for the counter service.
 *
 * Only bind failures are fatal. Connect failures are recovered by the
 * handoff client, and per-connection I/O failures tear down that one
 * connection. Unknown commands are not errors at all: they get an
 * `Invalid command` reply.
 *
 * @module errors
 */

/**
 * Base error class for the service.
 * All service errors extend this class.
 */
export class EarlyServiceError extends Error {
  constructor(
    message: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "EarlyServiceError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * The listening socket could not be created.
 * Thrown when the path is in use by a live server, permission is denied,
 * the path is too long, or its directory does not exist.
 */
export class BindError extends EarlyServiceError {
  constructor(
    public readonly socketPath: string,
    cause?: unknown,
  ) {
    super(`Error binding socket ${socketPath}: ${describeCause(cause)}`, cause);
    this.name = "BindError";
  }
}

/**
 * A peer socket could not be reached.
 */
export class ConnectError extends EarlyServiceError {
  constructor(
    public readonly socketPath: string,
    cause?: unknown,
  ) {
    super(
      `Error connecting to socket ${socketPath}: ${describeCause(cause)}`,
      cause,
    );
    this.name = "ConnectError";
  }
}

/**
 * A read or write failed on an accepted connection.
 */
export class ConnectionIOError extends EarlyServiceError {
  constructor(
    public readonly operation: "read" | "write",
    cause?: unknown,
  ) {
    super(`Connection ${operation} failed: ${describeCause(cause)}`, cause);
    this.name = "ConnectionIOError";
  }
}

/**
 * Renders an unknown thrown value as a message.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (cause === undefined) {
    return "unknown error";
  }
  return String(cause);
}

/**
 * Reads the `code` property of a Node.js system error, if present.
 */
export function getErrorCode(err: unknown): string | undefined {
  const code =
    err && typeof err === "object" && "code" in err ? err.code : undefined;
  return typeof code === "string" ? code : undefined;
}
