import { existsSync } from "node:fs";
import { type Server, type Socket, createServer } from "node:net";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { fetchAndTerminate } from "../src/client/handoff.js";
import { CounterState } from "../src/counter/state.js";
import { CounterServer } from "../src/server/counter-server.js";
import { makeSocketDir, recordingLogger } from "./helpers/socket-dir.js";

/**
 * Starts a stand-in peer whose behavior on each request is scripted.
 */
function startFakePeer(
  socketPath: string,
  onRequest: (socket: Socket, request: string) => void,
): Promise<Server> {
  const server = createServer((socket) => {
    socket.once("data", (data: Buffer) => onRequest(socket, data.toString()));
    socket.on("error", () => {});
  });
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(socketPath, () => resolve(server));
  });
}

describe("fetchAndTerminate", () => {
  let dir: string;
  let cleanup: () => void;
  const fakes: Server[] = [];

  beforeEach(() => {
    ({ dir, cleanup } = makeSocketDir());
  });

  afterEach(async () => {
    for (const fake of fakes.splice(0)) {
      await new Promise<void>((resolve) => fake.close(() => resolve()));
    }
    cleanup();
  });

  test("returns 0 when nothing listens on the path", async () => {
    const { logger, lines } = recordingLogger();
    const value = await fetchAndTerminate(join(dir, "absent.sock"), { logger });

    expect(value).toBe(0);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(
      /^\[warn\] Error connecting to socket .*absent\.sock: /,
    );
  });

  test("reads the counter from a running server and makes it stop", async () => {
    const socketPath = join(dir, "peer.sock");
    const counter = new CounterState(42);
    let terminated = false;
    const peer: CounterServer = new CounterServer({
      socketPath,
      counter,
      onTerminate: () => {
        terminated = true;
        peer.stop();
      },
    });
    await peer.start();

    const value = await fetchAndTerminate(socketPath);

    expect(value).toBe(42);
    expect(terminated).toBe(true);
    expect(peer.isServerRunning()).toBe(false);
    expect(existsSync(socketPath)).toBe(false);
  });

  test("sends exactly get_counter_and_terminate", async () => {
    const socketPath = join(dir, "fake.sock");
    let request = "";
    fakes.push(
      await startFakePeer(socketPath, (socket, received) => {
        request = received;
        socket.end("17\n");
      }),
    );

    expect(await fetchAndTerminate(socketPath)).toBe(17);
    expect(request).toBe("get_counter_and_terminate\n");
  });

  test("parses the leading integer of the reply", async () => {
    const socketPath = join(dir, "fake.sock");
    fakes.push(
      await startFakePeer(socketPath, (socket) => {
        socket.end("  -12 and more\n");
      }),
    );

    expect(await fetchAndTerminate(socketPath)).toBe(-12);
  });

  test("a reply without a number gives 0", async () => {
    const socketPath = join(dir, "fake.sock");
    fakes.push(
      await startFakePeer(socketPath, (socket) => {
        socket.end("Invalid command\n");
      }),
    );

    expect(await fetchAndTerminate(socketPath)).toBe(0);
  });

  test("a peer that hangs up without answering gives 0", async () => {
    const socketPath = join(dir, "fake.sock");
    fakes.push(
      await startFakePeer(socketPath, (socket) => {
        socket.end();
      }),
    );
    const { logger, lines } = recordingLogger();

    expect(await fetchAndTerminate(socketPath, { logger })).toBe(0);
    expect(lines).toContain(
      "[warn] Error reading from socket: peer closed without a response",
    );
  });

  test("returns the value when the peer answers but never hangs up", async () => {
    const socketPath = join(dir, "fake.sock");
    fakes.push(
      await startFakePeer(socketPath, (socket) => {
        socket.write("7\n");
      }),
    );

    expect(await fetchAndTerminate(socketPath, { timeoutMs: 200 })).toBe(7);
  });

  test("gives 0 when the peer never answers", async () => {
    const socketPath = join(dir, "fake.sock");
    fakes.push(await startFakePeer(socketPath, () => {}));
    const { logger, lines } = recordingLogger();

    expect(await fetchAndTerminate(socketPath, { timeoutMs: 200, logger })).toBe(
      0,
    );
    expect(lines).toContain(
      "[warn] Error reading from socket: no response after 200ms",
    );
  });
});
