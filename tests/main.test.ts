import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  type MockInstance,
  afterEach,
  beforeEach,
  describe,
  expect,
  test,
  vi,
} from "vitest";
import { CounterState } from "../src/counter/state.js";
import { main } from "../src/index.js";
import { CounterServer } from "../src/server/counter-server.js";
import { VERSION, readPackageVersion } from "../src/version.js";
import { makeSocketDir } from "./helpers/socket-dir.js";

describe("main", () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("--version prints the package version", async () => {
    expect(await main(["--version"])).toBe(0);
    expect(logSpy).toHaveBeenCalledWith("early-service v0.1.0");
  });

  test("--help prints usage", async () => {
    expect(await main(["--help"])).toBe(0);
    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  test("invalid options exit with 1", async () => {
    expect(await main(["-d", "soon"])).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(
      "option parsing failed: Invalid value for -d: 'soon' (expected milliseconds)",
    );
  });

  test("a missing configuration file exits with 1", async () => {
    const { dir, cleanup } = makeSocketDir();
    try {
      const path = join(dir, "missing.toml");
      expect(await main(["--config", path])).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(
        `Error loading configuration: Configuration file not found: ${path}`,
      );
    } finally {
      cleanup();
    }
  });

  describe("send", () => {
    test("prints the response of a running service", async () => {
      const { dir, cleanup } = makeSocketDir();
      const socketPath = join(dir, "a.sock");
      const server = new CounterServer({
        socketPath,
        counter: new CounterState(7),
        onTerminate: () => {},
      });
      await server.start();
      try {
        expect(
          await main(["send", "set_counter", "9", `--socket=${socketPath}`]),
        ).toBe(0);
        expect(logSpy).toHaveBeenCalledWith("previous value 7");
      } finally {
        server.stop();
        cleanup();
      }
    });

    test("fails when nothing listens", async () => {
      const { dir, cleanup } = makeSocketDir();
      try {
        const socketPath = join(dir, "absent.sock");
        expect(
          await main(["send", "get_counter", `--socket=${socketPath}`]),
        ).toBe(1);
        expect(errorSpy).toHaveBeenCalledTimes(1);
      } finally {
        cleanup();
      }
    });
  });
});

describe("readPackageVersion", () => {
  test("matches the version in package.json", () => {
    const manifest: unknown = JSON.parse(
      readFileSync(new URL("../package.json", import.meta.url), "utf8"),
    );
    expect(manifest).toMatchObject({ version: readPackageVersion() });
    expect(VERSION).toBe(readPackageVersion());
  });

  test("falls back when the manifest has no version", () => {
    const dir = mkdtempSync(join(tmpdir(), "early-"));
    try {
      const manifestPath = join(dir, "package.json");
      writeFileSync(manifestPath, JSON.stringify({ name: "unversioned" }));
      expect(readPackageVersion(manifestPath)).toBe("0.0.0");
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
