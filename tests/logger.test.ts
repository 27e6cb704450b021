import { afterEach, describe, expect, test, vi } from "vitest";
import { createLogger, formatLine, silentLogger } from "../src/utils/logger.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("drops messages more verbose than the level", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "warn", write: (l) => lines.push(l) });

    logger.trace("t");
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");
    logger.fatal("f");

    expect(lines).toEqual(["[warn] w", "[error] e", "[fatal] f"]);
  });

  test("defaults to info on stderr", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger();

    logger.debug("hidden");
    logger.info("Listening");

    expect(logger.level).toBe("info");
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith("[info] Listening");
  });

  test("formatLine prefixes the level", () => {
    expect(formatLine("debug", "x")).toBe("[debug] x");
  });

  test("silentLogger writes nothing", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    silentLogger.fatal("nothing");
    expect(errorSpy).not.toHaveBeenCalled();
  });
});
