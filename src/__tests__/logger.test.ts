import { describe, it, expect, afterEach, vi } from "vitest";
import { Logger, shouldUseColor } from "../logger.js";
import { captureLogger } from "./helpers.js";

describe("Logger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("prefixes each level", () => {
    const { logger, out, err } = captureLogger();

    logger.info("scanning");
    logger.success("done");
    logger.warn("careful");
    logger.error("broken");

    expect(out).toEqual(["[INFO] scanning", "[SUCCESS] done", "[WARNING] careful"]);
    expect(err).toEqual(["[ERROR] broken"]);
  });

  it("prints debug lines only when verbose", () => {
    const quiet = captureLogger(false);
    const loud = captureLogger(true);

    quiet.logger.debug("detail");
    loud.logger.debug("detail");

    expect(quiet.out).toEqual([]);
    expect(loud.out).toEqual(["[DEBUG] detail"]);
  });

  it("colours the label", () => {
    const lines: string[] = [];
    const logger = new Logger({ color: true, sink: { out: (l) => lines.push(l), err: (l) => lines.push(l) } });

    logger.success("done");

    expect(lines).toEqual(["\x1b[0;32m[SUCCESS]\x1b[0m done"]);
  });

  it("uses colour only on a TTY without NO_COLOR", () => {
    vi.stubEnv("NO_COLOR", "");
    expect(shouldUseColor(true, { isTTY: true })).toBe(true);
    expect(shouldUseColor(true, { isTTY: false })).toBe(false);
    expect(shouldUseColor(false, { isTTY: true })).toBe(false);

    vi.stubEnv("NO_COLOR", "1");
    expect(shouldUseColor(true, { isTTY: true })).toBe(false);
  });
});
