import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "./logger.js";
import type { LoggingConfig } from "../config/types.js";

function config(overrides: Partial<LoggingConfig> = {}): LoggingConfig {
  return { level: "info", jsonLogs: false, timestamps: false, ...overrides };
}

function captureConsole() {
  return {
    logSpy: vi.spyOn(console, "log").mockImplementation(() => {}),
    errorSpy: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("filters below the configured level", () => {
    const { logSpy } = captureConsole();
    const logger = createLogger("rt", config({ level: "warn" }));

    logger.info("hidden");
    logger.warn("shown");

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith("[WARN ] (rt) shown");
  });

  it("routes errors to stderr", () => {
    const { errorSpy } = captureConsole();
    const logger = createLogger("rt", config());

    logger.error("boom", { code: 1 });

    expect(errorSpy).toHaveBeenCalledWith('[ERROR] (rt) boom {"code":1}');
  });

  it("verbose enables debug", () => {
    const { logSpy } = captureConsole();
    const logger = createLogger("rt", config(), { verbose: true });

    logger.debug("detail");

    expect(logSpy).toHaveBeenCalledWith("[DEBUG] (rt) detail");
  });

  it("writes JSON lines with the child scope", () => {
    const { logSpy } = captureConsole();
    const logger = createLogger("rt", config({ jsonLogs: true }));

    logger.child("w0").info("hello", { n: 2 });

    const line = String(logSpy.mock.calls[0]?.[0]);
    const parsed: unknown = JSON.parse(line);
    expect(parsed).toMatchObject({ level: "info", scope: "rt/w0", message: "hello", n: 2 });
  });

  it("quiet suppresses console output", () => {
    const { logSpy } = captureConsole();
    const logger = createLogger("rt", config(), { quiet: true });

    logger.warn("nothing");

    expect(logSpy).not.toHaveBeenCalled();
  });

  describe("flush", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "stratum-log-"));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it("appends buffered lines to the scope file", async () => {
      const logger = createLogger("req_1", config({ logDir: dir }), { quiet: true });

      logger.info("one");
      logger.child("w0").info("two");
      await logger.flush();

      const content = await fs.readFile(path.join(dir, "req_1.log"), "utf-8");
      expect(content).toBe("[INFO ] (req_1) one\n[INFO ] (req_1/w0) two\n");
    });
  });
});
