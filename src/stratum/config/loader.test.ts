/**
 * Tests for configuration loading
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  STRATUM_CONFIG_PATH_ENV,
  getConfigValue,
  initConfig,
  loadConfig,
  saveConfig,
} from "./loader.js";
import { getDefaultConfig } from "./types.js";

describe("config loader", () => {
  let dir: string;
  let configPath: string;
  let previous: string | undefined;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "stratum-config-"));
    configPath = path.join(dir, "config.yaml");
    previous = process.env[STRATUM_CONFIG_PATH_ENV];
    process.env[STRATUM_CONFIG_PATH_ENV] = configPath;
  });

  afterEach(async () => {
    if (previous === undefined) {
      delete process.env[STRATUM_CONFIG_PATH_ENV];
    } else {
      process.env[STRATUM_CONFIG_PATH_ENV] = previous;
    }
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("returns defaults when the file is missing", async () => {
    const config = await loadConfig();

    expect(config).toEqual(getDefaultConfig());
    expect(config.toolExec.timeoutMs).toBe(15000);
    expect(config.toolExec.maxRetries).toBe(1);
    expect(config.toolExec.retryBackoffMs).toBe(200);
    expect(config.maxIterations).toBe(10);
  });

  it("merges partial YAML with defaults", async () => {
    await fs.writeFile(
      configPath,
      ["strategy: chain_of_thought", "toolExec:", "  timeoutMs: 500"].join("\n"),
    );

    const config = await loadConfig();

    expect(config.strategy).toBe("chain_of_thought");
    expect(config.toolExec.timeoutMs).toBe(500);
    expect(config.toolExec.concurrency).toBe(4);
    expect(config.delegation.chunkLines).toBe(34);
  });

  it("treats an empty file as defaults", async () => {
    await fs.writeFile(configPath, "");

    const config = await loadConfig();

    expect(config.strategy).toBe("react");
  });

  it("reports invalid values with the config path", async () => {
    await fs.writeFile(configPath, "strategy: telepathy\n");

    await expect(loadConfig()).rejects.toThrow(`Failed to load config from ${configPath}`);
  });

  it("round-trips through saveConfig", async () => {
    const config = getDefaultConfig();
    config.delegation.maxDepth = 3;

    await saveConfig(config);
    const loaded = await loadConfig();

    expect(loaded.delegation.maxDepth).toBe(3);
  });

  it("refuses to initialize over an existing file", async () => {
    const { config } = await initConfig();
    expect(config.version).toBe(1);

    await expect(initConfig()).rejects.toThrow(`Config already exists at ${configPath}`);
  });

  it("reads nested values by dot path", () => {
    const config = getDefaultConfig();

    expect(getConfigValue(config, "llm.maxTokens")).toBe(1024);
    expect(getConfigValue(config, "llm.missing")).toBeUndefined();
  });
});
