/**
 * Configuration loading and validation
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import YAML from "yaml";
import { type StratumConfig, StratumConfigSchema, getDefaultConfig } from "./types.js";

/** Default config directory */
export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), ".stratum");

/** Default config file name */
export const CONFIG_FILE_NAME = "config.yaml";

/** Environment variable for config path override */
export const STRATUM_CONFIG_PATH_ENV = "STRATUM_CONFIG_PATH";

/** Environment variable for config directory override */
export const STRATUM_CONFIG_DIR_ENV = "STRATUM_CONFIG_DIR";

/**
 * Get the configuration directory path
 */
export function getConfigDir(): string {
  return process.env[STRATUM_CONFIG_DIR_ENV] || DEFAULT_CONFIG_DIR;
}

/**
 * Get the configuration file path
 */
export function getConfigPath(): string {
  const override = process.env[STRATUM_CONFIG_PATH_ENV];
  if (override) {
    return override;
  }
  return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

/**
 * Check if config file exists
 */
export async function configExists(): Promise<boolean> {
  try {
    await fs.access(getConfigPath());
    return true;
  } catch {
    return false;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Load configuration from file
 */
export async function loadConfig(): Promise<StratumConfig> {
  const configPath = getConfigPath();

  try {
    const content = await fs.readFile(configPath, "utf-8");
    const parsed: unknown = YAML.parse(content);
    // An empty file parses to null
    return StratumConfigSchema.parse(parsed ?? {});
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return getDefaultConfig();
    }
    throw new Error(
      `Failed to load config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

/**
 * Save configuration to file
 */
export async function saveConfig(config: StratumConfig): Promise<void> {
  const configPath = getConfigPath();

  await fs.mkdir(path.dirname(configPath), { recursive: true });

  const validated = StratumConfigSchema.parse(config);
  const content = YAML.stringify(validated, { indent: 2 });
  await fs.writeFile(configPath, content, "utf-8");
}

/**
 * Initialize configuration with defaults
 */
export async function initConfig(): Promise<{ configPath: string; config: StratumConfig }> {
  const configPath = getConfigPath();

  if (await configExists()) {
    throw new Error(`Config already exists at ${configPath}`);
  }

  const config = getDefaultConfig();
  await saveConfig(config);

  return { configPath, config };
}

/**
 * Read a value by dot path (e.g. "toolExec.timeoutMs")
 */
export function getConfigValue(config: StratumConfig, key: string): unknown {
  let value: unknown = config;

  for (const part of key.split(".")) {
    if (value !== null && typeof value === "object" && part in value) {
      value = Reflect.get(value, part);
    } else {
      return undefined;
    }
  }

  return value;
}
