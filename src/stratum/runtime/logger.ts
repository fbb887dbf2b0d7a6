/**
 * Logging infrastructure for stratum
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { LoggingConfig } from "../config/types.js";
import { getConfigDir } from "../config/loader.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger scoped to a runtime or request
 */
export interface StratumLogger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  tool: (name: string, callId: string, outcome: "ok" | "error", durationMs: number) => void;
  /** Logger for a nested scope sharing this logger's buffer */
  child: (scope: string) => StratumLogger;
  flush: () => Promise<void>;
}

export interface LoggerOptions {
  quiet?: boolean;
  verbose?: boolean;
}

function formatConsoleMessage(
  level: LogLevel,
  scope: string,
  message: string,
  data: Record<string, unknown> | undefined,
  config: LoggingConfig,
): string {
  const parts: string[] = [];

  if (config.timestamps) {
    parts.push(`[${new Date().toISOString()}]`);
  }

  parts.push(`[${level.toUpperCase().padEnd(5)}]`);
  parts.push(`(${scope})`);
  parts.push(message);

  if (data && Object.keys(data).length > 0) {
    parts.push(JSON.stringify(data));
  }

  return parts.join(" ");
}

function formatJsonLog(
  level: LogLevel,
  scope: string,
  message: string,
  data?: Record<string, unknown>,
): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    scope,
    message,
    ...data,
  });
}

/**
 * Create a logger; `scope` names the log file written by flush()
 */
export function createLogger(
  scope: string,
  config: LoggingConfig,
  options?: LoggerOptions,
): StratumLogger {
  const logBuffer: string[] = [];
  const effectiveLevel: LogLevel = options?.verbose ? "debug" : config.level;
  const shouldLog = (level: LogLevel): boolean =>
    LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[effectiveLevel];

  const flush = async (): Promise<void> => {
    if (!config.logDir || logBuffer.length === 0) return;

    const logDir = config.logDir.startsWith("~")
      ? path.join(getConfigDir(), config.logDir.slice(1).replace(/^[/\\]+/, ""))
      : config.logDir;

    await fs.mkdir(logDir, { recursive: true });

    const logFile = path.join(logDir, `${scope.replace(/[^\w.-]+/g, "_")}.log`);
    await fs.appendFile(logFile, logBuffer.join("\n") + "\n");
    logBuffer.length = 0;
  };

  const build = (currentScope: string): StratumLogger => {
    const log = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
      if (!shouldLog(level)) return;

      const formattedLine = config.jsonLogs
        ? formatJsonLog(level, currentScope, message, data)
        : formatConsoleMessage(level, currentScope, message, data, config);

      logBuffer.push(formattedLine);

      if (!options?.quiet) {
        const output = level === "error" ? console.error : console.log;
        output(formattedLine);
      }
    };

    return {
      debug: (message, data) => log("debug", message, data),
      info: (message, data) => log("info", message, data),
      warn: (message, data) => log("warn", message, data),
      error: (message, data) => log("error", message, data),

      tool: (name, callId, outcome, durationMs) => {
        log(outcome === "ok" ? "info" : "warn", `Tool: ${name}`, {
          callId,
          outcome,
          duration_ms: durationMs,
        });
      },

      child: (childScope) => build(`${currentScope}/${childScope}`),
      flush,
    };
  };

  return build(scope);
}

/**
 * Logger that discards everything
 */
export function createSilentLogger(): StratumLogger {
  const silent: StratumLogger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    tool: () => {},
    child: () => silent,
    flush: async () => {},
  };
  return silent;
}
