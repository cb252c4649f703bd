/**
 * Centralized logging for the digest tools.
 *
 * Environment Variables:
 *   LOG_LEVEL=error|warn|info|debug|trace  (default: info)
 *   LOG_SCOPES=collect,browser,corpus,chunk,summarize,llm,pipeline,config,cli
 *      (optional, default: all scopes allowed)
 *   LOG_FORMAT=pretty|json  (default: pretty)
 *
 * Example Usage:
 *   LOG_LEVEL=debug LOG_SCOPES=collect,browser  npm run collect
 *   LOG_LEVEL=warn  npm run digest  // Only warnings and errors
 */

import { getEnv } from "../config/rawEnv.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";
export type LogFormat = "pretty" | "json";
export type LogScope =
  | "collect"
  | "browser"
  | "corpus"
  | "chunk"
  | "summarize"
  | "llm"
  | "pipeline"
  | "config"
  | "cli"
  | string;

export type LoggerSettings = {
  level: LogLevel;
  scopes?: string[]; // empty/undefined => all
  format: LogFormat;
};

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  data?: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

class Logger {
  private level: number;
  private scopes: Set<string>;
  private format: LogFormat;

  constructor() {
    const logLevelEnv = (getEnv("LOG_LEVEL") ?? "info").toLowerCase();
    this.level = isLogLevel(logLevelEnv) ? LOG_LEVELS[logLevelEnv] : LOG_LEVELS.info;

    // empty => all scopes
    this.scopes = new Set(
      (getEnv("LOG_SCOPES") ?? "")
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s)
    );

    this.format = getEnv("LOG_FORMAT") === "json" ? "json" : "pretty";
  }

  /** Replaces the env-derived defaults once the validated config is loaded. */
  configure(settings: LoggerSettings): void {
    this.level = LOG_LEVELS[settings.level];
    this.scopes = new Set(settings.scopes ?? []);
    this.format = settings.format;
  }

  private shouldLog(level: LogLevel, scope?: string): boolean {
    if (LOG_LEVELS[level] < this.level) return false;

    if (this.scopes.size > 0 && scope && !this.scopes.has(scope)) {
      return false;
    }

    return true;
  }

  private formatOutput(entry: LogEntry): string {
    if (this.format === "json") {
      return JSON.stringify(entry);
    }

    const time = entry.timestamp.slice(11, 19); // HH:MM:SS
    const levelAbbr = {
      trace: "TRC",
      debug: "DBG",
      info: "INF",
      warn: "WRN",
      error: "ERR",
    }[entry.level];
    const scopeStr = entry.scope ? ` │ ${entry.scope}` : "";
    const dataStr = entry.data !== undefined ? ` │ ${JSON.stringify(entry.data)}` : "";

    return `${time} [${levelAbbr}]${scopeStr} ${entry.message}${dataStr}`;
  }

  private emit(level: LogLevel, message: string, scope?: LogScope, data?: unknown): void {
    if (!this.shouldLog(level, scope)) return;

    const output = this.formatOutput({
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
      data,
    });

    switch (level) {
      case "error":
        console.error(output);
        break;
      case "warn":
        console.warn(output);
        break;
      case "info":
      case "debug":
        console.log(output);
        break;
      case "trace":
        console.debug(output);
        break;
    }
  }

  trace(message: string, scope?: LogScope, data?: unknown): void {
    this.emit("trace", message, scope, data);
  }

  debug(message: string, scope?: LogScope, data?: unknown): void {
    this.emit("debug", message, scope, data);
  }

  info(message: string, scope?: LogScope, data?: unknown): void {
    this.emit("info", message, scope, data);
  }

  warn(message: string, scope?: LogScope, data?: unknown): void {
    this.emit("warn", message, scope, data);
  }

  error(message: string, scope?: LogScope, data?: unknown): void {
    this.emit("error", message, scope, data);
  }

  /**
   * Create a scoped logger that automatically includes a scope in all messages.
   * Usage: const collectLog = log.withScope("collect");
   *        collectLog.debug("message") -> logs with scope="collect"
   */
  withScope(scope: LogScope): ScopedLogger {
    return new ScopedLogger(this, scope);
  }
}

/**
 * A logger bound to a specific scope.
 */
export class ScopedLogger {
  constructor(
    private logger: Logger,
    private scope: LogScope
  ) {}

  trace(message: string, data?: unknown): void {
    this.logger.trace(message, this.scope, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(message, this.scope, data);
  }

  info(message: string, data?: unknown): void {
    this.logger.info(message, this.scope, data);
  }

  warn(message: string, data?: unknown): void {
    this.logger.warn(message, this.scope, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(message, this.scope, data);
  }
}

export const log = new Logger();
export default log;
