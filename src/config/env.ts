import { DateTime } from "luxon";
import { ConfigurationError } from "../errors.js";
import type { LogFormat, LogLevel } from "../utils/logger.js";
import { getEnv, type EnvSource } from "./rawEnv.js";
import { redactConfigSnapshot } from "./redact.js";
import type { Config } from "./types.js";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) " +
  "AppleWebKit/537.36 (KHTML, like Gecko) " +
  "Chrome/124.0 Safari/537.36";

function readers(env: EnvSource) {
  function opt(name: string): string | undefined {
    return getEnv(name, undefined, env);
  }

  function optInt(name: string, def: number, min = 0): number {
    const v = opt(name);
    if (!v) return def;
    const n = Number(v);
    if (!Number.isInteger(n)) throw new ConfigurationError(`Invalid integer for ${name}: ${v}`);
    if (n < min) throw new ConfigurationError(`${name} must be >= ${min}, got ${v}`);
    return n;
  }

  function optFloat(name: string, def: number): number {
    const v = opt(name);
    if (!v) return def;
    const n = Number(v);
    if (!Number.isFinite(n)) throw new ConfigurationError(`Invalid number for ${name}: ${v}`);
    return n;
  }

  function optBool(name: string, def: boolean): boolean {
    const v = opt(name);
    if (!v) return def;
    if (["1", "true", "yes", "on"].includes(v.toLowerCase())) return true;
    if (["0", "false", "no", "off"].includes(v.toLowerCase())) return false;
    throw new ConfigurationError(`Invalid boolean for ${name}: ${v}`);
  }

  function enumOf<T extends string>(name: string, allowed: readonly T[], def: T): T {
    const v = opt(name);
    if (!v) return def;
    const match = allowed.find((candidate) => candidate === v);
    if (match) return match;
    throw new ConfigurationError(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
  }

  return { opt, optInt, optFloat, optBool, enumOf };
}

export function loadConfig(env: EnvSource = process.env): Config {
  const { opt, optInt, optFloat, optBool, enumOf } = readers(env);

  const user = opt("TIMELINE_USER") ?? "financialjuice";

  const cfg: Config = {
    source: {
      user,
      baseUrl: (opt("SOURCE_BASE_URL") ?? "https://x.com").replace(/\/+$/, ""),
    },

    collect: {
      hoursBack: optFloat("HOURS_BACK", 24),
      maxScrolls: optInt("MAX_SCROLLS", 80),
      scrollWaitMs: optInt("SCROLL_WAIT_MS", 1600),
      idleScrollLimit: optInt("IDLE_SCROLL_LIMIT", 0),
    },

    browser: {
      headless: optBool("BROWSER_HEADLESS", true),
      userAgent: opt("BROWSER_USER_AGENT") ?? DEFAULT_USER_AGENT,
      cookiesPath: opt("COOKIES_PATH") ?? "x_cookies.json",
      navigationTimeoutMs: optInt("NAVIGATION_TIMEOUT_MS", 90000, 1),
      viewport: { width: 1280, height: 2000 },
    },

    output: {
      corpusPath: opt("CORPUS_PATH") ?? `${user}_last_hours.txt`,
      summaryPath: opt("SUMMARY_PATH") ?? "summary.md",
      timezone: opt("OUTPUT_TZ") ?? "Europe/Zurich",
    },

    chunk: {
      maxBytes: optInt("MAX_CHUNK_BYTES", 15000, 1),
    },

    llm: {
      model: opt("LLM_MODEL") ?? "gpt-4o-mini",
      temperature: optFloat("LLM_TEMPERATURE", 0.2),
      maxTokens: optInt("LLM_MAX_TOKENS", 4096, 1),
      mapConcurrency: optInt("LLM_MAP_CONCURRENCY", 1, 1),
      maxRetries: optInt("LLM_MAX_RETRIES", 0),
      instructionsPath: opt("INSTRUCTIONS_PATH"),
    },

    openai: {
      apiKey: opt("OPENAI_API_KEY"),
    },

    logging: {
      level: enumOf<LogLevel>("LOG_LEVEL", ["error", "warn", "info", "debug", "trace"] as const, "info"),
      scopes: opt("LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: enumOf<LogFormat>("LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };

  validateConfig(cfg);
  return cfg;
}

/** Checks that hold regardless of where the values came from (env or CLI flags). */
export function validateConfig(cfg: Config): void {
  if (!cfg.source.user.trim()) {
    throw new ConfigurationError("Source user must not be empty");
  }
  if (!(cfg.collect.hoursBack > 0) || !Number.isFinite(cfg.collect.hoursBack)) {
    throw new ConfigurationError(`HOURS_BACK must be a positive number, got ${cfg.collect.hoursBack}`);
  }
  if (!Number.isInteger(cfg.collect.maxScrolls) || cfg.collect.maxScrolls < 0) {
    throw new ConfigurationError(`MAX_SCROLLS must be a non-negative integer, got ${cfg.collect.maxScrolls}`);
  }
  if (!Number.isInteger(cfg.chunk.maxBytes) || cfg.chunk.maxBytes < 1) {
    throw new ConfigurationError(`MAX_CHUNK_BYTES must be a positive integer, got ${cfg.chunk.maxBytes}`);
  }
  if (!DateTime.now().setZone(cfg.output.timezone).isValid) {
    throw new ConfigurationError(`Unknown OUTPUT_TZ timezone: ${cfg.output.timezone}`);
  }
}

/** Resolves the generation-service credential, or fails before any request is issued. */
export function requireApiKey(cfg: Config): string {
  const apiKey = cfg.openai.apiKey?.trim();
  if (!apiKey) {
    throw new ConfigurationError("Missing OPENAI_API_KEY environment variable.");
  }
  return apiKey;
}

export function printConfigSnapshot(cfg: Config): void {
  const snap = redactConfigSnapshot({
    TIMELINE_USER: cfg.source.user,
    SOURCE_BASE_URL: cfg.source.baseUrl,
    HOURS_BACK: cfg.collect.hoursBack,
    MAX_SCROLLS: cfg.collect.maxScrolls,
    SCROLL_WAIT_MS: cfg.collect.scrollWaitMs,
    IDLE_SCROLL_LIMIT: cfg.collect.idleScrollLimit,
    BROWSER_HEADLESS: cfg.browser.headless,
    BROWSER_USER_AGENT: cfg.browser.userAgent,
    COOKIES_PATH: cfg.browser.cookiesPath,
    NAVIGATION_TIMEOUT_MS: cfg.browser.navigationTimeoutMs,
    CORPUS_PATH: cfg.output.corpusPath,
    SUMMARY_PATH: cfg.output.summaryPath,
    OUTPUT_TZ: cfg.output.timezone,
    MAX_CHUNK_BYTES: cfg.chunk.maxBytes,
    LLM_MODEL: cfg.llm.model,
    LLM_TEMPERATURE: cfg.llm.temperature,
    LLM_MAX_TOKENS: cfg.llm.maxTokens,
    LLM_MAP_CONCURRENCY: cfg.llm.mapConcurrency,
    LLM_MAX_RETRIES: cfg.llm.maxRetries,
    INSTRUCTIONS_PATH: cfg.llm.instructionsPath,
    OPENAI_API_KEY: cfg.openai.apiKey,
    LOG_LEVEL: cfg.logging.level,
    LOG_SCOPES: cfg.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: cfg.logging.format,
  });

  console.log("=== TIMELINE DIGEST CONFIG SNAPSHOT ===");
  console.log(JSON.stringify(snap, null, 2));
  console.log("=======================================");
}
