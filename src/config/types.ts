import type { LoggerSettings } from "../utils/logger.js";

export interface Config {
  source: {
    user: string;
    baseUrl: string;
  };

  collect: {
    hoursBack: number;
    maxScrolls: number;
    scrollWaitMs: number;
    idleScrollLimit: number; // 0 disables early stop
  };

  browser: {
    headless: boolean;
    userAgent: string;
    cookiesPath: string;
    navigationTimeoutMs: number;
    viewport: { width: number; height: number };
  };

  output: {
    corpusPath: string;
    summaryPath: string;
    timezone: string;
  };

  chunk: {
    maxBytes: number;
  };

  llm: {
    model: string;
    temperature: number;
    maxTokens: number;
    mapConcurrency: number;
    maxRetries: number;
    instructionsPath?: string;
  };

  openai: {
    apiKey?: string; // checked by requireApiKey before summarizing
  };

  logging: LoggerSettings;
}
