#!/usr/bin/env node
import "dotenv/config";
import { loginAndSaveCookies } from "../collect/login.js";
import { loadConfig, printConfigSnapshot } from "../config/env.js";
import { describeError } from "../errors.js";
import { DigestPipeline } from "../pipeline/pipeline.js";
import { log } from "../utils/logger.js";
import { applyArgs, parseArgs } from "./digestArgs.js";

const cliLog = log.withScope("cli");

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const cfg = applyArgs(loadConfig(), args);
  log.configure(cfg.logging);

  switch (args.command) {
    case "config": {
      printConfigSnapshot(cfg);
      return;
    }
    case "login": {
      await loginAndSaveCookies({
        loginUrl: `${cfg.source.baseUrl}/i/flow/login`,
        cookiesPath: cfg.browser.cookiesPath,
        userAgent: cfg.browser.userAgent,
        navigationTimeoutMs: cfg.browser.navigationTimeoutMs,
      });
      return;
    }
    case "collect": {
      const result = await new DigestPipeline(cfg).collect();
      console.log(`[scrape] Collected ${result.recordsCollected} posts in last ${cfg.collect.hoursBack}h`);
      console.log(`[scrape] Saved -> ${result.corpusPath}`);
      return;
    }
    case "summarize": {
      const result = await new DigestPipeline(cfg).summarizeCorpusFile();
      console.log(`[summarize] Input chars: ${result.corpusChars}, chunks: ${result.chunkCount}`);
      console.log(`[summarize] Saved -> ${result.summaryPath}`);
      return;
    }
    case "run": {
      const result = await new DigestPipeline(cfg).run();
      console.log(`[scrape] Collected ${result.recordsCollected} posts in last ${cfg.collect.hoursBack}h`);
      console.log(`[scrape] Saved -> ${result.corpusPath}`);
      console.log(`[summarize] Input chars: ${result.corpusChars}, chunks: ${result.chunkCount}`);
      console.log(`[summarize] Saved -> ${result.summaryPath}`);
      return;
    }
  }
}

main().catch((err) => {
  cliLog.error(describeError(err));
  process.exit(1);
});
