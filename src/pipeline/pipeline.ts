import fs from "node:fs";
import path from "node:path";
import type { DateTime } from "luxon";
import { chunkCorpusText } from "../chunk/chunker.js";
import { openTimelineSession, type BrowserSessionOptions } from "../collect/browserSession.js";
import { collectTimeline } from "../collect/collector.js";
import type { CollectStats, RenderingSession } from "../collect/types.js";
import { requireApiKey } from "../config/env.js";
import type { Config } from "../config/types.js";
import { loadCorpusText, saveCorpus } from "../corpus/corpus.js";
import { CollectionError, ConfigurationError, EmptyCorpusError } from "../errors.js";
import { createOpenAiGenerate, type GenerateFn, type GenerateOptions } from "../llm/client.js";
import { loadInstructions } from "../summarize/prompts.js";
import { SummaryEngine } from "../summarize/summaryEngine.js";
import { log } from "../utils/logger.js";

const pipelineLog = log.withScope("pipeline");

export type PipelineDeps = {
  openSession?: (options: BrowserSessionOptions) => Promise<RenderingSession>;
  createGenerate?: (options: GenerateOptions) => GenerateFn;
  now?: () => DateTime;
};

export type CollectProgress = {
  recordsCollected: number;
  corpusPath: string;
  corpusBytes: number;
  stats: CollectStats;
};

export type SummarizeProgress = {
  corpusPath: string;
  corpusChars: number;
  corpusBytes: number;
  chunkCount: number;
  partialCount: number;
  summaryPath: string;
  summaryChars: number;
};

export type PipelineProgress = SummarizeProgress & {
  recordsCollected: number;
  collect: CollectStats;
};

/** Replaces the file in one step so readers never see a half-written summary. */
export function writeFileAtomic(filePath: string, content: string): string {
  const target = path.resolve(filePath);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  const tmp = `${target}.${process.pid}.tmp`;
  try {
    fs.writeFileSync(tmp, content, "utf-8");
    fs.renameSync(tmp, target);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw err;
  }
  return target;
}

export function profileUrl(cfg: Config): string {
  return `${cfg.source.baseUrl}/${encodeURIComponent(cfg.source.user)}`;
}

export class DigestPipeline {
  private readonly openSession: (options: BrowserSessionOptions) => Promise<RenderingSession>;
  private readonly createGenerate: (options: GenerateOptions) => GenerateFn;

  constructor(
    private readonly cfg: Config,
    private readonly deps: PipelineDeps = {},
  ) {
    this.openSession = deps.openSession ?? openTimelineSession;
    this.createGenerate = deps.createGenerate ?? createOpenAiGenerate;
  }

  /** Collect, persist, then summarize. The credential is checked before anything else. */
  async run(): Promise<PipelineProgress> {
    const engine = this.buildEngine();
    const instructions = this.readInstructions();

    const collected = await this.collect();
    const summarized = await this.summarizeWith(engine, instructions, collected.corpusPath);

    const progress: PipelineProgress = {
      ...summarized,
      recordsCollected: collected.recordsCollected,
      collect: collected.stats,
    };
    pipelineLog.info("Run complete", progress);
    return progress;
  }

  async collect(): Promise<CollectProgress> {
    const { cfg } = this;
    let session: RenderingSession;

    try {
      session = await this.openSession({
        headless: cfg.browser.headless,
        userAgent: cfg.browser.userAgent,
        viewport: cfg.browser.viewport,
        cookiesPath: cfg.browser.cookiesPath,
        navigationTimeoutMs: cfg.browser.navigationTimeoutMs,
      });
    } catch (err) {
      throw new CollectionError(
        `Could not start browser session: ${err instanceof Error ? err.message : String(err)}`,
        [],
        { cause: err },
      );
    }

    try {
      const result = await collectTimeline(
        session,
        {
          sourceUrl: profileUrl(cfg),
          hoursBack: cfg.collect.hoursBack,
          maxIterations: cfg.collect.maxScrolls,
          settleDelayMs: cfg.collect.scrollWaitMs,
          zone: cfg.output.timezone,
          idleIterationLimit: cfg.collect.idleScrollLimit,
        },
        { now: this.deps.now },
      );

      const saved = saveCorpus(result.records, cfg.output.corpusPath);
      pipelineLog.info(`Collected ${result.records.length} records in last ${cfg.collect.hoursBack}h`);
      return {
        recordsCollected: result.records.length,
        corpusPath: saved.path,
        corpusBytes: saved.bytes,
        stats: result.stats,
      };
    } catch (err) {
      if (err instanceof CollectionError && err.partial.length > 0) {
        saveCorpus(err.partial, cfg.output.corpusPath);
        pipelineLog.warn(`Kept ${err.partial.length} records collected before the failure`);
      }
      throw err;
    } finally {
      await this.closeSession(session);
    }
  }

  /** Summarizes an existing corpus file without collecting. */
  async summarizeCorpusFile(corpusPath: string = this.cfg.output.corpusPath): Promise<SummarizeProgress> {
    const engine = this.buildEngine();
    const instructions = this.readInstructions();
    return this.summarizeWith(engine, instructions, corpusPath);
  }

  private async summarizeWith(engine: SummaryEngine, instructions: string, corpusPath: string): Promise<SummarizeProgress> {
    const { cfg } = this;
    let text: string;
    try {
      text = loadCorpusText(corpusPath);
    } catch (err) {
      throw new ConfigurationError(
        `Cannot read corpus file ${corpusPath}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
    if (!text.trim()) {
      throw new EmptyCorpusError(corpusPath);
    }

    const chunks = chunkCorpusText(text, cfg.chunk.maxBytes);
    pipelineLog.info(`Input chars: ${text.length}, chunks: ${chunks.length}`);

    const partials = await engine.mapAll(chunks, instructions);
    const finalMarkdown = await engine.reduce(partials, instructions);
    const summaryPath = writeFileAtomic(cfg.output.summaryPath, finalMarkdown);
    pipelineLog.info(`Summary saved -> ${summaryPath}`);

    return {
      corpusPath: path.resolve(corpusPath),
      corpusChars: text.length,
      corpusBytes: Buffer.byteLength(text, "utf8"),
      chunkCount: chunks.length,
      partialCount: partials.length,
      summaryPath,
      summaryChars: finalMarkdown.length,
    };
  }

  private buildEngine(): SummaryEngine {
    const { cfg } = this;
    const generate = this.createGenerate({
      apiKey: requireApiKey(cfg),
      model: cfg.llm.model,
      temperature: cfg.llm.temperature,
      maxTokens: cfg.llm.maxTokens,
    });
    return new SummaryEngine(generate, {
      mapConcurrency: cfg.llm.mapConcurrency,
      maxRetries: cfg.llm.maxRetries,
    });
  }

  private readInstructions(): string {
    const instructionsPath = this.cfg.llm.instructionsPath;
    try {
      const instructions = loadInstructions(instructionsPath);
      if (!instructions) throw new Error("file is empty");
      return instructions;
    } catch (err) {
      throw new ConfigurationError(
        `Cannot read INSTRUCTIONS_PATH ${instructionsPath}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  private async closeSession(session: RenderingSession): Promise<void> {
    try {
      await session.close();
    } catch (err) {
      pipelineLog.warn(`Browser session did not close cleanly: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
