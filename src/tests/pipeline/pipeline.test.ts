import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DateTime } from "luxon";
import { describe, expect, test, vi } from "vitest";
import type { BrowserSessionOptions } from "../../collect/browserSession.js";
import type { RenderingSession } from "../../collect/types.js";
import { loadConfig } from "../../config/env.js";
import type { Config } from "../../config/types.js";
import {
  CollectionError,
  ConfigurationError,
  describeError,
  EmptyCorpusError,
  GenerationServiceError,
} from "../../errors.js";
import type { GenerateFn } from "../../llm/client.js";
import { DigestPipeline, writeFileAtomic } from "../../pipeline/pipeline.js";
import { FakeTimelineSession, post } from "../helpers/fakes.js";

const NOW = DateTime.fromISO("2024-01-01T11:00:00Z", { zone: "UTC" });

function tempConfig(env: Record<string, string> = {}): { cfg: Config; dir: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "digest-pipeline-"));
  const cfg = loadConfig({
    TIMELINE_USER: "desk",
    SOURCE_BASE_URL: "https://timeline.test",
    OPENAI_API_KEY: "test-key",
    OUTPUT_TZ: "UTC",
    MAX_SCROLLS: "2",
    SCROLL_WAIT_MS: "0",
    CORPUS_PATH: path.join(dir, "corpus.txt"),
    SUMMARY_PATH: path.join(dir, "summary.md"),
    COOKIES_PATH: path.join(dir, "cookies.json"),
    ...env,
  });
  return { cfg, dir };
}

function recordingGenerate(replies: { map: string | null; reduce: string | null }) {
  const mapCalls: string[][] = [];
  const reduceCalls: string[][] = [];
  const generate: GenerateFn = async (parts) => {
    // map prompts carry the directive as a separate first part
    if (parts.length === 2) {
      mapCalls.push(parts);
      return { text: replies.map };
    }
    reduceCalls.push(parts);
    return { text: replies.reduce };
  };
  return { generate, mapCalls, reduceCalls };
}

function sessionFactory(session: RenderingSession) {
  return vi.fn(async (_options: BrowserSessionOptions) => session);
}

describe("DigestPipeline.run", () => {
  test("two headlines end up as one chunk, one map call and one reduce call", async () => {
    const { cfg, dir } = tempConfig();
    const session = new FakeTimelineSession([
      [
        post("/desk/status/2", "2024-01-01T09:00:00Z", "Headline B"),
        post("/desk/status/1", "2024-01-01T10:00:00Z", "Headline A"),
      ],
    ]);
    const openSession = sessionFactory(session);
    const { generate, mapCalls, reduceCalls } = recordingGenerate({ map: " partial one \n", reduce: "\n# Digest\n" });
    const createGenerate = vi.fn(() => generate);

    const progress = await new DigestPipeline(cfg, { openSession, createGenerate, now: () => NOW }).run();

    const corpus = "2024-01-01 10:00:00 UTC | Headline A\n\n2024-01-01 09:00:00 UTC | Headline B\n\n";
    expect(fs.readFileSync(path.join(dir, "corpus.txt"), "utf-8")).toBe(corpus);
    expect(mapCalls).toHaveLength(1);
    expect(mapCalls[0]?.[1]).toContain(`CHUNK 1/1 — POSTS START\n<<<\n${corpus}\n>>>`);
    expect(reduceCalls).toHaveLength(1);
    expect(reduceCalls[0]?.[0]).toContain("<<<\npartial one\n>>>");
    expect(fs.readFileSync(path.join(dir, "summary.md"), "utf-8")).toBe("# Digest");

    expect(session.navigated).toEqual(["https://timeline.test/desk"]);
    expect(session.closed).toBe(1);
    expect(createGenerate).toHaveBeenCalledWith({
      apiKey: "test-key",
      model: "gpt-4o-mini",
      temperature: 0.2,
      maxTokens: 4096,
    });
    expect(progress).toMatchObject({
      recordsCollected: 2,
      corpusChars: corpus.length,
      corpusBytes: corpus.length,
      chunkCount: 1,
      partialCount: 1,
      summaryPath: path.resolve(dir, "summary.md"),
      summaryChars: "# Digest".length,
    });
  });

  test("missing credential fails before the browser or the service is touched", async () => {
    const { cfg } = tempConfig();
    const noKey: Config = { ...cfg, openai: {} };
    const openSession = sessionFactory(new FakeTimelineSession([[]]));
    const createGenerate = vi.fn((): GenerateFn => async () => ({ text: "unused" }));

    const error = await new DigestPipeline(noKey, { openSession, createGenerate }).run().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(openSession).not.toHaveBeenCalled();
    expect(createGenerate).not.toHaveBeenCalled();
    expect(fs.existsSync(cfg.output.corpusPath)).toBe(false);
  });

  test("navigation failure closes the session and produces no summary", async () => {
    const { cfg } = tempConfig();
    const session = new FakeTimelineSession([[]], { navigate: "timeout 90000ms exceeded" });
    const { generate, mapCalls } = recordingGenerate({ map: "p", reduce: "f" });

    const error = await new DigestPipeline(cfg, {
      openSession: sessionFactory(session),
      createGenerate: () => generate,
      now: () => NOW,
    })
      .run()
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CollectionError);
    expect(session.closed).toBe(1);
    expect(mapCalls).toHaveLength(0);
    expect(fs.existsSync(cfg.output.summaryPath)).toBe(false);
  });

  test("records gathered before a session failure are still persisted", async () => {
    const { cfg } = tempConfig({ MAX_SCROLLS: "5" });
    const session = new FakeTimelineSession([[post("/desk/status/1", "2024-01-01T10:00:00Z", "Headline A")]], {
      onSnapshot: { index: 1, message: "Target page crashed" },
    });

    const error = await new DigestPipeline(cfg, {
      openSession: sessionFactory(session),
      createGenerate: () => recordingGenerate({ map: "p", reduce: "f" }).generate,
      now: () => NOW,
    })
      .collect()
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CollectionError);
    expect(fs.readFileSync(cfg.output.corpusPath, "utf-8")).toBe("2024-01-01 10:00:00 UTC | Headline A\n\n");
    expect(session.closed).toBe(1);
  });

  test("a browser that cannot start is a CollectionError", async () => {
    const { cfg } = tempConfig();
    const openSession = vi.fn(async (_options: BrowserSessionOptions): Promise<RenderingSession> => {
      throw new Error("Executable doesn't exist");
    });

    const error = await new DigestPipeline(cfg, { openSession, now: () => NOW }).collect().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CollectionError);
    expect(error instanceof Error ? error.message : "").toBe("Could not start browser session: Executable doesn't exist");
  });
});

describe("DigestPipeline.summarizeCorpusFile", () => {
  test("an empty corpus file stops the run before any service call", async () => {
    const { cfg } = tempConfig();
    fs.writeFileSync(cfg.output.corpusPath, "\n\n  \n", "utf-8");
    const { generate, mapCalls, reduceCalls } = recordingGenerate({ map: "p", reduce: "f" });

    const error = await new DigestPipeline(cfg, { createGenerate: () => generate })
      .summarizeCorpusFile()
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(EmptyCorpusError);
    expect(error instanceof EmptyCorpusError ? error.path : "").toBe(cfg.output.corpusPath);
    expect(mapCalls).toHaveLength(0);
    expect(reduceCalls).toHaveLength(0);
  });

  test("a missing corpus file is a configuration error naming the path", async () => {
    const { cfg } = tempConfig();
    const { generate, mapCalls } = recordingGenerate({ map: "p", reduce: "f" });

    const error = await new DigestPipeline(cfg, { createGenerate: () => generate })
      .summarizeCorpusFile()
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigurationError);
    const prefix = `ConfigurationError: Cannot read corpus file ${cfg.output.corpusPath}: ENOENT`;
    expect(describeError(error).startsWith(prefix)).toBe(true);
    expect(mapCalls).toHaveLength(0);
    expect(fs.existsSync(cfg.output.summaryPath)).toBe(false);
  });

  test("chunks follow the byte budget and partials reach reduce in order", async () => {
    const { cfg } = tempConfig({ MAX_CHUNK_BYTES: "40" });
    const corpus = [
      "2024-01-01 10:00:00 UTC | Headline A\n\n",
      "2024-01-01 09:00:00 UTC | Headline B\n\n",
      "2024-01-01 08:00:00 UTC | Headline C\n\n",
    ].join("");
    fs.writeFileSync(cfg.output.corpusPath, corpus, "utf-8");

    let mapIndex = 0;
    const reducePrompts: string[][] = [];
    const generate: GenerateFn = async (parts) => {
      if (parts.length === 2) {
        mapIndex += 1;
        return { text: `partial-${mapIndex}` };
      }
      reducePrompts.push(parts);
      return { text: "final" };
    };

    const progress = await new DigestPipeline(cfg, { createGenerate: () => generate }).summarizeCorpusFile();

    expect(progress.chunkCount).toBe(3);
    expect(progress.partialCount).toBe(3);
    expect(reducePrompts[0]?.[0]).toContain(
      "partial-1\n\n--- CHUNK SPLIT ---\n\npartial-2\n\n--- CHUNK SPLIT ---\n\npartial-3",
    );
  });

  test("a failing service leaves no summary file behind", async () => {
    const { cfg } = tempConfig();
    fs.writeFileSync(cfg.output.corpusPath, "2024-01-01 10:00:00 UTC | Headline A\n\n", "utf-8");
    const generate: GenerateFn = async () => {
      throw new GenerationServiceError("503 service unavailable");
    };

    const error = await new DigestPipeline(cfg, { createGenerate: () => generate })
      .summarizeCorpusFile()
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GenerationServiceError);
    expect(fs.existsSync(cfg.output.summaryPath)).toBe(false);
  });

  test("unreadable instructions file is a configuration error", async () => {
    const { cfg, dir } = tempConfig({ INSTRUCTIONS_PATH: "missing-instructions.txt" });
    fs.writeFileSync(cfg.output.corpusPath, "x | y\n\n", "utf-8");
    const { generate, mapCalls } = recordingGenerate({ map: "p", reduce: "f" });

    const error = await new DigestPipeline(cfg, { createGenerate: () => generate })
      .summarizeCorpusFile()
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(mapCalls).toHaveLength(0);
    expect(fs.existsSync(path.join(dir, "summary.md"))).toBe(false);
  });
});

test("writeFileAtomic replaces the target and leaves no temp file", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "digest-atomic-"));
  const target = path.join(dir, "out", "summary.md");

  writeFileAtomic(target, "first");
  writeFileAtomic(target, "second");

  expect(fs.readFileSync(target, "utf-8")).toBe("second");
  expect(fs.readdirSync(path.dirname(target))).toEqual(["summary.md"]);
});

test("writeFileAtomic removes its temp file when the rename fails", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "digest-atomic-"));
  const target = path.join(dir, "summary.md");
  // a non-empty directory cannot be replaced by a file
  fs.mkdirSync(target);
  fs.writeFileSync(path.join(target, "keep.txt"), "x", "utf-8");

  expect(() => writeFileAtomic(target, "digest")).toThrow();
  expect(fs.readdirSync(dir)).toEqual(["summary.md"]);
});
