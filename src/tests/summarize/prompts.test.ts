import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { expect, test } from "vitest";
import {
  buildChunkPrompt,
  buildSynthesisPrompt,
  DEFAULT_INSTRUCTIONS,
  loadInstructions,
  MAP_DIRECTIVE,
} from "../../summarize/prompts.js";

test("default instructions carry the structural template", () => {
  expect(DEFAULT_INSTRUCTIONS).toContain("max 5 bullet points per country");
  expect(DEFAULT_INSTRUCTIONS).toContain("remove those without relevant news");
  expect(DEFAULT_INSTRUCTIONS).toContain("1. Euro Area");
  expect(DEFAULT_INSTRUCTIONS).toContain("6. APAC");
  expect(DEFAULT_INSTRUCTIONS).toContain("horizontal line (---)");
});

test("chunk prompt is the directive plus instructions, markers and content", () => {
  const parts = buildChunkPrompt({ instructions: "RULES", chunkText: "a | b\n\n", position: 1, total: 4 });

  expect(parts).toEqual([
    MAP_DIRECTIVE,
    "RULES\n\nCHUNK 1/4 — POSTS START\n<<<\na | b\n\n\n>>>\nReturn a concise markdown summary (headings + bullet points).",
  ]);
});

test("synthesis prompt joins partials with the split marker", () => {
  const [body] = buildSynthesisPrompt({ instructions: "RULES", partials: ["one", "two"] });

  expect(body).toContain("RULES\n\nYou are given partial summaries");
  expect(body).toContain("PARTIAL SUMMARIES START\n<<<\none\n\n--- CHUNK SPLIT ---\n\ntwo\n>>>\nReturn ONLY the final markdown.");
});

test("instructions come from the built-in template or a file", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "digest-prompts-"));
  const file = path.join(dir, "instructions.txt");
  fs.writeFileSync(file, "\nOnly Switzerland.\n", "utf-8");

  expect(loadInstructions()).toBe(DEFAULT_INSTRUCTIONS);
  expect(loadInstructions(file)).toBe("Only Switzerland.");
});
