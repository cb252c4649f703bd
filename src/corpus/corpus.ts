import fs from "node:fs";
import path from "node:path";
import type { TimelineRecord } from "../collect/types.js";
import { log } from "../utils/logger.js";

const corpusLog = log.withScope("corpus");

export const BLOCK_SEPARATOR = "\n\n";
// ZZZZ under en-US gives "UTC" or a GMT offset ("GMT+1"), not zone abbreviations like CET.
export const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss ZZZZ";

/** Drops repeated ids (first occurrence wins) and orders newest first. */
export function buildCorpus(records: readonly TimelineRecord[]): TimelineRecord[] {
  const byId = new Map<string, TimelineRecord>();
  for (const record of records) {
    if (!byId.has(record.id)) byId.set(record.id, record);
  }

  // stable sort keeps first-seen order among equal timestamps
  return [...byId.values()].sort((a, b) => b.timestamp.toMillis() - a.timestamp.toMillis());
}

export function formatRecord(record: TimelineRecord): string {
  const stamp = record.timestamp.setLocale("en-US").toFormat(TIMESTAMP_FORMAT);
  return `${stamp} | ${record.text}${BLOCK_SEPARATOR}`;
}

export function serializeCorpus(records: readonly TimelineRecord[]): string {
  return records.map(formatRecord).join("");
}

export function saveCorpus(records: readonly TimelineRecord[], filePath: string): { path: string; bytes: number } {
  const resolved = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });

  const text = serializeCorpus(records);
  fs.writeFileSync(resolved, text, "utf-8");

  const bytes = Buffer.byteLength(text, "utf8");
  corpusLog.info(`Saved ${records.length} records -> ${resolved}`, { bytes });
  return { path: resolved, bytes };
}

/** Reads the flat corpus back as plain text. Line endings are normalized to LF. */
export function loadCorpusText(filePath: string): string {
  return fs.readFileSync(path.resolve(filePath), "utf-8").replace(/\r\n/g, "\n");
}
