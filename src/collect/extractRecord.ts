import { DateTime } from "luxon";
import { log } from "../utils/logger.js";
import type { ItemHandle, TimelineRecord } from "./types.js";

const collectLog = log.withScope("collect");

export type ExtractOptions = {
  /** Output zone for the record timestamp. */
  zone: string;
  /** Ids already retained this run; such items are skipped before reading time or body. */
  skipIds?: ReadonlySet<string>;
};

export function parseItemTimestamp(raw: string, zone: string): DateTime | null {
  const parsed = DateTime.fromISO(raw.trim(), { setZone: true });
  if (!parsed.isValid) return null;
  return parsed.setZone(zone);
}

export function joinBodyTexts(parts: string[] | null): string {
  if (!parts || parts.length === 0) return "";
  return parts.join("\n").trim();
}

/**
 * Returns a record for the item, or null when it has no permalink or no
 * parseable datetime (promoted posts, "show more" rows and the like).
 */
export async function extractRecord(item: ItemHandle, options: ExtractOptions): Promise<TimelineRecord | null> {
  const id = (await item.permalink())?.trim();
  if (!id) return null;
  if (options.skipIds?.has(id)) return null;

  const rawTime = await item.datetime();
  if (!rawTime) return null;

  const timestamp = parseItemTimestamp(rawTime, options.zone);
  if (!timestamp) return null;

  const text = joinBodyTexts(await item.bodyTexts());
  return { id, timestamp, text };
}

/** Extracts every item in order. An item whose handle throws is skipped. */
export async function extractRecords(items: ItemHandle[], options: ExtractOptions): Promise<TimelineRecord[]> {
  const records: TimelineRecord[] = [];

  for (const [index, item] of items.entries()) {
    try {
      const record = await extractRecord(item, options);
      if (record) records.push(record);
    } catch (err) {
      collectLog.debug(`Skipping item ${index}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return records;
}
