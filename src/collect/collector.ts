import { DateTime } from "luxon";
import { buildCorpus } from "../corpus/corpus.js";
import { CollectionError } from "../errors.js";
import { log } from "../utils/logger.js";
import { extractRecords } from "./extractRecord.js";
import type { CollectOptions, CollectResult, CollectStats, RenderingSession, TimelineRecord } from "./types.js";

const collectLog = log.withScope("collect");

export type CollectDeps = {
  now?: () => DateTime;
};

export function computeCutoff(now: DateTime, hoursBack: number): DateTime {
  return now.toUTC().minus({ milliseconds: Math.round(hoursBack * 3_600_000) });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Scrolls the timeline up to `maxIterations` times and keeps every item whose
 * timestamp is at or after the cutoff. Stale items are never marked as seen.
 */
export async function collectTimeline(
  session: RenderingSession,
  options: CollectOptions,
  deps: CollectDeps = {},
): Promise<CollectResult> {
  const now = deps.now?.() ?? DateTime.utc();
  const cutoff = computeCutoff(now, options.hoursBack);
  const cutoffMs = cutoff.toMillis();
  const idleLimit = Math.max(0, Math.floor(options.idleIterationLimit ?? 0));

  const seen = new Set<string>();
  const stale = new Set<string>();
  const rows: TimelineRecord[] = [];
  const stats: CollectStats = {
    iterations: 0,
    itemsSeen: 0,
    retained: 0,
    discardedStale: 0,
    stoppedEarly: false,
  };

  try {
    await session.navigate(options.sourceUrl);
  } catch (err) {
    throw new CollectionError(`Failed to open ${options.sourceUrl}: ${errorMessage(err)}`, [], { cause: err });
  }

  try {
    await session.dismissOverlays();
  } catch (err) {
    collectLog.warn(`Overlay dismissal failed: ${errorMessage(err)}`);
  }

  collectLog.info(`Collecting ${options.sourceUrl} since ${cutoff.toISO()}`, {
    maxIterations: options.maxIterations,
    settleDelayMs: options.settleDelayMs,
  });

  let idleIterations = 0;

  for (let i = 0; i < options.maxIterations; i++) {
    let fresh = 0;

    try {
      const items = await session.currentItems();
      stats.itemsSeen += items.length;

      const extracted = await extractRecords(items, { zone: options.zone, skipIds: seen });
      for (const record of extracted) {
        if (seen.has(record.id)) continue;

        if (record.timestamp.toMillis() < cutoffMs) {
          if (!stale.has(record.id)) {
            stale.add(record.id);
            stats.discardedStale += 1;
            fresh += 1;
          }
          continue;
        }

        rows.push(record);
        seen.add(record.id);
        fresh += 1;
      }

      await session.triggerMoreContent();
      await session.wait(options.settleDelayMs);
    } catch (err) {
      throw new CollectionError(
        `Session failed during iteration ${i + 1}: ${errorMessage(err)}`,
        buildCorpus(rows),
        { cause: err },
      );
    }

    stats.iterations = i + 1;
    collectLog.debug(`iteration=${i + 1} new=${fresh} retained=${rows.length}`);

    idleIterations = fresh === 0 ? idleIterations + 1 : 0;
    if (idleLimit > 0 && idleIterations >= idleLimit) {
      stats.stoppedEarly = true;
      collectLog.info(`No new items for ${idleIterations} iterations, stopping early`);
      break;
    }
  }

  const records = buildCorpus(rows);
  stats.retained = records.length;

  collectLog.info(`Collected ${records.length} records in ${stats.iterations} iterations`, {
    discardedStale: stats.discardedStale,
  });

  return { records, cutoff, stats };
}
