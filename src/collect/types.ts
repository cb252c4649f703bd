import type { DateTime } from "luxon";

/** One timestamped post taken from the timeline. `id` is the item's permalink. */
export type TimelineRecord = {
  readonly id: string;
  readonly timestamp: DateTime;
  readonly text: string;
};

/**
 * Read-only view of one rendered timeline item.
 * Each accessor returns null when the region is absent from the item.
 */
export interface ItemHandle {
  permalink(): Promise<string | null>;
  datetime(): Promise<string | null>;
  bodyTexts(): Promise<string[] | null>;
}

/** Browser-side capability the collector drives. Owned by one collection run. */
export interface RenderingSession {
  navigate(url: string): Promise<void>;
  dismissOverlays(): Promise<void>;
  currentItems(): Promise<ItemHandle[]>;
  triggerMoreContent(): Promise<void>;
  wait(ms: number): Promise<void>;
  close(): Promise<void>;
}

export type CollectOptions = {
  sourceUrl: string;
  hoursBack: number;
  maxIterations: number;
  settleDelayMs: number;
  zone: string;
  idleIterationLimit?: number;
};

export type CollectStats = {
  iterations: number;
  itemsSeen: number;
  retained: number;
  discardedStale: number;
  stoppedEarly: boolean;
};

export type CollectResult = {
  records: TimelineRecord[];
  cutoff: DateTime;
  stats: CollectStats;
};
