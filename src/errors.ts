import type { TimelineRecord } from "./collect/types.js";

export type ErrorCategory =
  | "ConfigurationError"
  | "CollectionError"
  | "EmptyCorpusError"
  | "GenerationServiceError";

/** Base for every fatal error a digest run can end with. */
export abstract class DigestError extends Error {
  abstract readonly category: ErrorCategory;
}

/** Missing credential or malformed option. Raised before any external call. */
export class ConfigurationError extends DigestError {
  readonly category = "ConfigurationError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** The source could not be reached, or the session died mid-run. */
export class CollectionError extends DigestError {
  readonly category = "CollectionError";

  constructor(
    message: string,
    public readonly partial: readonly TimelineRecord[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CollectionError";
  }
}

export class EmptyCorpusError extends DigestError {
  readonly category = "EmptyCorpusError";

  constructor(public readonly path: string) {
    super(`Corpus file is empty: ${path}`);
    this.name = "EmptyCorpusError";
  }
}

/** Transport, auth, quota or malformed-response failure from the generation service. */
export class GenerationServiceError extends DigestError {
  readonly category = "GenerationServiceError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationServiceError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof DigestError) return `${err.category}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
