import type { Chunk } from "../chunk/chunker.js";
import { GenerationServiceError } from "../errors.js";
import type { GenerateFn } from "../llm/client.js";
import { log } from "../utils/logger.js";
import { buildChunkPrompt, buildSynthesisPrompt } from "./prompts.js";

const summarizeLog = log.withScope("summarize");

export type SummaryEngineOptions = {
  /** Map calls in flight at once. Results are always kept in chunk order. */
  mapConcurrency?: number;
  /** Extra attempts per request after the first failure. */
  maxRetries?: number;
};

export type MapCallLog = {
  position: number;
  total: number;
  reqChars: number;
  respChars: number;
  durationMs: number;
};

export class SummaryEngine {
  private readonly mapConcurrency: number;
  private readonly maxRetries: number;
  readonly mapLogs: MapCallLog[] = [];

  constructor(
    private readonly generate: GenerateFn,
    options: SummaryEngineOptions = {},
  ) {
    this.mapConcurrency = Math.max(1, Math.floor(options.mapConcurrency ?? 1));
    this.maxRetries = Math.max(0, Math.floor(options.maxRetries ?? 0));
  }

  /** Summarizes one chunk. An empty or null response becomes "". */
  async map(chunk: Chunk, instructions: string): Promise<string> {
    const parts = buildChunkPrompt({
      instructions,
      chunkText: chunk.text,
      position: chunk.position,
      total: chunk.total,
    });

    const start = Date.now();
    const text = await this.request(parts, `chunk ${chunk.position}/${chunk.total}`);
    const partial = (text ?? "").trim();

    const entry: MapCallLog = {
      position: chunk.position,
      total: chunk.total,
      reqChars: parts.reduce((sum, part) => sum + part.length, 0),
      respChars: partial.length,
      durationMs: Date.now() - start,
    };
    this.mapLogs.push(entry);
    summarizeLog.info(`chunk ${chunk.position}/${chunk.total} ms=${entry.durationMs} respChars=${entry.respChars}`);

    return partial;
  }

  /** Maps every chunk; the result at index i belongs to chunks[i]. */
  async mapAll(chunks: Chunk[], instructions: string): Promise<string[]> {
    const partials = new Array<string>(chunks.length);
    let next = 0;
    let failed = false;

    const worker = async (): Promise<void> => {
      while (!failed && next < chunks.length) {
        const index = next++;
        const chunk = chunks[index];
        if (!chunk) continue;
        try {
          partials[index] = await this.map(chunk, instructions);
        } catch (err) {
          // stop handing out chunks; the run is already lost
          failed = true;
          throw err;
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.mapConcurrency, chunks.length) }, () => worker());
    await Promise.all(workers);

    return partials;
  }

  /** Synthesizes the ordered partial summaries into one document. */
  async reduce(partials: string[], instructions: string): Promise<string> {
    const parts = buildSynthesisPrompt({ instructions, partials });
    const start = Date.now();
    const text = (await this.request(parts, "final synthesis")) ?? "";
    const finalMarkdown = text.trim();

    summarizeLog.info(`final synthesis partials=${partials.length} ms=${Date.now() - start} respChars=${finalMarkdown.length}`);
    return finalMarkdown;
  }

  private async request(parts: string[], label: string): Promise<string | null> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const result = await this.generate(parts);
        return result.text;
      } catch (err) {
        lastError = err;
        if (attempt < this.maxRetries) {
          summarizeLog.warn(`${label} failed (attempt ${attempt + 1}/${this.maxRetries + 1}), retrying`, {
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }
    }

    if (lastError instanceof GenerationServiceError) throw lastError;
    const message = lastError instanceof Error ? lastError.message : String(lastError);
    throw new GenerationServiceError(`${label} failed: ${message}`, { cause: lastError });
  }
}
