import { BLOCK_SEPARATOR } from "../corpus/corpus.js";
import { ConfigurationError } from "../errors.js";

export type Chunk = {
  /** 1-based */
  position: number;
  total: number;
  text: string;
  bytes: number;
};

export function byteLength(text: string): number {
  return Buffer.byteLength(text, "utf8");
}

/**
 * Splits on blank-line separators, keeping each separator attached to the
 * block before it so that the blocks concatenate back to the input.
 */
export function splitBlocks(text: string): string[] {
  const pieces = text.split(BLOCK_SEPARATOR);
  const blocks: string[] = [];

  pieces.forEach((piece, index) => {
    const isLast = index === pieces.length - 1;
    if (isLast) {
      if (piece) blocks.push(piece);
    } else {
      blocks.push(piece + BLOCK_SEPARATOR);
    }
  });

  return blocks;
}

/**
 * Greedy packing of whole blocks into chunks of at most `maxBytes` UTF-8 bytes.
 * A block larger than `maxBytes` is emitted alone rather than split.
 */
export function chunkCorpusText(text: string, maxBytes: number): Chunk[] {
  if (!Number.isInteger(maxBytes) || maxBytes < 1) {
    throw new ConfigurationError(`Chunk byte budget must be a positive integer, got ${maxBytes}`);
  }

  const texts: string[] = [];
  let current = "";
  let currentBytes = 0;

  for (const block of splitBlocks(text)) {
    const blockBytes = byteLength(block);
    if (current && currentBytes + blockBytes > maxBytes) {
      texts.push(current);
      current = "";
      currentBytes = 0;
    }
    current += block;
    currentBytes += blockBytes;
  }

  if (current) texts.push(current);

  return texts.map((chunkText, index) => ({
    position: index + 1,
    total: texts.length,
    text: chunkText,
    bytes: byteLength(chunkText),
  }));
}
