/**
 * Sentence-aware chunker with character overlap.
 *
 * Sentences come from Intl.Segmenter so terminators follow the configured
 * locale. Sentences are packed into windows of at most `maxChunkSize`
 * characters; each following window starts up to `overlap` characters before
 * the previous one ended, on a sentence start when one falls inside that tail.
 * A sentence longer than the window is hard-split at the limit.
 *
 * Every chunk satisfies `text === rawText.slice(charStart, charEnd)`.
 */
import { sha256Hex } from "@utils/hash";

import type { Chunk, Document } from "./types";

export interface ChunkerOptions {
  maxChunkSize: number;
  overlap: number;
  locale?: string;
}

export const DEFAULT_CHUNKER_OPTIONS: ChunkerOptions = {
  maxChunkSize: 1000,
  overlap: 200,
  locale: "en",
};

interface Span {
  start: number;
  end: number;
}

export function chunkIdFor(
  documentId: string,
  version: string,
  contentHash: string,
  sequenceIndex: number
): string {
  return sha256Hex(
    `${documentId}:${version}:${contentHash}:${sequenceIndex}`
  ).slice(0, 32);
}

export class Chunker {
  private readonly options: ChunkerOptions;
  private readonly segmenter: Intl.Segmenter;

  constructor(options: Partial<ChunkerOptions> = {}) {
    this.options = { ...DEFAULT_CHUNKER_OPTIONS, ...options };

    const { maxChunkSize, overlap } = this.options;
    if (!Number.isInteger(maxChunkSize) || maxChunkSize < 1) {
      throw new RangeError("maxChunkSize must be a positive integer");
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxChunkSize) {
      throw new RangeError("overlap must be an integer in [0, maxChunkSize)");
    }

    this.segmenter = new Intl.Segmenter(this.options.locale, {
      granularity: "sentence",
    });
  }

  chunk(document: Document): Chunk[] {
    const text = document.rawText;
    const windows = this.windows(text);
    const chunks: Chunk[] = [];

    for (const window of windows) {
      const slice = text.slice(window.start, window.end);
      if (!slice.trim()) {
        continue;
      }

      const sequenceIndex = chunks.length;
      const contentHash = sha256Hex(slice);

      chunks.push({
        chunkId: chunkIdFor(
          document.documentId,
          document.version,
          contentHash,
          sequenceIndex
        ),
        documentId: document.documentId,
        version: document.version,
        sequenceIndex,
        text: slice,
        charStart: window.start,
        charEnd: window.end,
        contentHash,
      });
    }

    return chunks;
  }

  /** Contiguous units covering the text: sentences, hard-split when oversized. */
  private units(text: string): Span[] {
    const { maxChunkSize } = this.options;
    const units: Span[] = [];

    for (const { segment, index } of this.segmenter.segment(text)) {
      const end = index + segment.length;
      for (let start = index; start < end; start += maxChunkSize) {
        units.push({ start, end: Math.min(end, start + maxChunkSize) });
      }
    }

    return units;
  }

  private windows(text: string): Span[] {
    const { maxChunkSize, overlap } = this.options;
    const units = this.units(text);
    const windows: Span[] = [];

    let start = 0;
    let unitIndex = 0;

    while (start < text.length && unitIndex < units.length) {
      while (unitIndex < units.length && (units[unitIndex]?.end ?? 0) <= start) {
        unitIndex += 1;
      }

      let end = start;
      let next = unitIndex;
      while (next < units.length) {
        const unit = units[next];
        if (!unit || (unit.end - start > maxChunkSize && end > start)) {
          break;
        }
        end = Math.min(unit.end, start + maxChunkSize);
        next += 1;
      }

      windows.push({ start, end });

      const following = units[next];
      if (!following || end >= text.length) {
        break;
      }

      // The next window must reach past `end`, so it has to fit `following`.
      const floor = Math.max(
        end - overlap,
        start + 1,
        following.end - maxChunkSize
      );
      let nextStart = floor;
      for (let i = unitIndex; i < next; i += 1) {
        const unit = units[i];
        if (unit && unit.start >= floor && unit.start < end) {
          nextStart = unit.start;
          break;
        }
      }

      start = nextStart;
    }

    return windows;
  }
}
