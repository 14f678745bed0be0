import { ConfigurationError } from "../errors/errors";
import { Document } from "./types";

export type ChunkingStrategy = "fixed-length" | "sentence-aware";

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
  strategy: ChunkingStrategy;
}

export interface ChunkSpan {
  text: string;
  /** Offset of the first character in the source text. */
  start: number;
  /** Exclusive end offset. */
  end: number;
  positionIndex: number;
}

export interface ChunkDraft {
  id: string;
  documentId: string;
  text: string;
  positionIndex: number;
}

interface Range {
  start: number;
  end: number;
}

// Sentence end: terminal punctuation, optional closing quote/bracket, then whitespace.
const SENTENCE_BOUNDARY = /[.!?]+["'”’)\]]*\s+/g;

export function validateChunkingConfig(config: ChunkingConfig): void {
  if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
    throw new ConfigurationError(`chunk_size must be a positive integer, got ${config.chunkSize}`);
  }
  if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
    throw new ConfigurationError(
      `chunk_overlap must be a non-negative integer, got ${config.chunkOverlap}`
    );
  }
  if (config.chunkOverlap >= config.chunkSize) {
    throw new ConfigurationError(
      `chunk_overlap (${config.chunkOverlap}) must be smaller than chunk_size (${config.chunkSize})`
    );
  }
}

function fixedWindows(start: number, end: number, size: number, step: number): Range[] {
  const windows: Range[] = [];
  for (let offset = start; ; offset += step) {
    const windowEnd = Math.min(offset + size, end);
    windows.push({ start: offset, end: windowEnd });
    if (windowEnd >= end) break;
  }
  return windows;
}

function sentenceRanges(text: string, maxLength: number): Range[] {
  const ranges: Range[] = [];
  let last = 0;

  SENTENCE_BOUNDARY.lastIndex = 0;
  let match = SENTENCE_BOUNDARY.exec(text);
  while (match) {
    const end = match.index + match[0].length;
    ranges.push({ start: last, end });
    last = end;
    match = SENTENCE_BOUNDARY.exec(text);
  }
  if (last < text.length) ranges.push({ start: last, end: text.length });

  // Sentences longer than a chunk are cut into plain windows.
  return ranges.flatMap((range) =>
    range.end - range.start > maxLength
      ? fixedWindows(range.start, range.end, maxLength, maxLength)
      : [range]
  );
}

function packSentences(sentences: Range[], size: number, overlap: number): Range[] {
  const chunks: Range[] = [];
  let i = 0;

  while (i < sentences.length) {
    const start = sentences[i].start;
    let end = sentences[i].end;
    let j = i + 1;
    while (j < sentences.length && sentences[j].end - start <= size) {
      end = sentences[j].end;
      j++;
    }
    chunks.push({ start, end });
    if (j >= sentences.length) break;

    // Carry trailing sentences into the next chunk while they fit in the overlap
    // and still leave room for the next unseen sentence.
    let next = j;
    while (
      next - 1 > i &&
      end - sentences[next - 1].start <= overlap &&
      sentences[j].end - sentences[next - 1].start <= size
    ) {
      next--;
    }
    i = next;
  }

  return chunks;
}

/**
 * Splits text into overlapping spans. Same text and config always give
 * the same boundaries; evaluation reproducibility depends on it.
 */
export function chunkText(text: string, config: ChunkingConfig): ChunkSpan[] {
  validateChunkingConfig(config);
  if (text.trim().length === 0) return [];

  const ranges =
    config.strategy === "fixed-length"
      ? fixedWindows(0, text.length, config.chunkSize, config.chunkSize - config.chunkOverlap)
      : packSentences(sentenceRanges(text, config.chunkSize), config.chunkSize, config.chunkOverlap);

  return ranges.map((range, positionIndex) => ({
    text: text.slice(range.start, range.end),
    start: range.start,
    end: range.end,
    positionIndex,
  }));
}

export function chunkId(documentId: string, positionIndex: number): string {
  return `${documentId}#${positionIndex}`;
}

export function chunkDocument(document: Document, config: ChunkingConfig): ChunkDraft[] {
  return chunkText(document.rawText, config)
    .filter((span) => span.text.trim().length > 0)
    .map((span) => ({
      id: chunkId(document.id, span.positionIndex),
      documentId: document.id,
      text: span.text,
      positionIndex: span.positionIndex,
    }));
}
