import type { Segment } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEXT CHUNKER
// ═══════════════════════════════════════════════════════════════════════════════

export const SENTENCE_TERMINALS: ReadonlySet<string> = new Set(['.', '!', '?', '。', '！', '？', '．']);
export const CLAUSE_SEPARATORS: ReadonlySet<string> = new Set([',', ';', '，', '；']);

export interface ChunkerOptions {
  maxChunkSize?: number;
  minChunkSize?: number;
}

export const DEFAULT_MAX_CHUNK_SIZE = 1200;
export const DEFAULT_MIN_CHUNK_SIZE = 50;

/**
 * Scan backward from `end` (exclusive) for the last character in `marks`.
 * Returns the cut position just after it, or -1 when no cut of at least
 * `minLength` characters from `start` exists.
 */
function findCut(
  text: string,
  start: number,
  end: number,
  marks: ReadonlySet<string>,
  minLength: number,
): number {
  for (let i = end - 1; i >= start; i--) {
    if (marks.has(text.charAt(i))) {
      const cut = i + 1;
      return cut - start >= minLength ? cut : -1;
    }
  }
  return -1;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Split text into ordered segments of at most `maxChunkSize` characters.
 *
 * Cut priority, searched backward from the window end:
 *   1. sentence terminal   2. clause separator   3. hard cut at the window end
 * A tier is skipped when its cut would leave a segment under `minChunkSize`.
 * Segments are exact slices: joining them yields the input.
 */
export function splitText(text: string, options: ChunkerOptions = {}): Segment[] {
  const maxSize = Math.max(1, options.maxChunkSize ?? DEFAULT_MAX_CHUNK_SIZE);
  const minSize = Math.min(options.minChunkSize ?? DEFAULT_MIN_CHUNK_SIZE, maxSize);

  if (text.length === 0) return [];
  if (text.length <= maxSize) return [{ index: 0, content: text }];

  const segments: Segment[] = [];
  let cursor = 0;

  while (cursor < text.length) {
    if (text.length - cursor <= maxSize) {
      segments.push({ index: segments.length, content: text.slice(cursor) });
      break;
    }

    const windowEnd = cursor + maxSize;
    let cut = findCut(text, cursor, windowEnd, SENTENCE_TERMINALS, minSize);
    if (cut === -1) {
      cut = findCut(text, cursor, windowEnd, CLAUSE_SEPARATORS, minSize);
    }
    if (cut === -1) {
      cut = windowEnd;
      // Never split a surrogate pair
      if (cut - cursor > 1 && isHighSurrogate(text.charCodeAt(cut - 1))) {
        cut -= 1;
      }
    }

    segments.push({ index: segments.length, content: text.slice(cursor, cut) });
    cursor = cut;
  }

  return segments;
}

export class Chunker {
  constructor(private readonly options: ChunkerOptions = {}) {}

  split(text: string): Segment[] {
    return splitText(text, this.options);
  }
}
