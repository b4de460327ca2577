import type { ChunkCandidate } from "./types";

/** Default chunk size in characters. */
export const DEFAULT_CHUNK_SIZE = 500;
/** Default overlap in characters between consecutive chunks. */
export const DEFAULT_CHUNK_OVERLAP = 50;

/** Rough token estimate: 1 token ≈ 4 characters of English text. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function isWs(ch: string | undefined): boolean {
  return ch !== undefined && /\s/.test(ch);
}

/** Blank line starting at `p`: "\n", optional spaces/tabs, "\n". */
function isParagraphBreak(text: string, p: number): boolean {
  if (text[p] !== "\n") return false;
  let q = p + 1;
  while (text[q] === " " || text[q] === "\t" || text[q] === "\r") q++;
  return text[q] === "\n";
}

/**
 * Pick the end (exclusive) of a chunk that starts at `start`. Searches the
 * window `[lo, limit]` from the right for a paragraph break, then a sentence
 * end, then any whitespace; falls back to a hard cut at `limit`.
 */
function findBreak(text: string, lo: number, limit: number): number {
  for (let p = limit; p >= lo; p--) {
    if (isParagraphBreak(text, p)) return p;
  }
  for (let p = limit - 1; p >= lo - 1; p--) {
    const ch = text[p];
    if ((ch === "." || ch === "!" || ch === "?") && isWs(text[p + 1])) return p + 1;
  }
  for (let p = limit; p >= lo; p--) {
    if (isWs(text[p])) return p;
  }
  return limit;
}

/**
 * Split text into overlapping, size-bounded chunks that prefer natural
 * boundaries (paragraph, sentence, whitespace) over mid-word cuts.
 *
 * Spans never include leading or trailing whitespace, and
 * `text.slice(offset, offset + length)` reproduces each chunk exactly. The
 * result depends only on the inputs.
 *
 * @param text Full extracted document text.
 * @param maxSize Maximum characters per chunk.
 * @param overlap Characters shared between consecutive chunks; must be < maxSize.
 */
export function chunkText(
  text: string,
  maxSize = DEFAULT_CHUNK_SIZE,
  overlap = DEFAULT_CHUNK_OVERLAP,
): ChunkCandidate[] {
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new RangeError(`maxSize must be a positive integer (got ${maxSize})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxSize) {
    throw new RangeError(`overlap must be an integer in [0, maxSize) (got ${overlap})`);
  }

  // Trimmed end of the content; everything after is whitespace.
  let end = text.length;
  while (end > 0 && isWs(text[end - 1])) end--;
  let start = 0;
  while (start < end && isWs(text[start])) start++;
  if (start >= end) return [];

  const minLen = Math.max(overlap + 1, Math.ceil(maxSize / 2));
  const out: ChunkCandidate[] = [];

  while (start < end) {
    const limit = start + maxSize;
    const cut = limit >= end ? end : findBreak(text, start + minLen, limit);

    let stop = cut;
    while (stop > start && isWs(text[stop - 1])) stop--;
    const chunk = text.slice(start, stop);
    out.push({
      sequence: out.length,
      offset: start,
      length: chunk.length,
      text: chunk,
      tokenEstimate: estimateTokens(chunk),
    });
    if (cut >= end) break;

    let next = cut - overlap;
    // Landed inside a word: move to the next word start, never past the cut.
    if (!isWs(text[next - 1]) && !isWs(text[next])) {
      while (next < cut && !isWs(text[next])) next++;
    }
    while (next < end && isWs(text[next])) next++;
    start = next;
  }
  return out;
}
