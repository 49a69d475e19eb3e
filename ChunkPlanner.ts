import { ConfigurationError } from './Errors';

export interface Chunk {
  index: number;
  startOffset: number;
  text: string;
}

export interface ChunkView {
  chunk: Chunk;
  context: string;
  fresh: string;
}

export function strideFor(windowSize: number): number {
  if (!Number.isInteger(windowSize) || windowSize <= 0) {
    throw new ConfigurationError(`Window size must be a positive integer, got ${windowSize}`);
  }
  const stride = Math.floor(windowSize / 2);
  if (stride === 0) {
    throw new ConfigurationError(`Window size ${windowSize} leaves no room to advance between chunks`);
  }
  return stride;
}

// True when index `i` falls between the two halves of a surrogate pair.
function insidePair(text: string, i: number): boolean {
  if (i <= 0 || i >= text.length) {
    return false;
  }
  const high = text.charCodeAt(i - 1);
  const low = text.charCodeAt(i);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

/**
 * Splits text into windows of `windowSize` characters, each starting half a
 * window after the previous one. The last window is clipped to the text and
 * every character falls in at least one window.
 *
 * A window edge never splits a surrogate pair: a start inside one moves back a
 * unit and an end inside one moves forward a unit, so such a window is one
 * unit longer than `windowSize`.
 */
export function planChunks(text: string, windowSize: number): Chunk[] {
  const stride = strideFor(windowSize);
  const chunks: Chunk[] = [];
  for (let offset = 0; offset < text.length; offset += stride) {
    const start = insidePair(text, offset) ? offset - 1 : offset;
    const end = insidePair(text, offset + windowSize) ? offset + windowSize + 1 : offset + windowSize;
    chunks.push({
      index: chunks.length,
      startOffset: start,
      text: text.slice(start, end),
    });
  }
  return chunks;
}

// Separates what earlier windows already covered from what each window adds.
export function splitOverlap(chunks: Chunk[]): ChunkView[] {
  let coveredUntil = 0;
  return chunks.map(chunk => {
    const end = chunk.startOffset + chunk.text.length;
    const contextLength = Math.max(0, Math.min(coveredUntil, end) - chunk.startOffset);
    coveredUntil = Math.max(coveredUntil, end);
    return {
      chunk,
      context: chunk.text.slice(0, contextLength),
      fresh: chunk.text.slice(contextLength),
    };
  });
}
