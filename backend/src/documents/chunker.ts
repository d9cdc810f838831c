export interface TextChunk {
  text: string;
  index: number;
}

export interface ChunkOptions {
  chunkSize?: number;
  overlap?: number;
}

export const DEFAULT_CHUNK_SIZE = 800;
export const DEFAULT_CHUNK_OVERLAP = 200;

// Preferred break points, strongest first
const SEPARATORS = ['\n\n', '\n', '. '];

/**
 * Splits text into overlapping windows of at most `chunkSize` characters,
 * preferring to end a window on a paragraph break, then a line break, then
 * a sentence end.
 *
 * A break is only taken when it lies past `start + overlap`, so every window
 * starts strictly after the previous one.
 */
export function chunkText(text: string, options: ChunkOptions = {}): TextChunk[] {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, received ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new RangeError(
      `overlap must be a non-negative integer smaller than chunkSize, received ${overlap}`,
    );
  }

  const normalized = text.replace(/\r\n?/g, '\n');
  if (normalized.trim().length === 0) {
    return [];
  }

  const pieces: string[] = [];
  const length = normalized.length;
  let start = 0;

  while (start < length) {
    let end = start + chunkSize;
    if (end >= length) {
      pieces.push(normalized.slice(start));
      break;
    }

    const breakAt = findBreak(normalized, start + overlap, end);
    if (breakAt !== -1) {
      end = breakAt + 1;
    }

    pieces.push(normalized.slice(start, end));
    start = overlap < end ? end - overlap : end;
  }

  return pieces
    .map((piece) => piece.trim())
    .filter((piece) => piece.length > 0)
    .map((piece, index) => ({ text: piece, index }));
}

// Last separator of the strongest kind that lies in (after, end]
function findBreak(text: string, after: number, end: number): number {
  for (const separator of SEPARATORS) {
    const at = text.lastIndexOf(separator, end + 1 - separator.length);
    if (at > after) {
      return at;
    }
  }
  return -1;
}
