const SENTENCE_SEPARATORS = ['. ', '.\n', '! ', '? ', '\n\n'];

/** Share of the window, counted from its end, searched for a sentence break. */
const BREAK_WINDOW = 0.2;

/**
 * Splits text into overlapping windows of at most `size` characters. A window
 * that would cut mid-text ends after the last sentence separator found in its
 * final fifth instead. Chunks are trimmed; empty ones are dropped.
 */
export function chunkText(text: string, size: number, overlap: number): string[] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${String(size)}`);
  }
  if (overlap < 0 || overlap >= size) {
    throw new RangeError(`Chunk overlap must be within [0, ${String(size)}), got ${String(overlap)}`);
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + size, text.length);

    if (end < text.length) {
      const searchStart = Math.floor(end - size * BREAK_WINDOW);
      for (const separator of SENTENCE_SEPARATORS) {
        const position = text.lastIndexOf(separator, end - separator.length);
        if (position > start && position >= searchStart) {
          end = position + separator.length;
          break;
        }
      }
    }

    const chunk = text.slice(start, end).trim();
    if (chunk.length > 0) {
      chunks.push(chunk);
    }

    if (end >= text.length) break;
    start = Math.max(end - overlap, start + 1);
  }

  return chunks;
}
