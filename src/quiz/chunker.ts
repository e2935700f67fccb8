/** Rough token estimate used for the chunk budget. */
export const CHARS_PER_TOKEN = 4;

/**
 * Splits text into word-bounded chunks of at most `maxSize` approximate
 * tokens. A word longer than the whole budget gets a chunk of its own and is
 * never split. Text without any words comes back as a single chunk.
 */
export function chunkText(text: string, maxSize: number): string[] {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const budget = maxSize * CHARS_PER_TOKEN;
  const chunks: string[] = [];
  let currentChunk: string[] = [];
  let currentSize = 0;

  for (const word of words) {
    const wordSize = [...word].length + 1; // code points, +1 for the joining space
    if (currentSize + wordSize > budget && currentChunk.length > 0) {
      chunks.push(currentChunk.join(' '));
      currentChunk = [];
      currentSize = 0;
    }
    currentChunk.push(word);
    currentSize += wordSize;
  }

  if (currentChunk.length > 0) {
    chunks.push(currentChunk.join(' '));
  }

  return chunks.length > 0 ? chunks : [text];
}
