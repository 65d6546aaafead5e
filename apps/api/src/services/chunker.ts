export type Chunk = {
  text: string;
  /** 1-based page number in the source PDF. */
  page: number;
  /** 1-based, restarts on every page. */
  chunkId: number;
  length: number;
};

export const DEFAULT_MAX_CHARS = 1200;

const SENTENCE_BOUNDARY = /(?<=[.?!])\s+/;

export function splitSentences(text: string): string[] {
  return text.split(SENTENCE_BOUNDARY).filter((s) => s.length > 0);
}

export function chunkText(rawText: string, maxChars = DEFAULT_MAX_CHARS): string[] {
  if (!Number.isInteger(maxChars) || maxChars < 1) throw new Error(`maxChars must be a positive integer, got ${maxChars}`);

  const text = rawText.trim();
  if (!text) return [];
  if (text.length <= maxChars) return [text];

  const packed: string[] = [];
  let cur = "";
  for (const sentence of splitSentences(text)) {
    if (!cur) {
      cur = sentence;
    } else if (cur.length + 1 + sentence.length <= maxChars) {
      cur += " " + sentence;
    } else {
      packed.push(cur);
      cur = sentence;
    }
  }
  if (cur) packed.push(cur);

  // A single sentence can still be longer than the limit.
  const out: string[] = [];
  for (const c of packed) {
    if (c.length <= maxChars) {
      out.push(c);
      continue;
    }
    for (let i = 0; i < c.length; i += maxChars) out.push(c.slice(i, i + maxChars));
  }
  return out;
}

export function chunkPages(pages: string[], maxChars = DEFAULT_MAX_CHARS): Chunk[] {
  const chunks: Chunk[] = [];
  pages.forEach((pageText, i) => {
    chunkText(pageText, maxChars).forEach((text, j) => {
      chunks.push({ text, page: i + 1, chunkId: j + 1, length: text.length });
    });
  });
  return chunks;
}
