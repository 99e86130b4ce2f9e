import { assertChunking } from "../config/app-config.js";

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 100;

const toWords = (text: string) => text.split(/\s+/).filter(Boolean);

const splitParagraphs = (text: string) => {
  const paragraphs = text
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean);
  if (paragraphs.length > 1) return paragraphs;

  // Single block: sentences act as pseudo-paragraphs.
  return text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter(Boolean);
};

/**
 * Fixed windows over an oversized paragraph. The last window ends exactly at
 * the paragraph end, so no window is contained in the previous one.
 */
const slidingWindows = (words: string[], chunkSize: number, overlap: number) => {
  const windows: string[][] = [];
  const stride = chunkSize - overlap;
  for (let start = 0; start < words.length; start += stride) {
    const end = Math.min(start + chunkSize, words.length);
    windows.push(words.slice(start, end));
    if (end === words.length) break;
  }
  return windows;
};

/**
 * Splits text into word-budgeted, paragraph-aware chunks. Consecutive chunks
 * share up to `overlap` trailing words of the previous chunk.
 */
export const chunkText = (text: string, chunkSize = DEFAULT_CHUNK_SIZE, overlap = DEFAULT_CHUNK_OVERLAP) => {
  assertChunking({ chunkSize, overlap });

  const chunks: string[] = [];
  const carryFrom = (words: string[]) => (overlap > 0 ? words.slice(-overlap) : []);

  let buffer: string[] = [];
  // words in the buffer that were not carried over from the previous chunk
  let fresh = 0;

  for (const paragraph of splitParagraphs(text)) {
    const words = toWords(paragraph);
    if (!words.length) continue;

    if (words.length > chunkSize) {
      if (fresh > 0) chunks.push(buffer.join(" "));
      const windows = slidingWindows(words, chunkSize, overlap);
      for (const window of windows) {
        chunks.push(window.join(" "));
      }
      buffer = carryFrom(windows[windows.length - 1] ?? []);
      fresh = 0;
      continue;
    }

    if (fresh > 0 && buffer.length + words.length > chunkSize) {
      chunks.push(buffer.join(" "));
      buffer = carryFrom(buffer);
      fresh = 0;
    }

    const excess = buffer.length + words.length - chunkSize;
    if (excess > 0) {
      buffer = buffer.slice(excess);
    }
    buffer = buffer.concat(words);
    fresh += words.length;
  }

  if (fresh > 0) chunks.push(buffer.join(" "));
  return chunks;
};
