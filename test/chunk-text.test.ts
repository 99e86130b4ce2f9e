import { describe, expect, it } from "vitest";
import { chunkText } from "../src/utils/chunk-text.js";
import { ConfigurationError } from "../src/utils/errors.js";
import { numberedWords } from "./helpers.js";

const wordsOf = (chunk: string) => chunk.split(" ");

describe("chunkText", () => {
  it("returns no chunks for empty or blank input", () => {
    expect(chunkText("")).toEqual([]);
    expect(chunkText("   \n\n  \t ")).toEqual([]);
  });

  it("cuts an oversized paragraph into overlapping windows", () => {
    const chunks = chunkText(numberedWords(2500).join(" "), 1000, 100).map(wordsOf);

    expect(chunks.map((chunk) => chunk.length)).toEqual([1000, 1000, 700]);
    expect(chunks[0]?.slice(-100)).toEqual(chunks[1]?.slice(0, 100));
    expect(chunks[1]?.slice(-100)).toEqual(chunks[2]?.slice(0, 100));
    expect(chunks[2]?.at(-1)).toBe("w2499");
  });

  it("accumulates paragraphs and seeds the next chunk with trailing words", () => {
    expect(chunkText("a b c\n\nd e f\n\ng h", 5, 2)).toEqual(["a b c", "b c d e f", "e f g h"]);
  });

  it("falls back to sentences when the text has no blank lines", () => {
    expect(chunkText("One two three. Four five six. Seven eight.", 4, 1)).toEqual([
      "One two three.",
      "three. Four five six.",
      "six. Seven eight.",
    ]);
  });

  it("trims carried words instead of exceeding the budget", () => {
    expect(chunkText("a b c d\n\ne f g h", 5, 3)).toEqual(["a b c d", "d e f g h"]);
  });

  it("emits nothing extra when only carried words remain after a long paragraph", () => {
    const chunks = chunkText(`intro words\n\n${numberedWords(12).join(" ")}`, 10, 3);
    expect(chunks).toEqual(["intro words", "w0 w1 w2 w3 w4 w5 w6 w7 w8 w9", "w7 w8 w9 w10 w11"]);
  });

  it("keeps every word in order within the budget", () => {
    const sizes = [3, 7, 12, 2, 30, 4];
    let next = 0;
    const paragraphs = sizes.map((size) =>
      Array.from({ length: size }, () => {
        next += 1;
        return `w${next}`;
      }).join(" "),
    );
    const original = paragraphs.join(" ").split(" ");

    const chunks = chunkText(paragraphs.join("\n\n"), 10, 3);

    const seen = new Set<string>();
    const rebuilt: string[] = [];
    for (const chunk of chunks) {
      const words = wordsOf(chunk);
      expect(words.length).toBeLessThanOrEqual(10);
      for (const word of words) {
        if (!seen.has(word)) {
          seen.add(word);
          rebuilt.push(word);
        }
      }
    }
    expect(rebuilt).toEqual(original);
  });

  it("is deterministic", () => {
    const text = "Brand voice is warm.\n\nPricing starts at 19 USD. Annual plans save 20 percent.";
    expect(chunkText(text, 6, 2)).toEqual(chunkText(text, 6, 2));
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => chunkText("a b c", 10, 10)).toThrow(ConfigurationError);
    expect(() => chunkText("a b c", 0, 0)).toThrow(ConfigurationError);
  });
});
