import { describe, expect, it } from "vitest";
import { EmbeddingService } from "../src/services/embedding.service.js";
import { LlmService } from "../src/services/llm.service.js";
import { buildContentPrompt, formatContext } from "../src/services/prompts.js";
import { cosineSimilarity } from "../src/services/vector-store/memory-vector-store.js";

describe("EmbeddingService without an API key", () => {
  const service = new EmbeddingService({ model: "test-embeddings", dimensions: 16 });

  it("embeds deterministically at the configured dimension", async () => {
    const [first, second] = await service.embedDocuments(["Spring launch", "Spring launch"]);

    expect(service.offline).toBe(true);
    expect(first).toHaveLength(16);
    expect(first).toEqual(second);
    expect(first?.reduce((sum, value) => sum + value, 0)).toBe(2);
  });

  it("ignores case and punctuation", async () => {
    const query = await service.embedQuery("PRICING!");
    const [document] = await service.embedDocuments(["pricing pricing"]);

    expect(cosineSimilarity(query, document ?? [])).toBeCloseTo(1);
  });

  it("rejects an empty query", async () => {
    await expect(service.embedQuery("  ")).rejects.toThrow("Text must not be empty");
  });

  it("returns nothing for no documents", async () => {
    expect(await service.embedDocuments([])).toEqual([]);
  });
});

describe("LlmService without an API key", () => {
  const service = new LlmService({ model: "test-model" });

  it("echoes the prompt with a context excerpt", async () => {
    expect(await service.generate("Question: hi", ["first piece", "second piece", "third piece"])).toBe(
      "(offline) Question: hi\n\nContext excerpt: first piece second piece",
    );
  });

  it("notes missing context", async () => {
    expect(await service.generate("Question: hi")).toBe("(offline) Question: hi\n\nContext excerpt: No context available.");
  });
});

describe("prompts", () => {
  it("numbers context pieces", () => {
    expect(formatContext(["alpha", "beta"])).toBe("Company knowledge:\n[1] alpha\n\n[2] beta");
    expect(formatContext([])).toBe("");
  });

  it("lists additional requirements and skips empty ones", () => {
    const prompt = buildContentPrompt({
      contentType: "social post",
      topic: "spring launch",
      audience: "students",
      params: { tone: "playful", hashtags: ["spring", "launch"], length: "", cta: null },
    });

    expect(prompt).toBe(
      [
        'Write a social post about "spring launch" for students.',
        "Match the company's voice and mention specific products or facts from the company knowledge where they fit.",
        'Additional requirements:\n- tone: playful\n- hashtags: ["spring","launch"]',
      ].join("\n\n"),
    );
  });
});
