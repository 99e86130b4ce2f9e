import OpenAI from "openai";
import { logger } from "../lib/logger.js";
import { errorMessage, GenerationError } from "../utils/errors.js";
import { ASSISTANT_INSTRUCTIONS, formatContext } from "./prompts.js";

export interface GenerationClient {
  generate(prompt: string, context?: string[]): Promise<string>;
}

export interface LlmServiceOptions {
  apiKey?: string | undefined;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

export class LlmService implements GenerationClient {
  private readonly client?: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor({ apiKey, model, temperature = 0.3, maxTokens = 1500 }: LlmServiceOptions) {
    if (apiKey) {
      this.client = new OpenAI({ apiKey });
    }
    this.model = model;
    this.temperature = temperature;
    this.maxTokens = maxTokens;
  }

  async generate(prompt: string, context: string[] = []) {
    if (!this.client) {
      logger.warn("OPENAI_API_KEY not set - returning offline answer");
      const snippet = context.slice(0, 2).join(" ").slice(0, 280);
      return `(offline) ${prompt}\n\nContext excerpt: ${snippet || "No context available."}`;
    }

    const system = [ASSISTANT_INSTRUCTIONS, formatContext(context)].filter(Boolean).join("\n\n");

    let content: string | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: system },
          { role: "user", content: prompt },
        ],
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        stream: false,
      });
      content = completion.choices[0]?.message?.content?.trim();
    } catch (error) {
      throw new GenerationError(`Completion request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!content) {
      throw new GenerationError("Completion returned no content");
    }
    return content;
  }
}
