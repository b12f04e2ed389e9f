import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  RateLimitError,
} from "openai";
import { TextGenerator } from "./textGenerator";
import {
  GenerationError,
  QuotaExceededError,
  RateLimitedError,
  ServiceError,
  UnknownGenerationError,
} from "./errors";

export interface OpenAITextGeneratorOptions {
  apiKey?: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
  client?: OpenAI; // Prebuilt client, mostly for tests
}

/**
 * OpenAITextGenerator sends each prompt as a single user message
 * to the chat completions endpoint and returns the reply text.
 */
export class OpenAITextGenerator implements TextGenerator {
  private client: OpenAI;
  private model: string;
  private temperature: number;

  constructor(options: OpenAITextGeneratorOptions = {}) {
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey || process.env.OPENAI_API_KEY,
        timeout: options.timeoutMs ?? 30_000,
        maxRetries: 0,
      });
    this.model = options.model ?? "gpt-4o-mini";
    this.temperature = options.temperature ?? 0.7;
  }

  async generate(prompt: string): Promise<string> {
    let content: string | null | undefined;

    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        temperature: this.temperature,
      });
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      throw toGenerationError(error);
    }

    if (!content) {
      throw new UnknownGenerationError("No response from model");
    }
    return content;
  }
}

/**
 * Map an SDK failure onto the generation error taxonomy.
 * Timeouts are checked before connection errors since they extend them.
 */
export function toGenerationError(error: unknown): GenerationError {
  if (error instanceof GenerationError) {
    return error;
  }
  if (error instanceof RateLimitError) {
    if (error.code === "insufficient_quota" || /quota/i.test(error.message)) {
      return new QuotaExceededError(error.message, error);
    }
    return new RateLimitedError(error.message, error);
  }
  if (error instanceof APIConnectionTimeoutError) {
    return new ServiceError("Request timed out", error);
  }
  if (error instanceof APIConnectionError) {
    return new ServiceError("Failed to connect to the API", error);
  }
  if (error instanceof APIError) {
    return new ServiceError(error.message, error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new UnknownGenerationError(message, error);
}
