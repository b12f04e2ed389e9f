import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  RateLimitError,
} from "openai";
import { OpenAITextGenerator, toGenerationError } from "./openaiTextGenerator";
import {
  QuotaExceededError,
  RateLimitedError,
  ServiceError,
  UnknownGenerationError,
} from "./errors";

describe("toGenerationError", () => {
  it("maps an exhausted quota", () => {
    const sdkError = new RateLimitError(
      429,
      { code: "insufficient_quota", message: "You exceeded your current quota" },
      undefined,
      {}
    );

    const error = toGenerationError(sdkError);

    expect(error).toBeInstanceOf(QuotaExceededError);
    expect(error.kind).toBe("quota_exceeded");
    expect(error.message).toBe("OpenAI API quota exceeded: 429 You exceeded your current quota");
    expect(error.cause).toBe(sdkError);
  });

  it("treats a 429 mentioning quota as a quota error even without a code", () => {
    const sdkError = new RateLimitError(429, { message: "Quota reached" }, undefined, {});

    expect(toGenerationError(sdkError)).toBeInstanceOf(QuotaExceededError);
  });

  it("maps a plain 429 to a rate limit", () => {
    const sdkError = new RateLimitError(
      429,
      { message: "Rate limit reached for requests" },
      undefined,
      {}
    );

    const error = toGenerationError(sdkError);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error.message).toBe("OpenAI API rate limit reached: 429 Rate limit reached for requests");
    expect(error.hint).toBe("Wait a moment and try again.");
  });

  it("maps timeouts before other connection errors", () => {
    const error = toGenerationError(new APIConnectionTimeoutError());

    expect(error).toBeInstanceOf(ServiceError);
    expect(error.message).toBe("OpenAI API error: Request timed out");
  });

  it("maps connection failures", () => {
    const error = toGenerationError(new APIConnectionError({ message: "socket hang up" }));

    expect(error.message).toBe("OpenAI API error: Failed to connect to the API");
  });

  it("maps other API errors with their message", () => {
    const error = toGenerationError(new APIError(500, { message: "boom" }, undefined, {}));

    expect(error).toBeInstanceOf(ServiceError);
    expect(error.message).toBe("OpenAI API error: 500 boom");
  });

  it("wraps anything else as unknown", () => {
    const error = toGenerationError(new TypeError("bad input"));

    expect(error).toBeInstanceOf(UnknownGenerationError);
    expect(error.message).toBe("Unexpected error while generating text: bad input");
  });

  it("passes generation errors through", () => {
    const original = new RateLimitedError("slow down");

    expect(toGenerationError(original)).toBe(original);
  });
});

describe("OpenAITextGenerator", () => {
  it("translates SDK failures from the completions call", async () => {
    const client = new OpenAI({ apiKey: "test-api-key", maxRetries: 0 });
    jest
      .spyOn(client.chat.completions, "create")
      .mockRejectedValueOnce(
        new RateLimitError(429, { code: "insufficient_quota", message: "No credits" }, undefined, {})
      );
    const generator = new OpenAITextGenerator({ client });

    await expect(generator.generate("Hello")).rejects.toBeInstanceOf(QuotaExceededError);
  });
});
