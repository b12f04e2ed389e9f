/**
 * Failure kinds at the text generation boundary.
 * Drivers use these to tell the operator what to do next.
 */
export type GenerationErrorKind =
  | "quota_exceeded" // Billing problem, retrying will not help
  | "rate_limited"   // Too many requests, wait and retry
  | "service_error"  // API error, network failure or timeout
  | "unknown";       // Anything the SDK did not classify

/**
 * Base class for errors raised while calling the text generation service.
 * The underlying SDK error is kept as `cause`.
 */
export class GenerationError extends Error {
  readonly kind: GenerationErrorKind;
  readonly hint: string;

  constructor(message: string, kind: GenerationErrorKind, hint: string, cause?: unknown) {
    super(message, { cause });
    this.name = "GenerationError";
    this.kind = kind;
    this.hint = hint;
  }
}

export class QuotaExceededError extends GenerationError {
  constructor(detail: string, cause?: unknown) {
    super(
      `OpenAI API quota exceeded: ${detail}`,
      "quota_exceeded",
      "Check your billing at https://platform.openai.com/account/billing and add credits.",
      cause
    );
    this.name = "QuotaExceededError";
  }
}

export class RateLimitedError extends GenerationError {
  constructor(detail: string, cause?: unknown) {
    super(
      `OpenAI API rate limit reached: ${detail}`,
      "rate_limited",
      "Wait a moment and try again.",
      cause
    );
    this.name = "RateLimitedError";
  }
}

export class ServiceError extends GenerationError {
  constructor(detail: string, cause?: unknown) {
    super(
      `OpenAI API error: ${detail}`,
      "service_error",
      "Check your API key, account status and network connection.",
      cause
    );
    this.name = "ServiceError";
  }
}

export class UnknownGenerationError extends GenerationError {
  constructor(detail: string, cause?: unknown) {
    super(
      `Unexpected error while generating text: ${detail}`,
      "unknown",
      "Try again; if it keeps failing, check the server logs.",
      cause
    );
    this.name = "UnknownGenerationError";
  }
}

export class SessionNotFoundError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}

export class SessionInactiveError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super("Session is no longer active");
    this.name = "SessionInactiveError";
    this.sessionId = sessionId;
  }
}

/**
 * A transition was requested from a state that does not allow it
 * (e.g. an explanation when the policy did not ask for one).
 */
export class InvalidTransitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidTransitionError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}
