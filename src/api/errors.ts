import { Response } from "express";
import {
  GenerationError,
  InvalidTransitionError,
  QuotaExceededError,
  RateLimitedError,
  ServiceError,
  SessionInactiveError,
  SessionNotFoundError,
  ValidationError,
} from "../domain/errors";

/**
 * HTTP status for a domain error; anything unrecognized is a 500
 */
export function statusFor(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof SessionInactiveError) return 400;
  if (error instanceof SessionNotFoundError) return 404;
  if (error instanceof InvalidTransitionError) return 409;
  if (error instanceof QuotaExceededError) return 402;
  if (error instanceof RateLimitedError) return 429;
  if (error instanceof ServiceError) return 502;
  return 500;
}

/**
 * Send an error as `{ error, code, hint? }` and log the unexpected ones
 */
export function sendError(res: Response, error: unknown, context: string): void {
  const status = statusFor(error);
  const message = error instanceof Error ? error.message : String(error);

  if (status >= 500 || error instanceof GenerationError) {
    console.error(`[api] ${context}:`, error);
  }

  res.status(status).json({
    error: message,
    code: error instanceof Error ? error.name : "Error",
    ...(error instanceof GenerationError ? { hint: error.hint } : {}),
  });
}
