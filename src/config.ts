import path from "path";
import { DEFAULT_PROGRESS_FILE } from "./stores/progressStore";

/**
 * Runtime settings, read from the environment (.env is loaded by the entry points).
 */
export interface TutorConfig {
  openaiApiKey?: string;
  model: string;
  temperature: number;
  requestTimeoutMs: number;
  progressFile: string;
  apiPort: number;
  maxActiveSessions: number; // 0 = unbounded
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseCount(value: string | undefined, fallback: number): number {
  const parsed = parseNumber(value, fallback);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TutorConfig {
  return {
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    model: env.OPENAI_MODEL || "gpt-4o-mini",
    temperature: parseNumber(env.OPENAI_TEMPERATURE, 0.7),
    requestTimeoutMs: parseCount(env.OPENAI_TIMEOUT_MS, 30_000),
    progressFile: env.PROGRESS_FILE ? path.resolve(env.PROGRESS_FILE) : DEFAULT_PROGRESS_FILE,
    apiPort: parseCount(env.API_PORT, 8000),
    maxActiveSessions: parseCount(env.MAX_ACTIVE_SESSIONS, 0),
  };
}
