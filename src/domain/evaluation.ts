export interface Evaluation {
  score: number; // 0.0–1.0 as reported by the grader
  correct: boolean;
  feedback: string;
}

export const FALLBACK_SCORE = 0.5;

// First brace-delimited span with no nested braces
const JSON_OBJECT_PATTERN = /\{[^{}]*\}/;

/**
 * Best-effort parse of a grader reply into an Evaluation.
 *
 * The reply is untrusted free text. When no JSON object can be pulled out of
 * it, the whole reply becomes the feedback and correctness is guessed from the
 * words "correct" or "right" appearing anywhere (so "incorrect" counts).
 * Never throws.
 */
export function parseEvaluationReply(reply: string): Evaluation {
  const raw = extractJsonObject(reply) ?? {
    score: FALLBACK_SCORE,
    correct: /correct|right/i.test(reply),
    feedback: reply,
  };

  return {
    score: toScore(raw.score),
    correct: raw.correct === undefined ? false : Boolean(raw.correct),
    feedback: typeof raw.feedback === "string" ? raw.feedback : reply,
  };
}

function extractJsonObject(reply: string): Record<string, unknown> | null {
  const match = JSON_OBJECT_PATTERN.exec(reply);
  if (!match) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(match[0]);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toScore(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return FALLBACK_SCORE;
}
