import { UnderstandingLevel } from "./tutoring";

/**
 * Snapshot of one session's counters, appended on every progress update.
 */
export interface SessionSummary {
  timestamp: string; // ISO-8601
  topic: string;
  questionsAsked: number;
  correctAnswers: number;
  accuracy: number; // Percent, 0 when nothing was asked
}

/**
 * Everything we keep about a student across sessions.
 * `sessions` is append-only; `understandingLevels` keeps the latest level per topic.
 */
export interface ProgressRecord {
  sessions: SessionSummary[];
  topicsCovered: string[];
  totalQuestions: number;
  totalCorrect: number;
  understandingLevels: Record<string, UnderstandingLevel>;
}

export const NO_SESSIONS_MESSAGE = "No previous sessions found.";

export function emptyProgressRecord(): ProgressRecord {
  return {
    sessions: [],
    topicsCovered: [],
    totalQuestions: 0,
    totalCorrect: 0,
    understandingLevels: {},
  };
}

/**
 * Stored level for a topic. Only own keys count, so topics such as
 * "constructor" never resolve to Object.prototype members.
 */
export function levelForTopic(
  record: ProgressRecord,
  topic: string
): UnderstandingLevel | undefined {
  return Object.hasOwn(record.understandingLevels, topic)
    ? record.understandingLevels[topic]
    : undefined;
}

export function setLevelForTopic(
  record: ProgressRecord,
  topic: string,
  level: UnderstandingLevel
): void {
  // A computed key is always an own property, "__proto__" included
  record.understandingLevels = { ...record.understandingLevels, [topic]: level };
}

export function percentCorrect(correct: number, asked: number): number {
  return asked > 0 ? (correct / asked) * 100 : 0;
}

/**
 * Human-readable aggregate for a student.
 */
export function formatProgressSummary(studentId: string, record: ProgressRecord): string {
  if (record.sessions.length === 0) {
    return NO_SESSIONS_MESSAGE;
  }

  const accuracy = percentCorrect(record.totalCorrect, record.totalQuestions);
  const topics = record.topicsCovered.length > 0 ? record.topicsCovered.join(", ") : "None";

  return [
    "",
    `Progress Summary for Student: ${studentId}`,
    "=".repeat(40),
    `Total Sessions: ${record.sessions.length}`,
    `Total Questions: ${record.totalQuestions}`,
    `Correct Answers: ${record.totalCorrect}`,
    `Overall Accuracy: ${accuracy.toFixed(1)}%`,
    `Topics Covered: ${topics}`,
    "",
  ].join("\n");
}
