import fs from "fs";
import path from "path";
import { TutoringSession, isUnderstandingLevel } from "../domain/tutoring";
import {
  ProgressRecord,
  SessionSummary,
  emptyProgressRecord,
  formatProgressSummary,
  percentCorrect,
  setLevelForTopic,
} from "../domain/progress";

export const DEFAULT_PROGRESS_FILE = path.join(__dirname, "../../data/student-progress.json");

type ProgressData = Map<string, ProgressRecord>;

/**
 * ProgressStore keeps every student's progress in a single JSON file.
 *
 * The whole file is rewritten on each update. There is no locking, so two
 * processes updating at once can lose one of the writes (last writer wins).
 */
export class ProgressStore {
  private data: ProgressData;

  constructor(private filePath: string = DEFAULT_PROGRESS_FILE) {
    const dataDir = path.dirname(filePath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
    this.data = this.loadData();
  }

  /**
   * Get a student's record, creating an empty one on first access
   */
  get(studentId: string): ProgressRecord {
    let record = this.data.get(studentId);
    if (!record) {
      record = emptyProgressRecord();
      this.data.set(studentId, record);
    }
    return record;
  }

  /**
   * Append a summary of the session and fold its counters into the totals
   */
  update(session: TutoringSession): void {
    const record = this.get(session.studentId);

    const summary: SessionSummary = {
      timestamp: new Date().toISOString(),
      topic: session.topic,
      questionsAsked: session.questionsAsked,
      correctAnswers: session.correctAnswers,
      accuracy: percentCorrect(session.correctAnswers, session.questionsAsked),
    };
    record.sessions.push(summary);

    for (const topic of session.topicsCovered) {
      if (!record.topicsCovered.includes(topic)) {
        record.topicsCovered.push(topic);
      }
    }

    record.totalQuestions += session.questionsAsked;
    record.totalCorrect += session.correctAnswers;
    setLevelForTopic(record, session.topic, session.understandingLevel);

    this.writeData();
  }

  summarize(studentId: string): string {
    return formatProgressSummary(studentId, this.get(studentId));
  }

  private loadData(): ProgressData {
    if (!fs.existsSync(this.filePath)) {
      return new Map();
    }

    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
      return toProgressData(parsed);
    } catch (error) {
      console.error(`[progress] Could not read ${this.filePath}, starting empty:`, error);
      return new Map();
    }
  }

  private writeData(): void {
    fs.writeFileSync(this.filePath, JSON.stringify(Object.fromEntries(this.data), null, 2));
  }
}

// ============================================
// Validation of data read back from disk
// ============================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toCount(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

function toSummary(value: unknown): SessionSummary | null {
  if (!isObject(value) || typeof value.topic !== "string") {
    return null;
  }
  return {
    timestamp: typeof value.timestamp === "string" ? value.timestamp : "",
    topic: value.topic,
    questionsAsked: toCount(value.questionsAsked),
    correctAnswers: toCount(value.correctAnswers),
    accuracy: toCount(value.accuracy),
  };
}

function toRecord(value: unknown): ProgressRecord {
  const record = emptyProgressRecord();
  if (!isObject(value)) {
    return record;
  }

  if (Array.isArray(value.sessions)) {
    for (const entry of value.sessions) {
      const summary = toSummary(entry);
      if (summary) record.sessions.push(summary);
    }
  }
  if (Array.isArray(value.topicsCovered)) {
    record.topicsCovered = value.topicsCovered.filter(
      (topic): topic is string => typeof topic === "string"
    );
  }
  record.totalQuestions = toCount(value.totalQuestions);
  record.totalCorrect = toCount(value.totalCorrect);
  if (isObject(value.understandingLevels)) {
    for (const [topic, level] of Object.entries(value.understandingLevels)) {
      if (isUnderstandingLevel(level)) {
        setLevelForTopic(record, topic, level);
      }
    }
  }
  return record;
}

function toProgressData(value: unknown): ProgressData {
  const data: ProgressData = new Map();
  if (!isObject(value)) {
    return data;
  }
  for (const [studentId, record] of Object.entries(value)) {
    data.set(studentId, toRecord(record));
  }
  return data;
}
