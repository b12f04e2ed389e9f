/**
 * Tutoring Service
 *
 * The surface drivers (API routes, CLI) use to run tutoring sessions:
 * - Start a session and get the first question
 * - Submit an answer and get feedback, an optional explanation and the next question
 * - Read a session's counters or a student's overall progress
 * - End a session explicitly (records it and removes it from the registry)
 */

import { TutoringWorkflow } from "../domain/tutoringWorkflow";
import { ProgressRecord, percentCorrect } from "../domain/progress";
import { ValidationError } from "../domain/errors";
import {
  TutoringSession,
  UnderstandingLevel,
  isUnderstandingLevel,
} from "../domain/tutoring";
import { ProgressStore } from "../stores/progressStore";
import { SessionRegistry } from "./sessionRegistry";

// ============================================
// Input / Result Types
// ============================================

export interface StartSessionInput {
  studentId: string;
  topic: string;
  understandingLevel?: string;
}

export interface SessionState {
  topic: string;
  understandingLevel: UnderstandingLevel;
  questionsAsked: number;
  correctAnswers: number;
  accuracy: number; // Percent
  active: boolean;
}

export interface StartSessionResult {
  sessionId: string;
  question: string;
  state: SessionState;
}

export interface SubmitAnswerResult {
  sessionId: string;
  feedback: string;
  correct: boolean;
  score: number;
  explanation?: string;
  nextQuestion?: string;
  state: SessionState;
}

export interface StudentProgressResult {
  studentId: string;
  summary: string;
  progress: ProgressRecord;
}

export interface EndSessionResult {
  sessionId: string;
  summary: SessionState;
}

export function toSessionState(session: TutoringSession): SessionState {
  return {
    topic: session.topic,
    understandingLevel: session.understandingLevel,
    questionsAsked: session.questionsAsked,
    correctAnswers: session.correctAnswers,
    accuracy: percentCorrect(session.correctAnswers, session.questionsAsked),
    active: session.active,
  };
}

/**
 * A student's summary text and stored record
 */
export function readStudentProgress(
  progressStore: ProgressStore,
  studentId: string
): StudentProgressResult {
  return {
    studentId,
    summary: progressStore.summarize(studentId),
    progress: progressStore.get(studentId),
  };
}

function requireText(value: string | undefined, field: string): string {
  const trimmed = value?.trim() ?? "";
  if (!trimmed) {
    throw new ValidationError(`${field} is required`);
  }
  return trimmed;
}

export class TutoringService {
  constructor(
    private workflow: TutoringWorkflow,
    private progressStore: ProgressStore,
    private registry: SessionRegistry
  ) {}

  async startSession(input: StartSessionInput): Promise<StartSessionResult> {
    const studentId = requireText(input.studentId, "studentId");
    const topic = requireText(input.topic, "topic");

    const level = input.understandingLevel ?? "beginner";
    if (!isUnderstandingLevel(level)) {
      throw new ValidationError(
        `understandingLevel must be one of beginner, intermediate, advanced (got "${level}")`
      );
    }

    const session = this.workflow.createSession(studentId, topic, level);
    this.workflow.initialize(session);
    const question = await this.workflow.generateQuestion(session);

    // Only registered once the first question exists
    this.registry.add(session);

    return { sessionId: session.id, question, state: toSessionState(session) };
  }

  async submitAnswer(sessionId: string, answer: string): Promise<SubmitAnswerResult> {
    const session = this.registry.require(sessionId);
    const text = requireText(answer, "answer");

    const turn = await this.workflow.runTurn(session, text);
    if (!session.active) {
      // Ended by the policy; record the closing summary
      this.workflow.end(session);
    }

    return {
      sessionId,
      feedback: turn.evaluation.feedback,
      correct: turn.evaluation.correct,
      score: turn.evaluation.score,
      explanation: turn.explanation,
      nextQuestion: turn.nextQuestion,
      state: toSessionState(session),
    };
  }

  getSessionProgress(sessionId: string): SessionState {
    return toSessionState(this.registry.require(sessionId));
  }

  getStudentProgress(studentId: string): StudentProgressResult {
    return readStudentProgress(this.progressStore, studentId);
  }

  /**
   * Record the session one last time and drop it from the registry.
   * Later requests for this id get SessionNotFoundError.
   */
  endSession(sessionId: string): EndSessionResult {
    const session = this.registry.require(sessionId);
    this.workflow.end(session);
    this.registry.remove(sessionId);
    return { sessionId, summary: toSessionState(session) };
  }
}
