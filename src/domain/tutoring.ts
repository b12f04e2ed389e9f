import { Evaluation } from "./evaluation";

/**
 * A TutoringSession is one conversation between the tutor and a single
 * student on a single topic. It is mutated only by TutoringWorkflow.
 */

export const UNDERSTANDING_LEVELS = ["beginner", "intermediate", "advanced"] as const;
export type UnderstandingLevel = (typeof UNDERSTANDING_LEVELS)[number];

// Order matters: ActionPolicy matches replies against this list front to back
export const TUTOR_ACTIONS = [
  "ask_question",
  "provide_explanation",
  "follow_up",
  "end_session",
] as const;
export type TutorAction = (typeof TUTOR_ACTIONS)[number];

export type SessionPhase =
  | "created"
  | "initialized"
  | "awaiting_answer"
  | "evaluating"
  | "deciding"
  | "explaining"
  | "ended";

export interface ConversationTurn {
  role: "student" | "tutor";
  content: string;
}

export interface TutoringSession {
  id: string;
  studentId: string;
  topic: string;
  conversation: ConversationTurn[];
  currentQuestion: string;
  studentAnswer: string;
  evaluation?: Evaluation; // Cleared whenever a new answer comes in
  explanationProvided: boolean;
  questionsAsked: number;
  correctAnswers: number;
  topicsCovered: string[];
  understandingLevel: UnderstandingLevel;
  nextAction: TutorAction;
  active: boolean;
  phase: SessionPhase;
  createdAt: string;
}

/**
 * Prefix used to mark explanation turns in the conversation log
 */
export const EXPLANATION_PREFIX = "Explanation: ";

export const MASTERY_ACCURACY = 0.8;
export const MASTERY_MIN_QUESTIONS = 3;
export const STRUGGLING_ACCURACY = 0.5;

export function isUnderstandingLevel(value: unknown): value is UnderstandingLevel {
  return UNDERSTANDING_LEVELS.some(level => level === value);
}

/**
 * Fraction of correct answers, 0 when nothing has been asked yet.
 */
export function accuracyOf(correctAnswers: number, questionsAsked: number): number {
  return questionsAsked > 0 ? correctAnswers / questionsAsked : 0;
}

export function hasMastered(correctAnswers: number, questionsAsked: number): boolean {
  return (
    accuracyOf(correctAnswers, questionsAsked) >= MASTERY_ACCURACY &&
    questionsAsked >= MASTERY_MIN_QUESTIONS
  );
}

/**
 * Move the level at most one step along beginner < intermediate < advanced.
 */
export function adjustLevel(
  level: UnderstandingLevel,
  correctAnswers: number,
  questionsAsked: number
): UnderstandingLevel {
  const index = UNDERSTANDING_LEVELS.indexOf(level);

  if (hasMastered(correctAnswers, questionsAsked)) {
    return UNDERSTANDING_LEVELS[Math.min(index + 1, UNDERSTANDING_LEVELS.length - 1)];
  }
  if (accuracyOf(correctAnswers, questionsAsked) < STRUGGLING_ACCURACY) {
    return UNDERSTANDING_LEVELS[Math.max(index - 1, 0)];
  }
  return level;
}

/**
 * Questions the tutor has already asked: any tutor turn with a question mark.
 */
export function previousQuestions(conversation: ConversationTurn[]): string[] {
  return conversation
    .filter(turn => turn.role === "tutor" && turn.content.includes("?"))
    .map(turn => turn.content);
}
