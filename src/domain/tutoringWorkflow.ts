import { randomUUID } from "crypto";
import { TextGenerator } from "./textGenerator";
import { AnswerEvaluator } from "./evaluator";
import { Evaluation } from "./evaluation";
import { ActionPolicy } from "./actionPolicy";
import { ProgressRecord, levelForTopic } from "./progress";
import { buildExplanationPrompt, buildQuestionPrompt } from "./prompts";
import { InvalidTransitionError, SessionInactiveError } from "./errors";
import {
  EXPLANATION_PREFIX,
  TutoringSession,
  UnderstandingLevel,
  adjustLevel,
  previousQuestions,
} from "./tutoring";

/**
 * The slice of the progress store the workflow needs.
 */
export interface ProgressTracker {
  get(studentId: string): ProgressRecord;
  update(session: TutoringSession): void;
}

export interface TurnResult {
  evaluation: Evaluation;
  explanation?: string;
  nextQuestion?: string;
}

/**
 * TutoringWorkflow owns every transition of a TutoringSession:
 *
 *   created -> initialized -> awaiting_answer -> evaluating -> deciding
 *     -> (explaining -> deciding) -> awaiting_answer ... | ended
 *
 * Each step mutates the session in place. A failed generation call aborts the
 * step; whatever already ran stays applied (there is no rollback).
 */
export class TutoringWorkflow {
  constructor(
    private generator: TextGenerator,
    private evaluator: AnswerEvaluator,
    private policy: ActionPolicy,
    private progress: ProgressTracker
  ) {}

  createSession(
    studentId: string,
    topic: string,
    understandingLevel: UnderstandingLevel = "beginner"
  ): TutoringSession {
    return {
      id: randomUUID(),
      studentId,
      topic,
      conversation: [],
      currentQuestion: "",
      studentAnswer: "",
      explanationProvided: false,
      questionsAsked: 0,
      correctAnswers: 0,
      topicsCovered: [],
      understandingLevel,
      nextAction: "ask_question",
      active: true,
      phase: "created",
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Pick up the student's last known level for this topic, if any.
   * Meant to be called once, right after createSession.
   */
  initialize(session: TutoringSession): void {
    const storedLevel = levelForTopic(this.progress.get(session.studentId), session.topic);
    if (storedLevel) {
      session.understandingLevel = storedLevel;
    }

    if (!session.topicsCovered.includes(session.topic)) {
      session.topicsCovered.push(session.topic);
    }

    session.active = true;
    session.nextAction = "ask_question";
    session.phase = "initialized";
  }

  async generateQuestion(session: TutoringSession): Promise<string> {
    this.assertActive(session);

    const question = (
      await this.generator.generate(
        buildQuestionPrompt(
          session.topic,
          session.understandingLevel,
          previousQuestions(session.conversation)
        )
      )
    ).trim();

    session.currentQuestion = question;
    session.studentAnswer = "";
    session.conversation.push({ role: "tutor", content: question });
    session.phase = "awaiting_answer";
    return question;
  }

  submitAnswer(session: TutoringSession, answer: string): void {
    this.assertActive(session);

    session.studentAnswer = answer;
    session.conversation.push({ role: "student", content: answer });
    session.evaluation = undefined;
    session.phase = "evaluating";
  }

  async evaluate(session: TutoringSession): Promise<Evaluation> {
    this.assertActive(session);

    const evaluation = await this.evaluator.evaluate(
      session.currentQuestion,
      session.topic,
      session.studentAnswer
    );

    session.evaluation = evaluation;
    session.questionsAsked += 1;
    if (evaluation.correct) {
      session.correctAnswers += 1;
    }
    session.conversation.push({ role: "tutor", content: evaluation.feedback });
    return evaluation;
  }

  /**
   * Shift the level one step based on accuracy so far, then persist.
   */
  updateProgress(session: TutoringSession): void {
    session.understandingLevel = adjustLevel(
      session.understandingLevel,
      session.correctAnswers,
      session.questionsAsked
    );
    this.progress.update(session);
  }

  async decideNext(session: TutoringSession): Promise<void> {
    this.assertActive(session);

    const action = await this.policy.decide({
      topic: session.topic,
      questionsAsked: session.questionsAsked,
      correctAnswers: session.correctAnswers,
      lastAnswerCorrect: session.evaluation ? session.evaluation.correct : true,
      understandingLevel: session.understandingLevel,
    });

    session.nextAction = action;
    if (action === "end_session") {
      session.active = false;
      session.phase = "ended";
    } else {
      session.phase = "deciding";
    }
  }

  async explain(session: TutoringSession): Promise<string> {
    this.assertActive(session);
    if (session.nextAction !== "provide_explanation") {
      throw new InvalidTransitionError(
        `Cannot explain when the next action is ${session.nextAction}`
      );
    }

    session.phase = "explaining";
    const explanation = (
      await this.generator.generate(
        buildExplanationPrompt(
          session.topic,
          session.understandingLevel,
          session.currentQuestion,
          session.studentAnswer
        )
      )
    ).trim();

    session.explanationProvided = true;
    session.conversation.push({ role: "tutor", content: `${EXPLANATION_PREFIX}${explanation}` });

    await this.decideNext(session);
    return explanation;
  }

  /**
   * One full turn for a driver: grade the answer, update progress, decide,
   * explain if asked to, and fetch the next question while the session goes on.
   */
  async runTurn(session: TutoringSession, answer: string): Promise<TurnResult> {
    this.submitAnswer(session, answer);
    const evaluation = await this.evaluate(session);
    this.updateProgress(session);
    await this.decideNext(session);

    const result: TurnResult = { evaluation };

    if (session.nextAction === "provide_explanation") {
      result.explanation = await this.explain(session);
    }

    if (
      session.active &&
      (session.nextAction === "ask_question" || session.nextAction === "follow_up")
    ) {
      result.nextQuestion = await this.generateQuestion(session);
    }

    return result;
  }

  /**
   * Close the session on the driver's request and record it one last time.
   */
  end(session: TutoringSession): void {
    this.progress.update(session);
    session.active = false;
    session.phase = "ended";
  }

  private assertActive(session: TutoringSession): void {
    if (!session.active) {
      throw new SessionInactiveError(session.id);
    }
  }
}
