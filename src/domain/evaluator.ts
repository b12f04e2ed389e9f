import { Evaluation } from "./evaluation";

export interface AnswerEvaluator {
  /**
   * Grade one free-text answer to a question on a topic.
   * Rejects only when the underlying generation call fails.
   */
  evaluate(question: string, topic: string, studentAnswer: string): Promise<Evaluation>;
}
