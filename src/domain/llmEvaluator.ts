import { AnswerEvaluator } from "./evaluator";
import { Evaluation, parseEvaluationReply } from "./evaluation";
import { TextGenerator } from "./textGenerator";
import { buildEvaluationPrompt } from "./prompts";

/**
 * LLMEvaluator asks the model to grade an answer as JSON
 * ({ score, correct, feedback }) and falls back to a neutral
 * evaluation when the reply can't be parsed.
 */
export class LLMEvaluator implements AnswerEvaluator {
  constructor(private generator: TextGenerator) {}

  async evaluate(question: string, topic: string, studentAnswer: string): Promise<Evaluation> {
    const reply = await this.generator.generate(
      buildEvaluationPrompt(question, topic, studentAnswer)
    );
    return parseEvaluationReply(reply);
  }
}
