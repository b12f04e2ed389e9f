import { TextGenerator } from "./textGenerator";
import { DecisionContext, buildDecisionPrompt } from "./prompts";
import { TUTOR_ACTIONS, TutorAction, hasMastered } from "./tutoring";

/**
 * Pick the first recognized action mentioned in a model reply.
 *
 * Tokens are tried in TUTOR_ACTIONS order, not in the order they appear in
 * the reply, so "follow_up or ask_question" yields ask_question.
 */
export function matchAction(reply: string): TutorAction | null {
  const normalized = reply.trim().toLowerCase();
  return TUTOR_ACTIONS.find(action => normalized.includes(action)) ?? null;
}

/**
 * Deterministic choice used when the model names no recognized action.
 */
export function fallbackAction(
  questionsAsked: number,
  correctAnswers: number,
  lastAnswerCorrect: boolean
): TutorAction {
  if (hasMastered(correctAnswers, questionsAsked)) {
    return "end_session";
  }
  if (!lastAnswerCorrect) {
    return "provide_explanation";
  }
  return "ask_question";
}

/**
 * ActionPolicy asks the model what the session should do next.
 * Generation failures propagate to the caller untouched.
 */
export class ActionPolicy {
  constructor(private generator: TextGenerator) {}

  async decide(context: DecisionContext): Promise<TutorAction> {
    const reply = await this.generator.generate(buildDecisionPrompt(context));

    return (
      matchAction(reply) ??
      fallbackAction(context.questionsAsked, context.correctAnswers, context.lastAnswerCorrect)
    );
  }
}
