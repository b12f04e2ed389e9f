/**
 * Wiring for the drivers: builds the generator, workflow and stores from config.
 */

import { TutorConfig } from "../config";
import { OpenAITextGenerator } from "../domain/openaiTextGenerator";
import { TextGenerator } from "../domain/textGenerator";
import { LLMEvaluator } from "../domain/llmEvaluator";
import { ActionPolicy } from "../domain/actionPolicy";
import { TutoringWorkflow } from "../domain/tutoringWorkflow";
import { ProgressStore } from "../stores/progressStore";
import { SessionRegistry } from "./sessionRegistry";
import { TutoringService } from "./tutoringService";

export { SessionRegistry } from "./sessionRegistry";
export { TutoringService, readStudentProgress, toSessionState } from "./tutoringService";
export type {
  StartSessionInput,
  StartSessionResult,
  SubmitAnswerResult,
  SessionState,
  StudentProgressResult,
  EndSessionResult,
} from "./tutoringService";

export function createWorkflow(generator: TextGenerator, progressStore: ProgressStore): TutoringWorkflow {
  return new TutoringWorkflow(
    generator,
    new LLMEvaluator(generator),
    new ActionPolicy(generator),
    progressStore
  );
}

/**
 * Build a TutoringService, or null when no OpenAI API key is configured
 */
export function createTutoringService(
  config: TutorConfig,
  progressStore: ProgressStore
): TutoringService | null {
  if (!config.openaiApiKey) {
    return null;
  }

  const generator = new OpenAITextGenerator({
    apiKey: config.openaiApiKey,
    model: config.model,
    temperature: config.temperature,
    timeoutMs: config.requestTimeoutMs,
  });

  return new TutoringService(
    createWorkflow(generator, progressStore),
    progressStore,
    new SessionRegistry(config.maxActiveSessions)
  );
}
