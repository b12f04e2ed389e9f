export * from "./domain/tutoring";
export * from "./domain/errors";
export type { Evaluation } from "./domain/evaluation";
export { parseEvaluationReply } from "./domain/evaluation";
export type { TextGenerator } from "./domain/textGenerator";
export type { AnswerEvaluator } from "./domain/evaluator";
export { OpenAITextGenerator, toGenerationError } from "./domain/openaiTextGenerator";
export { LLMEvaluator } from "./domain/llmEvaluator";
export { ActionPolicy, fallbackAction, matchAction } from "./domain/actionPolicy";
export { TutoringWorkflow } from "./domain/tutoringWorkflow";
export type { ProgressTracker, TurnResult } from "./domain/tutoringWorkflow";
export type { ProgressRecord, SessionSummary } from "./domain/progress";
export { formatProgressSummary } from "./domain/progress";
export { ProgressStore } from "./stores/progressStore";
export * from "./services";
export { loadConfig } from "./config";
export type { TutorConfig } from "./config";
export { createApp } from "./api/app";
