import { UnderstandingLevel } from "./tutoring";

/**
 * Prompt texts for every call the tutor makes to the model.
 */

export function buildQuestionPrompt(
  topic: string,
  level: UnderstandingLevel,
  askedBefore: string[]
): string {
  // Only the most recent few are shown to keep the prompt short
  const previousContext =
    askedBefore.length > 0
      ? `\nPrevious questions asked: ${askedBefore.slice(-3).join(", ")}`
      : "";

  return `You are an expert tutor helping a student learn about ${topic}.
The student's current understanding level is: ${level}.

Generate a single, clear question that:
1. Is appropriate for the ${level} level
2. Tests understanding of key concepts in ${topic}
3. Is different from previous questions${previousContext}
4. Can be answered in 1-3 sentences

Format your response as just the question, nothing else.`;
}

export function buildEvaluationPrompt(
  question: string,
  topic: string,
  studentAnswer: string
): string {
  return `You are a tutor evaluating a student's answer.

Topic: ${topic}
Question: ${question}
Expected answer (key concepts): Key concepts related to ${topic}
Student's answer: ${studentAnswer}

Evaluate the student's answer and provide:
1. A score from 0.0 to 1.0 (where 1.0 is fully correct)
2. Brief feedback (1-2 sentences) explaining what was correct or incorrect
3. Whether the answer demonstrates understanding (correct: true/false)

Respond in JSON format:
{
    "score": 0.0-1.0,
    "correct": true/false,
    "feedback": "your feedback here"
}`;
}

export function buildExplanationPrompt(
  topic: string,
  level: UnderstandingLevel,
  question: string,
  studentAnswer: string
): string {
  return `You are a tutor explaining a concept to a student.

Topic: ${topic}
Student's understanding level: ${level}
Question asked: ${question}
Student's answer: ${studentAnswer}

Provide a clear, engaging explanation that:
1. Addresses the question directly
2. Uses examples and analogies appropriate for ${level} level
3. Builds on what the student already knows
4. Is 2-4 sentences long

Format your response as just the explanation, nothing else.`;
}

export interface DecisionContext {
  topic: string;
  questionsAsked: number;
  correctAnswers: number;
  lastAnswerCorrect: boolean;
  understandingLevel: UnderstandingLevel;
}

export function buildDecisionPrompt(context: DecisionContext): string {
  const accuracy =
    context.questionsAsked > 0 ? (context.correctAnswers / context.questionsAsked) * 100 : 0;

  return `As a tutor, decide the next action for this student:

Topic: ${context.topic}
Questions asked: ${context.questionsAsked}
Correct answers: ${context.correctAnswers}
Accuracy: ${accuracy.toFixed(1)}%
Last answer was correct: ${context.lastAnswerCorrect}
Understanding level: ${context.understandingLevel}

Decide the next action:
- "ask_question": Ask another question to continue learning
- "provide_explanation": Provide explanation if student struggled
- "follow_up": Ask a follow-up question on the same concept
- "end_session": End the session if student has mastered the topic

Respond with ONLY one of: ask_question, provide_explanation, follow_up, end_session`;
}
