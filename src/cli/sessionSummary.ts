import { TutoringSession } from "../domain/tutoring";
import { percentCorrect } from "../domain/progress";
import { printDivider } from "./helpers";

/**
 * Display the end-of-session numbers
 */
export function printSessionSummary(session: TutoringSession): void {
  const accuracy = percentCorrect(session.correctAnswers, session.questionsAsked);

  console.log("");
  printDivider();
  console.log("SESSION SUMMARY");
  printDivider();
  console.log(`Topic: ${session.topic}`);
  console.log(`Questions Asked: ${session.questionsAsked}`);
  console.log(`Correct Answers: ${session.correctAnswers}`);
  console.log(`Accuracy: ${accuracy.toFixed(1)}%`);
  console.log(`Final Understanding Level: ${session.understandingLevel}`);
  printDivider();
}
