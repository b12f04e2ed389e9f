import readline from "readline";
import { GenerationError } from "../domain/errors";
import { UNDERSTANDING_LEVELS, UnderstandingLevel, isUnderstandingLevel } from "../domain/tutoring";

export const QUIT_WORDS = ["quit", "exit", "end"];

/**
 * Ask a free-text question and resolve with the trimmed reply
 */
export function askText(rl: readline.Interface, prompt: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(prompt, (answer: string) => resolve(answer.trim()));
  });
}

/**
 * Ask for an understanding level; anything unrecognized means beginner
 */
export async function askLevel(rl: readline.Interface): Promise<UnderstandingLevel> {
  const answer = (
    await askText(
      rl,
      `Your understanding level (${UNDERSTANDING_LEVELS.join("/")}, default: beginner): `
    )
  ).toLowerCase();
  return isUnderstandingLevel(answer) ? answer : "beginner";
}

export function isQuitCommand(answer: string): boolean {
  return QUIT_WORDS.includes(answer.trim().toLowerCase());
}

export function printDivider(char = "=", width = 60): void {
  console.log(char.repeat(width));
}

/**
 * Print a generation failure with what the operator can do about it
 */
export function printGenerationError(error: GenerationError): void {
  console.log(`\n❌ ${error.message}`);
  console.log(`💡 ${error.hint}`);
  console.log("\nTroubleshooting tips:");
  console.log("1. Verify your OpenAI API key is set: echo $OPENAI_API_KEY");
  console.log("2. Check your OpenAI account billing: https://platform.openai.com/account/billing");
  console.log("3. Ensure you have sufficient credits/quota in your account\n");
}
