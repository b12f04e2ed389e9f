import "dotenv/config";
import readline from "readline";
import { loadConfig } from "../config";
import { OpenAITextGenerator } from "../domain/openaiTextGenerator";
import { GenerationError } from "../domain/errors";
import { TutoringSession } from "../domain/tutoring";
import { TutoringWorkflow } from "../domain/tutoringWorkflow";
import { NO_SESSIONS_MESSAGE } from "../domain/progress";
import { ProgressStore } from "../stores/progressStore";
import { createWorkflow } from "../services";
import {
  askLevel,
  askText,
  isQuitCommand,
  printDivider,
  printGenerationError,
} from "./helpers";
import { printSessionSummary } from "./sessionSummary";

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout
});

/**
 * Ask questions and grade answers until the policy ends the session or the
 * student quits. A failed model call ends the turn, not the program.
 */
async function runSession(workflow: TutoringWorkflow, session: TutoringSession): Promise<void> {
  let needQuestion = true;

  while (session.active) {
    try {
      if (needQuestion) {
        console.log("\n🤔 Generating question...");
        const question = await workflow.generateQuestion(session);
        console.log(`❓ Question: ${question}`);
        needQuestion = false;
      }

      console.log("");
      printDivider("-");
      const answer = await askText(rl, "Your answer (or 'quit' to end): ");

      if (!answer) {
        console.log("Please provide an answer!");
        continue;
      }
      if (isQuitCommand(answer)) {
        break;
      }

      console.log("\n📝 Evaluating answer...");
      const turn = await workflow.runTurn(session, answer);

      const { evaluation } = turn;
      const mark = evaluation.correct ? "✅ Correct!" : "❌ Incorrect.";
      console.log(`${mark} Score: ${evaluation.score.toFixed(2)}`);
      console.log(`💬 Feedback: ${evaluation.feedback}`);

      if (turn.explanation) {
        console.log(`\n💡 ${turn.explanation}`);
      }

      if (turn.nextQuestion) {
        console.log(`\n❓ Question: ${turn.nextQuestion}`);
      } else if (session.active) {
        // Explained without asking for a new question; move on anyway
        needQuestion = true;
      } else {
        console.log("\n🎉 Session complete! Great job!");
      }
    } catch (error) {
      if (!(error instanceof GenerationError)) {
        throw error;
      }
      printGenerationError(error);
      // Once the answer has been graded, retrying means a fresh question
      needQuestion =
        needQuestion || session.phase === "deciding" || session.phase === "explaining";
    }
  }
}

async function main(): Promise<void> {
  printDivider();
  console.log("🤖 AI TUTORING ASSISTANT");
  printDivider();
  console.log("An interactive AI-powered tutoring session\n");

  const config = loadConfig();
  if (!config.openaiApiKey) {
    console.log("No OPENAI_API_KEY found. Set it in .env to start tutoring.");
    return;
  }

  const progressStore = new ProgressStore(config.progressFile);
  const generator = new OpenAITextGenerator({
    apiKey: config.openaiApiKey,
    model: config.model,
    temperature: config.temperature,
    timeoutMs: config.requestTimeoutMs,
  });
  const workflow = createWorkflow(generator, progressStore);

  const studentId =
    (await askText(rl, "Enter your student ID (or press Enter for 'student_001'): ")) ||
    "student_001";
  const topic = await askText(rl, "What topic would you like to learn about? ");
  if (!topic) {
    console.log("❌ Topic is required!");
    return;
  }
  const level = await askLevel(rl);

  const summary = progressStore.summarize(studentId);
  if (summary !== NO_SESSIONS_MESSAGE) {
    console.log(summary);
  }

  const session = workflow.createSession(studentId, topic, level);
  workflow.initialize(session);

  console.log(`\n📚 Starting tutoring session for student: ${studentId}`);
  console.log(`📖 Topic: ${topic}`);
  console.log(`🎯 Understanding Level: ${session.understandingLevel}`);

  await runSession(workflow, session);

  workflow.end(session);
  printSessionSummary(session);
}

main()
  .catch((error) => {
    console.error("\n❌ Error:", error);
    process.exitCode = 1;
  })
  .finally(() => rl.close());
