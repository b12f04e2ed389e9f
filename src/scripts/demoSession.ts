/**
 * Run a short scripted tutoring session with canned answers.
 * Useful for checking the model wiring without typing anything.
 *
 * Usage: npm run demo
 */

import "dotenv/config";
import path from "path";
import { loadConfig } from "../config";
import { OpenAITextGenerator } from "../domain/openaiTextGenerator";
import { GenerationError } from "../domain/errors";
import { ProgressStore } from "../stores/progressStore";
import { createWorkflow } from "../services";
import { printSessionSummary } from "../cli/sessionSummary";

const DEMO_STUDENT = "example_student";
const DEMO_TOPIC = "Machine Learning";
const DEMO_PROGRESS_FILE = path.join(__dirname, "../../data/example-progress.json");

const DEMO_ANSWERS = [
  "Machine learning is a subset of AI that lets computers learn patterns from data instead of following explicit rules.",
  "Supervised learning uses labeled examples, unsupervised learning looks for structure in unlabeled data.",
  "A neural network is a stack of layers of simple units whose weights are adjusted during training.",
];

async function runDemo(): Promise<void> {
  const config = loadConfig();
  if (!config.openaiApiKey) {
    console.log("Set OPENAI_API_KEY in .env to run the demo.");
    return;
  }

  const progressStore = new ProgressStore(DEMO_PROGRESS_FILE);
  const workflow = createWorkflow(
    new OpenAITextGenerator({
      apiKey: config.openaiApiKey,
      model: config.model,
      temperature: config.temperature,
      timeoutMs: config.requestTimeoutMs,
    }),
    progressStore
  );

  const session = workflow.createSession(DEMO_STUDENT, DEMO_TOPIC, "beginner");
  workflow.initialize(session);

  console.log(`❓ ${await workflow.generateQuestion(session)}`);

  for (const answer of DEMO_ANSWERS) {
    if (!session.active) break;

    console.log(`\n📝 Simulated Student Answer: ${answer}`);
    const turn = await workflow.runTurn(session, answer);
    console.log(`💬 ${turn.evaluation.feedback}`);
    if (turn.explanation) console.log(`💡 ${turn.explanation}`);
    if (turn.nextQuestion) console.log(`\n❓ ${turn.nextQuestion}`);
  }

  workflow.end(session);
  printSessionSummary(session);
  console.log(progressStore.summarize(DEMO_STUDENT));
}

runDemo().catch((error) => {
  if (error instanceof GenerationError) {
    console.error(`\n❌ ${error.message}\n💡 ${error.hint}`);
  } else {
    console.error("\n❌ Error:", error);
  }
  process.exitCode = 1;
});
