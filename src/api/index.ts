import dotenv from "dotenv";
import { loadConfig } from "../config";
import { ProgressStore } from "../stores/progressStore";
import { createTutoringService } from "../services";
import { createApp } from "./app";

dotenv.config();

const config = loadConfig();
const progressStore = new ProgressStore(config.progressFile);
const tutoring = createTutoringService(config, progressStore);

if (!tutoring) {
  console.log("[api] No OPENAI_API_KEY found - tutoring routes will answer 503");
}

const app = createApp({ tutoring, progressStore });

// Start server
app.listen(config.apiPort, () => {
  console.log(`[api] Tutoring API running on http://localhost:${config.apiPort}`);
});

export default app;
