import express, { Express } from "express";
import cors from "cors";
import { TutoringService } from "../services/tutoringService";
import { ProgressStore } from "../stores/progressStore";
import { createSessionsRouter } from "./routes/sessions";
import { createProgressRouter } from "./routes/progress";

export interface AppDependencies {
  tutoring: TutoringService | null;
  progressStore: ProgressStore;
}

export function createApp({ tutoring, progressStore }: AppDependencies): Express {
  const app = express();

  // Middleware (no auth, any origin)
  app.use(cors());
  app.use(express.json());

  // Routes
  app.use("/api/session", createSessionsRouter(tutoring));
  app.use("/api/progress", createProgressRouter(progressStore, tutoring));

  // Health check
  app.get("/api/health", (req, res) => {
    res.json({
      status: "healthy",
      llmInitialized: tutoring !== null,
      progressTrackerInitialized: true,
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
