import { Router } from "express";
import { TutoringService } from "../../services/tutoringService";
import { sendError } from "../errors";

/**
 * Session routes. `tutoring` is null when no OpenAI key is configured,
 * in which case every route answers 503.
 */
export function createSessionsRouter(tutoring: TutoringService | null): Router {
  const router = Router();

  if (!tutoring) {
    router.use((req, res) => {
      res.status(503).json({ error: "LLM not initialized. Check OPENAI_API_KEY." });
    });
    return router;
  }
  const service: TutoringService = tutoring;

  // POST /api/session/start - Start a session and get the first question
  router.post("/start", async (req, res) => {
    try {
      const { studentId, topic, understandingLevel } = req.body ?? {};

      if (typeof studentId !== "string" || typeof topic !== "string") {
        return res.status(400).json({ error: "studentId and topic are required" });
      }
      if (understandingLevel !== undefined && typeof understandingLevel !== "string") {
        return res.status(400).json({ error: "understandingLevel must be a string" });
      }

      const result = await service.startSession({ studentId, topic, understandingLevel });
      res.status(201).json(result);
    } catch (error) {
      sendError(res, error, "Error starting session");
    }
  });

  // POST /api/session/answer - Submit an answer for the current question
  router.post("/answer", async (req, res) => {
    try {
      const { sessionId, answer } = req.body ?? {};

      if (typeof sessionId !== "string" || typeof answer !== "string") {
        return res.status(400).json({ error: "sessionId and answer are required" });
      }

      const result = await service.submitAnswer(sessionId, answer);
      res.json(result);
    } catch (error) {
      sendError(res, error, "Error processing answer");
    }
  });

  // GET /api/session/:sessionId/progress - Counters for one session
  router.get("/:sessionId/progress", (req, res) => {
    try {
      res.json({
        sessionId: req.params.sessionId,
        ...service.getSessionProgress(req.params.sessionId),
      });
    } catch (error) {
      sendError(res, error, "Error reading session progress");
    }
  });

  // POST /api/session/:sessionId/end - End a session and record it
  router.post("/:sessionId/end", (req, res) => {
    try {
      res.json({ message: "Session ended", ...service.endSession(req.params.sessionId) });
    } catch (error) {
      sendError(res, error, "Error ending session");
    }
  });

  return router;
}
