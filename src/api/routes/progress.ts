import { Router } from "express";
import { ProgressStore } from "../../stores/progressStore";
import { TutoringService, readStudentProgress } from "../../services/tutoringService";
import { sendError } from "../errors";

/**
 * Progress routes. They go through the tutoring service when one is
 * configured and read the store directly otherwise.
 */
export function createProgressRouter(
  progressStore: ProgressStore,
  tutoring: TutoringService | null
): Router {
  const router = Router();

  // GET /api/progress/:studentId - Overall progress for a student
  router.get("/:studentId", (req, res) => {
    try {
      const { studentId } = req.params;
      res.json(
        tutoring
          ? tutoring.getStudentProgress(studentId)
          : readStudentProgress(progressStore, studentId)
      );
    } catch (error) {
      sendError(res, error, "Error getting progress");
    }
  });

  return router;
}
