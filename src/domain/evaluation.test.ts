import { FALLBACK_SCORE, parseEvaluationReply } from "./evaluation";

describe("parseEvaluationReply", () => {
  describe("JSON replies", () => {
    it("reads score, correct and feedback from a bare JSON object", () => {
      const result = parseEvaluationReply(
        '{"score": 0.9, "correct": true, "feedback": "Nice use of the base case."}'
      );

      expect(result).toEqual({
        score: 0.9,
        correct: true,
        feedback: "Nice use of the base case.",
      });
    });

    it("finds the object inside surrounding prose and code fences", () => {
      const reply = [
        "Here is my evaluation:",
        "```json",
        '{"score": 0.3, "correct": false, "feedback": "The loop never terminates."}',
        "```",
      ].join("\n");

      expect(parseEvaluationReply(reply)).toEqual({
        score: 0.3,
        correct: false,
        feedback: "The loop never terminates.",
      });
    });

    it("uses only the first brace-delimited span", () => {
      const reply =
        '{"score": 0.4, "correct": false, "feedback": "first"} {"score": 1, "correct": true, "feedback": "second"}';

      expect(parseEvaluationReply(reply).feedback).toBe("first");
    });

    it("coerces a numeric string score", () => {
      expect(parseEvaluationReply('{"score": "0.75", "correct": true, "feedback": "ok"}').score).toBe(0.75);
    });

    it("defaults a missing or invalid score to 0.5", () => {
      expect(parseEvaluationReply('{"correct": true, "feedback": "ok"}').score).toBe(FALLBACK_SCORE);
      expect(parseEvaluationReply('{"score": "high", "correct": true, "feedback": "ok"}').score).toBe(
        FALLBACK_SCORE
      );
    });

    it("defaults a missing correct flag to false", () => {
      expect(parseEvaluationReply('{"score": 0.8, "feedback": "Right idea"}').correct).toBe(false);
    });

    it("treats a non-empty string correct flag as true", () => {
      expect(parseEvaluationReply('{"score": 0.8, "correct": "yes", "feedback": "ok"}').correct).toBe(true);
    });

    it("uses the raw reply as feedback when the object has none", () => {
      const reply = 'Result: {"score": 1, "correct": true}';

      expect(parseEvaluationReply(reply)).toEqual({ score: 1, correct: true, feedback: reply });
    });
  });

  describe("fallback", () => {
    it("marks a reply saying correct as correct with a neutral score", () => {
      expect(parseEvaluationReply("That's correct!")).toEqual({
        score: 0.5,
        correct: true,
        feedback: "That's correct!",
      });
    });

    it("marks a reply without either keyword as incorrect", () => {
      expect(parseEvaluationReply("Not quite, think about the base case.")).toEqual({
        score: 0.5,
        correct: false,
        feedback: "Not quite, think about the base case.",
      });
    });

    it("counts 'incorrect' as correct because it contains the substring", () => {
      expect(parseEvaluationReply("That answer is incorrect.").correct).toBe(true);
    });

    it("matches 'right' regardless of case", () => {
      expect(parseEvaluationReply("RIGHT on target").correct).toBe(true);
    });

    it("falls back when the braces do not hold valid JSON", () => {
      const reply = "{score: 0.9} Good try.";

      expect(parseEvaluationReply(reply)).toEqual({ score: 0.5, correct: false, feedback: reply });
    });

    it("reads the innermost object when braces are nested", () => {
      const reply = '{"result": {"score": 0.9}';

      expect(parseEvaluationReply(reply)).toEqual({ score: 0.9, correct: false, feedback: reply });
    });
  });
});
