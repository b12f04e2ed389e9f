import { ActionPolicy, fallbackAction, matchAction } from "./actionPolicy";
import { TextGenerator } from "./textGenerator";
import { DecisionContext } from "./prompts";
import { RateLimitedError } from "./errors";

describe("matchAction", () => {
  it("recognizes each action token", () => {
    expect(matchAction("ask_question")).toBe("ask_question");
    expect(matchAction("provide_explanation")).toBe("provide_explanation");
    expect(matchAction("follow_up")).toBe("follow_up");
    expect(matchAction("end_session")).toBe("end_session");
  });

  it("ignores case and surrounding whitespace", () => {
    expect(matchAction("  END_SESSION\n")).toBe("end_session");
  });

  it("finds a token inside a longer reply", () => {
    expect(matchAction("I think we should follow_up on that.")).toBe("follow_up");
  });

  it("prefers the earlier token in the fixed list over reply order", () => {
    expect(matchAction("end_session, or maybe ask_question")).toBe("ask_question");
    expect(matchAction("follow_up then provide_explanation")).toBe("provide_explanation");
  });

  it("returns null when nothing matches", () => {
    expect(matchAction("Let's explain more")).toBeNull();
    expect(matchAction("ask question")).toBeNull();
  });
});

describe("fallbackAction", () => {
  it("ends the session at 80% accuracy over at least three questions", () => {
    expect(fallbackAction(3, 3, true)).toBe("end_session");
    expect(fallbackAction(5, 4, false)).toBe("end_session");
  });

  it("explains after a wrong answer when not mastered", () => {
    expect(fallbackAction(2, 0, false)).toBe("provide_explanation");
    expect(fallbackAction(3, 2, false)).toBe("provide_explanation");
  });

  it("keeps asking otherwise", () => {
    expect(fallbackAction(1, 1, true)).toBe("ask_question");
    expect(fallbackAction(2, 2, true)).toBe("ask_question");
  });

  it("treats no questions as zero accuracy", () => {
    expect(fallbackAction(0, 0, true)).toBe("ask_question");
    expect(fallbackAction(0, 0, false)).toBe("provide_explanation");
  });

  it("is deterministic", () => {
    expect(fallbackAction(4, 2, true)).toBe(fallbackAction(4, 2, true));
  });
});

describe("ActionPolicy", () => {
  let mockGenerate: jest.Mock<Promise<string>, [string]>;
  let policy: ActionPolicy;

  const context = (overrides: Partial<DecisionContext> = {}): DecisionContext => ({
    topic: "Recursion",
    questionsAsked: 1,
    correctAnswers: 1,
    lastAnswerCorrect: true,
    understandingLevel: "beginner",
    ...overrides,
  });

  beforeEach(() => {
    mockGenerate = jest.fn<Promise<string>, [string]>();
    const generator: TextGenerator = { generate: mockGenerate };
    policy = new ActionPolicy(generator);
  });

  it("summarizes the counters in the prompt", async () => {
    mockGenerate.mockResolvedValue("ask_question");

    await policy.decide(context({ questionsAsked: 4, correctAnswers: 3, lastAnswerCorrect: false }));

    const prompt = mockGenerate.mock.calls[0][0];
    expect(prompt).toContain("Questions asked: 4");
    expect(prompt).toContain("Correct answers: 3");
    expect(prompt).toContain("Accuracy: 75.0%");
    expect(prompt).toContain("Last answer was correct: false");
    expect(prompt).toContain("Understanding level: beginner");
  });

  it("uses the action named by the model", async () => {
    mockGenerate.mockResolvedValue("Follow_Up");

    expect(await policy.decide(context())).toBe("follow_up");
  });

  it("falls back when the reply names no action", async () => {
    mockGenerate.mockResolvedValue("Hmm, hard to say.");

    expect(await policy.decide(context({ questionsAsked: 3, correctAnswers: 3 }))).toBe("end_session");
    expect(
      await policy.decide(context({ questionsAsked: 2, correctAnswers: 0, lastAnswerCorrect: false }))
    ).toBe("provide_explanation");
    expect(await policy.decide(context({ questionsAsked: 1, correctAnswers: 1 }))).toBe("ask_question");
  });

  it("propagates generation failures instead of falling back", async () => {
    mockGenerate.mockRejectedValue(new RateLimitedError("429 Too many requests"));

    await expect(policy.decide(context())).rejects.toBeInstanceOf(RateLimitedError);
  });
});
