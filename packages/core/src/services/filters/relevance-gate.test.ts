import { describe, expect, it, vi } from "vitest";
import { RelevanceGate, type RelevanceJudge } from "./relevance-gate";

function judgeReturning(response: string) {
  const generateRelevanceJudgment = vi.fn(async () => response);
  const judge: RelevanceJudge = { generateRelevanceJudgment };
  return { judge, generateRelevanceJudgment };
}

describe("RelevanceGate", () => {
  it("accepts a YES answer", async () => {
    const { judge } = judgeReturning("YES");
    const gate = new RelevanceGate(judge);
    await expect(gate.isRelevant("AI", "Paper", "Some abstract")).resolves.toBe(true);
  });

  it("finds yes anywhere, case-insensitively", async () => {
    const { judge } = judgeReturning("I would say yes.");
    const gate = new RelevanceGate(judge);
    await expect(gate.isRelevant("AI", "Paper", "Some abstract")).resolves.toBe(true);
  });

  it("rejects a NO answer", async () => {
    const { judge } = judgeReturning("NO");
    const gate = new RelevanceGate(judge);
    await expect(gate.isRelevant("AI", "Paper", "Some abstract")).resolves.toBe(false);
  });

  it("rejects an empty answer", async () => {
    const { judge } = judgeReturning("");
    const gate = new RelevanceGate(judge);
    await expect(gate.isRelevant("AI", "Paper", "Some abstract")).resolves.toBe(false);
  });

  it("never calls the judge for an empty abstract", async () => {
    const { judge, generateRelevanceJudgment } = judgeReturning("YES");
    const gate = new RelevanceGate(judge);

    await expect(gate.isRelevant("AI", "Paper", "")).resolves.toBe(false);
    await expect(gate.isRelevant("AI", "Paper")).resolves.toBe(false);
    expect(generateRelevanceJudgment).toHaveBeenCalledTimes(0);
  });

  it("passes subject, title and abstract to the judge", async () => {
    const { judge, generateRelevanceJudgment } = judgeReturning("YES");
    const gate = new RelevanceGate(judge);

    await gate.isRelevant("Soil carbon", "Paper title", "Paper abstract");
    expect(generateRelevanceJudgment).toHaveBeenCalledWith(
      "Soil carbon",
      "Paper title",
      "Paper abstract"
    );
  });

  it("treats a judge failure as not relevant", async () => {
    const judge: RelevanceJudge = {
      generateRelevanceJudgment: vi.fn(async () => {
        throw new Error("upstream unavailable");
      }),
    };
    const gate = new RelevanceGate(judge);
    await expect(gate.isRelevant("AI", "Paper", "Some abstract")).resolves.toBe(false);
  });
});
