import { describe, expect, it } from "vitest";
import { compareMetrics } from "../src/compare/comparator.js";
import { rankBatch, renderVerdict } from "../src/verdict/verdict-engine.js";

const BASELINE = { loss: 0.35, accuracy: 0.9 };

describe("renderVerdict", () => {
  it("keeps an improved finished run in the running for batch ranking", () => {
    const comparison = compareMetrics({ loss: 0.3, accuracy: 0.91 }, BASELINE);
    expect(renderVerdict({ runState: "finished", comparison })).toEqual({
      route: "verdict",
      verdict: "inconclusive",
      earlyDiscard: false,
      reason: "improved on accuracy, loss; awaiting batch ranking",
    });
  });

  it("discards a run that is worse on every primary metric", () => {
    const comparison = compareMetrics({ loss: 0.4, accuracy: 0.88 }, BASELINE);
    expect(renderVerdict({ runState: "finished", comparison })).toEqual({
      route: "verdict",
      verdict: "loser",
      earlyDiscard: true,
      reason: "early discard: no improvement on accuracy, loss",
    });
  });

  it("only looks at primary metrics", () => {
    const comparison = compareMetrics({ loss: 0.3, accuracy: 0.5 }, BASELINE);
    const outcome = renderVerdict({ runState: "finished", comparison, primary: ["loss"] });
    expect(outcome).toMatchObject({ verdict: "inconclusive", reason: "improved on loss; awaiting batch ranking" });
  });

  it("sends failed and crashed runs down the fix path", () => {
    expect(renderVerdict({ runState: "failed", comparison: null })).toEqual({ route: "fix", reason: "run failed" });
    expect(renderVerdict({ runState: "crashed", comparison: null })).toEqual({ route: "fix", reason: "run crashed" });
  });

  it("makes cancelled runs losers without early discard", () => {
    expect(renderVerdict({ runState: "cancelled", comparison: null })).toEqual({
      route: "verdict",
      verdict: "loser",
      earlyDiscard: false,
      reason: "run cancelled",
    });
  });

  it("is inconclusive while a run is in flight", () => {
    expect(renderVerdict({ runState: "running", comparison: null })).toMatchObject({ verdict: "inconclusive" });
    expect(renderVerdict({ runState: "queued", comparison: null })).toMatchObject({ verdict: "inconclusive" });
  });

  it("is ambiguous when nothing is comparable", () => {
    const comparison = compareMetrics({ f1: 0.5 }, BASELINE);
    expect(renderVerdict({ runState: "finished", comparison })).toEqual({
      route: "verdict",
      verdict: "inconclusive",
      earlyDiscard: false,
      reason: "ambiguous: no primary metric comparable with the baseline",
    });
  });
});

describe("rankBatch", () => {
  it("ranks by win count and keeps every branch tied at the top", () => {
    const ranking = rankBatch([
      { name: "z", metrics: { loss: 0.31, accuracy: 0.89 } },
      { name: "y", metrics: { loss: 0.32, accuracy: 0.93 } },
      { name: "x", metrics: { loss: 0.3, accuracy: 0.91 } },
    ]);
    expect(ranking).toEqual({
      metrics: ["accuracy", "loss"],
      winCounts: { x: 1, y: 1, z: 0 },
      topCount: 1,
      winners: ["x", "y"],
      losers: ["z"],
    });
  });

  it("makes a lone survivor the winner", () => {
    const ranking = rankBatch([{ name: "solo", metrics: { loss: 0.3 } }]);
    expect(ranking.winners).toEqual(["solo"]);
    expect(ranking.losers).toEqual([]);
  });

  it("restricts ranking to primary metrics", () => {
    const ranking = rankBatch(
      [
        { name: "a", metrics: { loss: 0.3, accuracy: 0.8 } },
        { name: "b", metrics: { loss: 0.4, accuracy: 0.9 } },
      ],
      { primary: ["loss"] },
    );
    expect(ranking.metrics).toEqual(["loss"]);
    expect(ranking.winners).toEqual(["a"]);
    expect(ranking.losers).toEqual(["b"]);
  });

  it("is empty for no survivors", () => {
    expect(rankBatch([])).toEqual({ metrics: [], winCounts: {}, topCount: 0, winners: [], losers: [] });
  });
});
