import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { CommonOptions } from "../src/commands/context.js";
import type { Scalar } from "../src/types/run.js";
import { isFailure, type Failure } from "../src/commands/result.js";
import { EXIT } from "../src/commands/exit-codes.js";
import { status } from "../src/commands/status.js";
import { compare } from "../src/commands/compare.js";
import { history } from "../src/commands/history.js";
import { diagnose } from "../src/commands/diagnose.js";
import { exportRuns } from "../src/commands/export.js";
import { report } from "../src/commands/report.js";
import { postResult, resultComment } from "../src/commands/post-result.js";
import { abandon, accept, archive, cancel, decide, ideas, launch, propose, retry, sync } from "../src/commands/lifecycle.js";
import { reconcile } from "../src/commands/reconcile.js";
import { establish, releaseNotes, showBaselines } from "../src/commands/baseline.js";
import { rollback, undoRollback } from "../src/commands/rollback.js";
import { compareMetrics } from "../src/compare/comparator.js";
import { FakeHost, FakeTracker, FakeTrunk, NOW, NO_WAIT, PassingReviewer, makeRun } from "./fakes.js";

function expectOk<S extends { ok: true }>(res: S | Failure): S {
  if (isFailure(res)) throw new Error(`${res.code}: ${res.error}`);
  return res;
}

function expectFailure<S extends { ok: true }>(res: S | Failure): Failure {
  if (!isFailure(res)) throw new Error("expected the command to fail");
  return res;
}

let tmp: string;
let tracker: FakeTracker;
let trunk: FakeTrunk;
let host: FakeHost | null;

function o(): CommonOptions {
  return {
    cwd: tmp,
    deps: { tracker, trunk, host, reviewer: new PassingReviewer(), worktrees: null, retry: NO_WAIT, now: () => NOW },
  };
}

async function seedBaseline(config: Record<string, Scalar> = {}): Promise<void> {
  tracker.add(makeRun("base", { commit: "c0", summary: { loss: 0.35, accuracy: 0.9 }, config }));
  expectOk(await establish({ ...o(), runId: "base" }));
}

async function addBranch(name: string, summary: Record<string, number>, config: Record<string, Scalar> = {}): Promise<void> {
  tracker.add(makeRun(`r-${name}`, { branch: name, summary, config }));
  expectOk(await propose({ ...o(), branch: name }));
  expectOk(await accept({ ...o(), branch: name }));
  expectOk(await launch({ ...o(), branch: name, runId: `r-${name}` }));
}

/** a and b split the metrics; c is worse on both. */
async function seedBatch(): Promise<void> {
  await seedBaseline();
  await addBranch("a", { loss: 0.3, accuracy: 0.91 });
  await addBranch("b", { loss: 0.32, accuracy: 0.93 });
  await addBranch("c", { loss: 0.4, accuracy: 0.88 });
  expectOk(await sync(o()));
}

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), "labctl-cmd-"));
  tracker = new FakeTracker();
  trunk = new FakeTrunk();
  host = new FakeHost();
});

afterEach(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe("status", () => {
  it("exits NO_RUNS when nothing is known", async () => {
    const res = expectFailure(await status(o()));
    expect(res.code).toBe("NO_RUNS");
    expect(res.exitCode).toBe(EXIT.NO_RUNS);
  });

  it("lists tracked branches and the latest run of untracked ones", async () => {
    await seedBaseline();
    await addBranch("a", { loss: 0.3 });
    tracker.add(makeRun("r-z", { branch: "z", state: "running" }));

    const res = expectOk(await status(o()));
    expect(res.active_baseline).toBe("baseline-001");
    expect(res.rows).toEqual([
      {
        branch: "a",
        lifecycle: "finished",
        verdict: "unevaluated",
        batch: "batch-001",
        run_id: "r-a",
        run_state: "finished",
        win_count: null,
        retry_count: 0,
        hold: null,
      },
      {
        branch: "z",
        lifecycle: null,
        verdict: null,
        batch: null,
        run_id: "r-z",
        run_state: "running",
        win_count: null,
        retry_count: 0,
        hold: null,
      },
    ]);

    const one = expectOk(await status({ ...o(), branch: "z" }));
    expect(one.rows.map((r) => r.branch)).toEqual(["z"]);
  });
});

describe("compare", () => {
  it("reports deltas against the active baseline and win counts", async () => {
    await seedBaseline();
    await addBranch("a", { loss: 0.3, accuracy: 0.91 });
    await addBranch("b", { loss: 0.32, accuracy: 0.93 });

    const res = expectOk(await compare({ ...o(), branches: ["b", "a"] }));
    expect(res.baseline?.id).toBe("baseline-001");
    expect(res.ambiguous).toBe(false);
    expect(res.ranked_metrics).toEqual(["accuracy", "loss"]);
    expect(res.comparisons.map((c) => [c.branch, c.win_count])).toEqual([
      ["a", 1],
      ["b", 1],
    ]);
    expect(res.comparisons[0].deltas.map((d) => [d.metric, d.delta, d.improved])).toEqual([
      ["accuracy", 0.01, true],
      ["loss", -0.05, true],
    ]);
  });

  it("is ambiguous without a baseline", async () => {
    tracker.add(makeRun("r-a", { branch: "a", summary: { loss: 0.3 } }));
    const res = expectOk(await compare({ ...o(), branches: ["a"] }));
    expect(res.ambiguous).toBe(true);
    expect(res.ambiguous_reasons).toEqual(["no baseline to compare against"]);
  });

  it("is ambiguous when a metric is missing on one side", async () => {
    await seedBaseline();
    await addBranch("a", { loss: 0.3 });
    const res = expectOk(await compare({ ...o(), branches: ["a"], metrics: ["loss", "accuracy"] }));
    expect(res.ambiguous_reasons).toEqual(["a: accuracy missing in candidate"]);
  });

  it("exits NO_RUNS for unknown branches and baselines", async () => {
    expect(expectFailure(await compare({ ...o(), branches: ["nope"] })).exitCode).toBe(EXIT.NO_RUNS);
    expect(expectFailure(await compare({ ...o(), baseline: "missing-run" })).error).toBe(
      "Baseline run not found: missing-run",
    );
  });
});

describe("history", () => {
  beforeEach(() => {
    const steps = [0, 1, 2, 3, 4].map((step) => ({ step, values: { loss: 5 - step, accuracy: step + 1 } }));
    tracker.add(makeRun("r-h", { branch: "h" }), steps);
  });

  it("samples evenly spaced steps including both ends", async () => {
    const res = expectOk(await history({ ...o(), branch: "h", samples: 3 }));
    expect(res.run_id).toBe("r-h");
    expect(res.metrics).toEqual(["accuracy", "loss"]);
    expect(res.total_steps).toBe(5);
    expect(res.steps.map((s) => s.step)).toEqual([0, 2, 4]);
  });

  it("keeps only the requested metrics", async () => {
    const res = expectOk(await history({ ...o(), branch: "h", metrics: ["loss"] }));
    expect(res.metrics).toEqual(["loss"]);
    expect(res.steps[0]).toEqual({ step: 0, values: { loss: 5 } });
  });

  it("exits NO_RUNS for a branch without runs", async () => {
    expect(expectFailure(await history({ ...o(), branch: "nope" })).code).toBe("NO_RUNS");
  });
});

describe("diagnose", () => {
  it("collects log errors, config problems and history anomalies", async () => {
    tracker.add(makeRun("r-x", { branch: "x", state: "failed", config: { learning_rate: 0.01, mystery: 1 } }), [
      { step: 0, values: { loss: 1, accuracy: 0.5 } },
      { step: 1, values: { loss: 0.5 } },
      { step: 2, values: { loss: 20 } },
    ]);
    tracker.logs.set("r-x", ["epoch 1 loss 1.0", "RuntimeError: CUDA out of memory", "Killed"]);

    const res = expectOk(await diagnose({ ...o(), branch: "x" }));
    expect(res.failed).toBe(true);
    expect(res.log_errors).toEqual(["RuntimeError: CUDA out of memory", "Killed"]);
    expect(res.config_check).toEqual({ params: { learning_rate: 0.01, mystery: 1 }, unknown: ["mystery"], errors: [] });
    expect(res.anomalies).toEqual(["accuracy stopped reporting after step 0", "loss diverged: 20 at step 2, best 0.5"]);
    expect(res.retries_left).toBeNull();
  });
});

describe("export", () => {
  it("writes finished runs newest first", async () => {
    tracker
      .add(makeRun("r1", { name: "run one", branch: "a", summary: { loss: 0.5, acc: 0.9 }, created_at: "2026-03-01T00:00:00Z" }))
      .add(makeRun("r2", { name: 'b,"x"', summary: { loss: 0.4 }, created_at: "2026-03-02T00:00:00Z" }))
      .add(makeRun("r3", { state: "running", summary: { loss: 0.1 } }));

    const res = expectOk(await exportRuns({ ...o(), output: "out/results.csv" }));
    expect(res.rows).toBe(2);
    expect(res.columns).toEqual(["acc", "loss"]);
    expect(fs.readFileSync(path.join(tmp, "out", "results.csv"), "utf8")).toBe(
      'run_name,run_id,branch,acc,loss\r\n"b,""x""",r2,N/A,,0.4\r\nrun one,r1,a,0.9,0.5\r\n',
    );
  });

  it("keeps requested metric order and drops unreported ones", async () => {
    tracker.add(makeRun("r1", { summary: { loss: 0.5, acc: 0.9 } }));
    const res = expectOk(await exportRuns({ ...o(), metrics: ["loss", "f1", "acc"] }));
    expect(res.columns).toEqual(["loss", "acc"]);
    expect(res.output).toBe(path.join(tmp, "results.csv"));
  });

  it("exits NO_RUNS without finished runs", async () => {
    expect(expectFailure(await exportRuns(o())).exitCode).toBe(EXIT.NO_RUNS);
  });
});

describe("lifecycle commands", () => {
  it("opens an idea issue with a proposal", async () => {
    const res = expectOk(await propose({ ...o(), branch: "a", idea: "wider head", issue: true }));
    expect(res.branch.idea).toBe("wider head (#1)");
    expect(host?.calls).toEqual(["issue a"]);

    const listed = expectOk(await ideas(o()));
    expect(listed.ideas).toEqual([{ number: 1, title: "a", url: "https://example.test/issues/1", labels: ["idea"] }]);
  });

  it("needs a code host for ideas", async () => {
    host = null;
    expect(expectFailure(await ideas(o())).exitCode).toBe(EXIT.INVALID_ARGS);
  });

  it("rejects branch names git cannot use", async () => {
    const res = expectFailure(await propose({ ...o(), branch: "../x" }));
    expect(res.code).toBe("CONFIG_ERROR");
    expect(res.exitCode).toBe(EXIT.INVALID_ARGS);
    expect(res.error).toBe("Invalid branch name '../x': contains '..'");
  });

  it("rejects duplicate proposals and invalid transitions", async () => {
    expectOk(await propose({ ...o(), branch: "a" }));
    expect(expectFailure(await propose({ ...o(), branch: "a" })).code).toBe("STATE_ERROR");

    expectOk(await accept({ ...o(), branch: "a" }));
    const again = expectFailure(await accept({ ...o(), branch: "a" }));
    expect(again.code).toBe("INVALID_TRANSITION");
    expect(again.exitCode).toBe(EXIT.FAILED);
    expect(again.error).toBe("Invalid transition implementing -> implementing for branch 'a'");
  });

  it("refuses to launch a run the tracker does not know", async () => {
    expectOk(await propose({ ...o(), branch: "a" }));
    expectOk(await accept({ ...o(), branch: "a" }));
    const res = expectFailure(await launch({ ...o(), branch: "a", runId: "ghost" }));
    expect(res.code).toBe("NOT_FOUND");
    expect(res.exitCode).toBe(EXIT.INVALID_ARGS);
  });

  it("cancels the in-flight run with the branch", async () => {
    tracker.add(makeRun("r-a", { branch: "a", state: "running" }));
    expectOk(await propose({ ...o(), branch: "a" }));
    expectOk(await accept({ ...o(), branch: "a" }));
    expectOk(await launch({ ...o(), branch: "a", runId: "r-a" }));

    const res = expectOk(await cancel({ ...o(), branch: "a" }));
    expect(res.branch.state).toBe("cancelled");
    expect(tracker.cancelled).toEqual(["r-a"]);
  });

  it("retries a failed branch and abandons it later", async () => {
    tracker.add(makeRun("r-a", { branch: "a", state: "failed" })).add(makeRun("r-a2", { branch: "a", state: "crashed" }));
    expectOk(await propose({ ...o(), branch: "a" }));
    expectOk(await accept({ ...o(), branch: "a" }));
    expectOk(await launch({ ...o(), branch: "a", runId: "r-a" }));

    const retried = expectOk(await retry({ ...o(), branch: "a", diagnosis: "lower the learning rate" }));
    expect(retried.branch.state).toBe("implementing");
    expect(retried.branch.retry_count).toBe(1);

    const relaunched = expectOk(await launch({ ...o(), branch: "a", runId: "r-a2" }));
    expect(relaunched.branch.state).toBe("crashed");
    expect(relaunched.branch.superseded_runs).toEqual(["r-a"]);

    const abandoned = expectOk(await abandon({ ...o(), branch: "a" }));
    expect(abandoned.branch.state).toBe("loser");
    expect(abandoned.branch.transitions[abandoned.branch.transitions.length - 1].reason).toBe("abandoned: given up");
  });

  it("takes decisions for pending winners only", async () => {
    expectOk(await propose({ ...o(), branch: "a" }));
    const res = expectFailure(await decide({ ...o(), branch: "a", decision: "merge" }));
    expect(res.error).toBe("Decisions apply to pending winners; a is proposed");
  });
});

describe("reconcile and baselines", () => {
  it("waits with BATCH_NOT_READY while runs are in flight", async () => {
    await seedBaseline();
    tracker.add(makeRun("r-a", { branch: "a", state: "running" }));
    expectOk(await propose({ ...o(), branch: "a" }));
    expectOk(await accept({ ...o(), branch: "a" }));
    expectOk(await launch({ ...o(), branch: "a", runId: "r-a" }));

    const res = expectOk(await reconcile(o()));
    expect(res.exitCode).toBe(EXIT.BATCH_NOT_READY);
    expect(res.result).toEqual({ status: "waiting", batch: "batch-001", pending: ["a"] });
  });

  it("merges winners, reports the batch and archives it", async () => {
    await seedBatch();

    const res = expectOk(await reconcile(o()));
    expect(res.exitCode).toBe(EXIT.SUCCESS);
    expect(res.result.status).toBe("merged");

    const rep = expectOk(await report({ ...o(), batch: "batch-001" }));
    const lines = rep.rendered.split("\n");
    expect(lines[0]).toBe("# batch-001 (merged)");
    expect(lines).toContain("Baseline: baseline-001 (run base, commit c0)");
    expect(lines).toContain("| a | merged | winner | 1 | r-a |");
    expect(lines).toContain("| c | closed | loser | - | r-c |");
    expect(lines).toContain("| loss | 0.4 | 0.35 | +0.05 | no |");
    expect(lines).toContain("Merge order: a, b");

    const archived = expectOk(await archive(o()));
    expect(archived.archived).toEqual(["a", "b", "c"]);
  });

  it("writes a JSON report to a file", async () => {
    await seedBatch();
    const rep = expectOk(await report({ ...o(), format: "json", output: "reports/batch.json" }));
    expect(rep.output).toBe(path.join(tmp, "reports", "batch.json"));
    const written: unknown = JSON.parse(fs.readFileSync(path.join(tmp, "reports", "batch.json"), "utf8"));
    expect(written).toMatchObject({ batch: "batch-001", status: "open", generated_at: NOW.toISOString() });
  });

  it("persists a conflict halt and exits CONFLICT", async () => {
    await seedBaseline({ learning_rate: 0.001 });
    await addBranch("a", { loss: 0.3, accuracy: 0.91 }, { learning_rate: 0.01 });
    await addBranch("b", { loss: 0.32, accuracy: 0.93 }, { learning_rate: 0.02 });

    const res = expectFailure(await reconcile(o()));
    expect(res.code).toBe("CONFLICT");
    expect(res.exitCode).toBe(EXIT.CONFLICT);
    expect(res.detail).toEqual({
      batchId: "batch-001",
      operation: "reconcile",
      detail: { branches: ["a", "b"], parameters: ["learning_rate"] },
    });

    const rep = expectOk(await report(o()));
    expect(rep.report.status).toBe("halted");
    expect(rep.report.halt_reason).toBe("hyperparameter conflict: learning_rate (a=0.01, b=0.02)");
  });

  it("publishes a release for a clean baseline", async () => {
    tracker.add(makeRun("base", { commit: "c0", summary: { loss: 0.35, accuracy: 0.9 } }));
    const res = expectOk(await establish({ ...o(), runId: "base", release: true }));
    expect(res.release).toBe("labctl-baseline-001");
    expect(host?.calls).toEqual(["release labctl-baseline-001"]);
    expect(releaseNotes(res.baseline)).toBe("Baseline baseline-001 from run base at c0.\n\n- accuracy: 0.9\n- loss: 0.35\n");
  });

  it("exits REGRESSION on a worse baseline, then rolls back and undoes it", async () => {
    await seedBatch();
    expectOk(await reconcile(o()));
    tracker.add(makeRun("post", { commit: "merge-b", summary: { loss: 0.5, accuracy: 0.9 } }));

    const res = expectFailure(await establish({ ...o(), runId: "post", release: true }));
    expect(res.code).toBe("REGRESSION_DETECTED");
    expect(res.exitCode).toBe(EXIT.REGRESSION);
    expect(res.detail).toMatchObject({ report: { baseline_id: "baseline-002", recommended_action: "rollback" } });
    expect(host?.calls).toEqual([]);

    const shown = expectOk(await showBaselines(o()));
    expect(shown.active?.id).toBe("baseline-002");
    expect(shown.regressions).toHaveLength(1);

    const rep = expectOk(await report({ ...o(), batch: "batch-001" }));
    expect(rep.rendered.split("\n")).toContain("- loss: 0.35 -> 0.5 (+0.15)");

    const rolled = expectOk(await rollback(o()));
    expect(rolled.rollback.to_baseline_id).toBe("baseline-001");
    expect(rolled.rollback.revert_commits).toEqual(["revert-merge-b", "revert-merge-a"]);
    expect(expectOk(await showBaselines(o())).active?.id).toBe("baseline-001");

    const undone = expectOk(await undoRollback(o()));
    expect(undone.rollback.undone).toBe(true);
    expect(expectOk(await showBaselines(o())).active?.id).toBe("baseline-002");
  });
});

describe("post-result", () => {
  it("needs a review request or --create", async () => {
    await seedBatch();
    const res = expectFailure(await postResult({ ...o(), branch: "a" }));
    expect(res.exitCode).toBe(EXIT.INVALID_ARGS);
    expect(res.error).toBe("a has no review request; pass --create to open one");
  });

  it("opens a review request once, then comments on it", async () => {
    await seedBatch();
    expectOk(await reconcile(o()));

    const first = expectOk(await postResult({ ...o(), branch: "a", create: true }));
    expect(first).toEqual({ ok: true, branch: "a", review_request: "1", created: true, labels: ["labctl:winner"] });

    const second = expectOk(await postResult({ ...o(), branch: "a" }));
    expect(second.created).toBe(false);
    expect(host?.calls).toEqual(["create a -> main: 1", "label 1 labctl:winner", "comment 1", "label 1 labctl:winner"]);
  });

  it("needs a code host", async () => {
    host = null;
    expect(expectFailure(await postResult({ ...o(), branch: "a" })).code).toBe("INVALID_ARGS");
  });

  it("renders the result comment", () => {
    const run = makeRun("r-a", { summary: { loss: 0.3 } });
    const comparison = compareMetrics(run.summary, { loss: 0.35 });
    expect(resultComment("a", "winner", run, "baseline-001", comparison)).toBe(
      [
        "### labctl result: a",
        "",
        "Verdict: **winner**",
        "Run: r-a (r-a, finished)",
        "Baseline: baseline-001",
        "",
        "| Metric | Candidate | Baseline | Delta |",
        "|---|---|---|---|",
        "| loss | 0.3 | 0.35 | -0.05 (better) |",
        "",
      ].join("\n"),
    );
    expect(resultComment("a", "inconclusive", null, null, { deltas: [], excluded: [] })).toBe(
      "### labctl result: a\n\nVerdict: **inconclusive**\n\nNo baseline to compare against.\n",
    );
  });
});
