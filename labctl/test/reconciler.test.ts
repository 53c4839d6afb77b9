import { describe, expect, it } from "vitest";
import type { ReviewHost } from "../src/hosting/review-host.js";
import type { Reviewer } from "../src/reconcile/reviewer.js";
import type { ConflictResolver } from "../src/reconcile/resolver.js";
import type { Run, RunState, Scalar } from "../src/types/run.js";
import type { LabState } from "../src/types/state.js";
import { BaselineReconciler } from "../src/reconcile/reconciler.js";
import { mergeOrder } from "../src/reconcile/merge-plan.js";
import { findParameterConflicts } from "../src/reconcile/param-conflicts.js";
import { BranchTracker } from "../src/lifecycle/branch-tracker.js";
import { RunRegistry } from "../src/registry/run-registry.js";
import { AuthError, ConflictError, ServiceError, StateError, TrunkValidationError } from "../src/core/errors.js";
import { emptyState } from "../src/store/state-store.js";
import {
  FakeHost,
  FakeResolver,
  FakeReviewer,
  FakeTracker,
  FakeTrunk,
  NOW,
  NO_WAIT,
  PassingReviewer,
  makeRun,
} from "./fakes.js";

type Lab = {
  state: LabState;
  tracker: FakeTracker;
  trunk: FakeTrunk;
  branches: BranchTracker;
  reconciler: BaselineReconciler;
};

async function lab(
  opts: {
    reviewer?: Reviewer;
    resolver?: ConflictResolver;
    host?: ReviewHost;
    baseConfig?: Record<string, Scalar>;
    tracker?: FakeTracker;
    trunk?: FakeTrunk;
  } = {},
): Promise<Lab> {
  const state = emptyState("lab", NOW.toISOString());
  const tracker = opts.tracker ?? new FakeTracker();
  const trunk = opts.trunk ?? new FakeTrunk();
  const branches = new BranchTracker(state, { maxRetries: 3, now: () => NOW });
  const reconciler = new BaselineReconciler({
    state,
    branches,
    registry: new RunRegistry(tracker, NO_WAIT),
    reviewer: opts.reviewer ?? new PassingReviewer(),
    metrics: { primary: [], directions: {} },
    trunk,
    resolver: opts.resolver,
    host: opts.host,
    now: () => NOW,
  });

  tracker.add(
    makeRun("base", { commit: "c0", summary: { loss: 0.35, accuracy: 0.9 }, config: opts.baseConfig ?? {} }),
  );
  await reconciler.establishBaseline("base");
  return { state, tracker, trunk, branches, reconciler };
}

/** Propose, accept and launch `name` with a finished run. */
function branch(l: Lab, name: string, summary: Record<string, number>, config: Record<string, Scalar> = {}): void {
  const runId = `r-${name}`;
  l.tracker.add(makeRun(runId, { branch: name, summary, config }));
  l.branches.propose(name);
  l.branches.accept(name);
  l.branches.launch(name, runId);
}

function setRunState(l: Lab, runId: string, runState: RunState): void {
  const run = l.tracker.runs.get(runId);
  if (!run) throw new Error(`no run ${runId}`);
  run.state = runState;
}

/** Two improving branches that split the metrics, and one clear loser. */
async function standardBatch(l: Lab): Promise<void> {
  branch(l, "a", { loss: 0.3, accuracy: 0.91 });
  branch(l, "b", { loss: 0.32, accuracy: 0.93 });
  branch(l, "c", { loss: 0.4, accuracy: 0.88 });
  await l.reconciler.sync();
}

describe("sync", () => {
  it("advances active branches and discards clear losers early", async () => {
    const l = await lab();
    branch(l, "a", { loss: 0.3, accuracy: 0.91 });
    branch(l, "c", { loss: 0.4, accuracy: 0.88 });

    const report = await l.reconciler.sync();
    expect(report.polled).toEqual(["a", "c"]);
    expect(report.discarded).toEqual(["c"]);
    expect(report.missing).toEqual([]);
    expect(l.branches.get("a").state).toBe("finished");
    expect(l.branches.get("c").state).toBe("loser");
    expect(l.tracker.runs.get("r-c")?.tags).toEqual(["discarded"]);
    expect(report.changes.filter((c) => c.branch === "c").map((c) => `${c.from}->${c.to}`)).toEqual([
      "launched->running",
      "running->finished",
      "finished->evaluated",
      "evaluated->loser",
    ]);
  });

  it("reports branches whose run is gone", async () => {
    const l = await lab();
    l.branches.propose("a");
    l.branches.accept("a");
    l.branches.launch("a", "r-missing");
    const report = await l.reconciler.sync();
    expect(report.missing).toEqual(["a"]);
    expect(l.branches.get("a").state).toBe("launched");
  });

  it("keeps a requeued run's branch running and still advances the rest", async () => {
    const l = await lab();
    branch(l, "a", { loss: 0.3, accuracy: 0.91 });
    branch(l, "b", { loss: 0.32, accuracy: 0.93 });
    setRunState(l, "r-a", "running");
    setRunState(l, "r-b", "running");
    await l.reconciler.sync();

    setRunState(l, "r-a", "queued");
    setRunState(l, "r-b", "finished");
    const report = await l.reconciler.sync();

    expect(report.failed).toEqual([]);
    expect(report.polled).toEqual(["a", "b"]);
    expect(report.changes).toEqual([{ branch: "b", from: "running", to: "finished", reason: "run r-b finished" }]);
    expect(l.branches.get("a").state).toBe("running");
    expect(l.branches.get("b").state).toBe("finished");
  });

  it("records a branch it cannot poll and moves on", async () => {
    class LockedTracker extends FakeTracker {
      override async getRun(runId: string): Promise<Run> {
        if (runId === "r-a") throw new AuthError("token expired", { runId });
        return super.getRun(runId);
      }
    }
    const l = await lab({ tracker: new LockedTracker() });
    branch(l, "a", { loss: 0.3, accuracy: 0.91 });
    branch(l, "b", { loss: 0.32, accuracy: 0.93 });

    const report = await l.reconciler.sync();
    expect(report.failed).toEqual([{ branch: "a", code: "AUTH_ERROR", error: "token expired" }]);
    expect(report.polled).toEqual(["b"]);
    expect(l.branches.get("a").state).toBe("launched");
    expect(l.branches.get("b").state).toBe("finished");
  });
});

describe("reconcile", () => {
  it("waits while members are still running", async () => {
    const l = await lab();
    l.branches.propose("a");
    l.branches.accept("a");
    l.branches.launch("a", "r-a");
    l.tracker.add(makeRun("r-a", { state: "running" }));
    await l.reconciler.sync();

    expect(await l.reconciler.reconcile()).toEqual({ status: "waiting", batch: "batch-001", pending: ["a"] });
  });

  it("ranks the batch and merges every top winner in deterministic order", async () => {
    const l = await lab();
    await standardBatch(l);

    const result = await l.reconciler.reconcile();
    expect(result).toEqual({
      status: "merged",
      batch: "batch-001",
      merge_order: ["a", "b"],
      merged: [
        { branch: "a", commit: "merge-a" },
        { branch: "b", commit: "merge-b" },
      ],
      pending_baseline: {
        batch_id: "batch-001",
        commit: "merge-b",
        merged_branches: ["a", "b"],
        merge_commits: ["merge-a", "merge-b"],
        created_at: NOW.toISOString(),
      },
    });
    expect(l.trunk.log).toEqual(["merge a", "merge b"]);
    expect(l.branches.get("a").win_count).toBe(1);
    expect(l.branches.get("b").win_count).toBe(1);
    expect(l.branches.get("c").state).toBe("closed");
    expect(l.tracker.runs.get("r-a")?.tags).toEqual(["winner", "merged"]);
    expect(l.state.batches[0].status).toBe("merged");
  });

  it("returns the merged result again instead of re-merging", async () => {
    const l = await lab();
    await standardBatch(l);
    await l.reconciler.reconcile("batch-001");
    const again = await l.reconciler.reconcile("batch-001");
    expect(again.status).toBe("merged");
    expect(l.trunk.log).toEqual(["merge a", "merge b"]);
  });

  it("labels and closes review requests on the code host", async () => {
    const host = new FakeHost();
    const l = await lab({ host });
    await standardBatch(l);
    l.branches.setReviewRequest("a", "11");
    l.branches.setReviewRequest("c", "13");

    await l.reconciler.reconcile();
    expect(host.calls).toEqual([
      "label 13 labctl:loser",
      "close 13",
      "label 11 labctl:winner",
      "comment 11",
    ]);
  });

  it("checks trunk before marking a merged review request", async () => {
    const host = new FakeHost();
    const l = await lab({ host });
    await standardBatch(l);
    l.branches.setReviewRequest("a", "11");
    l.trunk.smokeResults = [false];

    await expect(l.reconciler.reconcile()).rejects.toBeInstanceOf(TrunkValidationError);
    expect(host.calls).toEqual([]);
    expect(l.state.batches[0].halt_reason).toBe("smoke check failed after merging a");
  });

  it("halts the batch when the code host cannot be updated after a merge", async () => {
    class DownHost extends FakeHost {
      override async addLabels(): Promise<void> {
        throw new ServiceError("code host unavailable");
      }
    }
    const l = await lab({ host: new DownHost() });
    await standardBatch(l);
    l.branches.setReviewRequest("a", "11");
    l.trunk.smokeResults = [true, true];

    await expect(l.reconciler.reconcile()).rejects.toThrow("code host unavailable");
    expect(l.trunk.smokeResults).toEqual([true]);
    expect(l.trunk.log).toEqual(["merge a"]);
    expect(l.branches.get("a").state).toBe("merged");
    expect(l.state.batches[0].status).toBe("halted");
    expect(l.state.batches[0].halt_reason).toBe(
      "recording the merge failed after merging a: code host unavailable",
    );

    expect((await l.reconciler.reconcile()).status).toBe("merged");
    expect(l.trunk.log).toEqual(["merge a", "merge b"]);
  });

  it("ends a batch with no winners without touching trunk", async () => {
    const l = await lab();
    branch(l, "c", { loss: 0.4, accuracy: 0.88 });
    await l.reconciler.sync();

    expect(await l.reconciler.reconcile()).toEqual({ status: "no-winners", batch: "batch-001", losers: ["c"] });
    expect(l.state.batches[0].status).toBe("baselined");
    expect(l.branches.get("c").state).toBe("closed");
    expect(l.trunk.log).toEqual([]);
  });

  it("demotes cancelled members", async () => {
    const l = await lab();
    branch(l, "a", { loss: 0.3, accuracy: 0.91 });
    l.branches.propose("x");
    l.branches.accept("x");
    l.branches.launch("x", "r-x");
    l.branches.cancel("x", "operator");
    await l.reconciler.sync();

    const result = await l.reconciler.reconcile();
    expect(result.status).toBe("merged");
    expect(l.branches.get("x").state).toBe("closed");
    expect(l.branches.get("x").verdict).toBe("loser");
  });

  it("halts on winners that change the same hyperparameter differently", async () => {
    const l = await lab({ baseConfig: { learning_rate: 0.001 } });
    branch(l, "a", { loss: 0.3, accuracy: 0.91 }, { learning_rate: 0.01 });
    branch(l, "b", { loss: 0.32, accuracy: 0.93 }, { learning_rate: 0.02 });
    await l.reconciler.sync();

    const error = await l.reconciler.reconcile().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConflictError);
    if (!(error instanceof ConflictError)) return;
    expect(error.detail).toEqual({ branches: ["a", "b"], parameters: ["learning_rate"] });
    expect(l.state.batches[0].status).toBe("halted");
    expect(l.state.batches[0].halt_reason).toBe("hyperparameter conflict: learning_rate (a=0.01, b=0.02)");
    expect(l.trunk.log).toEqual([]);
  });

  it("merges winners that agree on a changed hyperparameter", async () => {
    const l = await lab({ baseConfig: { learning_rate: 0.001 } });
    branch(l, "a", { loss: 0.3, accuracy: 0.91 }, { learning_rate: 0.01 });
    branch(l, "b", { loss: 0.32, accuracy: 0.93 }, { learning_rate: 0.01 });
    await l.reconciler.sync();

    expect((await l.reconciler.reconcile()).status).toBe("merged");
  });

  it("aborts an unresolved merge conflict and resumes after it is cleared", async () => {
    const l = await lab();
    await standardBatch(l);
    l.trunk.conflicts.set("b", ["model.py"]);

    const error = await l.reconciler.reconcile().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConflictError);
    if (!(error instanceof ConflictError)) return;
    expect(error.detail).toEqual({ branches: ["b", "a"], files: ["model.py"] });
    expect(l.trunk.log).toEqual(["merge a", "abort b"]);
    expect(l.branches.get("a").state).toBe("merged");
    expect(l.branches.get("b").hold).toBe("merge conflict on b: 1 conflicting file(s) need an operator: model.py");
    expect(l.state.batches[0].status).toBe("halted");

    l.trunk.conflicts.delete("b");
    const resumed = await l.reconciler.reconcile();
    expect(resumed.status).toBe("merged");
    expect(l.trunk.log).toEqual(["merge a", "abort b", "merge b"]);
    expect(l.branches.get("b").hold).toBeNull();
    expect(l.state.pending_baseline?.merge_commits).toEqual(["merge-a", "merge-b"]);
  });

  it("hands textual conflicts to the resolver", async () => {
    const resolver = new FakeResolver({ status: "resolved" });
    const l = await lab({ resolver });
    await standardBatch(l);
    l.trunk.conflicts.set("b", ["model.py", "train.py"]);

    const result = await l.reconciler.reconcile();
    expect(result.status).toBe("merged");
    expect(resolver.requests).toEqual([{ branch: "b", files: ["model.py", "train.py"], workdir: "/work/main" }]);
    expect(l.trunk.log).toEqual(["merge a", "resolve b"]);
  });

  it("halts when the trunk smoke check fails and re-checks on resume", async () => {
    const l = await lab();
    await standardBatch(l);
    l.trunk.smokeResults = [true, false];

    await expect(l.reconciler.reconcile()).rejects.toBeInstanceOf(TrunkValidationError);
    expect(l.state.batches[0].halt_reason).toBe("smoke check failed after merging b");
    expect(l.branches.get("b").state).toBe("merged");

    const resumed = await l.reconciler.reconcile();
    expect(resumed.status).toBe("merged");
    expect(l.trunk.log).toEqual(["merge a", "merge b"]);
  });

  it("holds winners without a passing review until the operator decides", async () => {
    const reviewer = new FakeReviewer();
    reviewer.findings.set("b", [{ severity: "blocker", message: "drops validation split" }]);
    const l = await lab({ reviewer });
    await standardBatch(l);

    expect(await l.reconciler.reconcile()).toEqual({
      status: "held",
      batch: "batch-001",
      held: [
        { branch: "a", reason: "review pending" },
        { branch: "b", reason: "blocking findings: drops validation split" },
      ],
    });
    expect(l.state.batches[0].halt_reason).toBe("awaiting operator decision: a, b");
    expect(l.trunk.log).toEqual([]);

    l.branches.decide("a", "merge");
    l.branches.decide("b", "close");
    const result = await l.reconciler.reconcile();
    expect(result.status).toBe("merged");
    expect(l.trunk.log).toEqual(["merge a"]);
    expect(l.branches.get("b").state).toBe("closed");
  });

  it("returns a winner for fixing into the next batch", async () => {
    const reviewer = new FakeReviewer();
    reviewer.findings.set("a", []);
    const l = await lab({ reviewer });
    await standardBatch(l);
    await l.reconciler.reconcile();

    l.branches.decide("b", "fix");
    const result = await l.reconciler.reconcile();
    expect(result.status).toBe("merged");
    expect(l.trunk.log).toEqual(["merge a"]);
    expect(l.branches.get("b").state).toBe("implementing");
    expect(l.branches.get("b").batch_id).toBe("batch-002");
  });
});

describe("baselines", () => {
  it("flags a regression, rolls back to the previous baseline and undoes the rollback", async () => {
    const l = await lab();
    await standardBatch(l);
    await l.reconciler.reconcile();
    l.tracker.add(makeRun("post", { commit: "merge-b", summary: { loss: 0.5, accuracy: 0.9 } }));

    const { baseline, regression } = await l.reconciler.establishBaseline("post");
    expect(baseline).toMatchObject({
      id: "baseline-002",
      previous_id: "baseline-001",
      commit: "merge-b",
      source_batch_id: "batch-001",
      merged_branches: ["a", "b"],
      merge_commits: ["merge-a", "merge-b"],
    });
    expect(l.state.batches[0].status).toBe("baselined");
    expect(l.state.pending_baseline).toBeNull();
    expect(regression?.regressed.map((d) => [d.metric, d.delta])).toEqual([["loss", 0.15]]);
    expect(regression?.recommended_action).toBe("rollback");
    expect(l.state.regressions).toHaveLength(1);

    const rollback = await l.reconciler.rollback();
    expect(rollback).toMatchObject({
      id: "rollback-001",
      from_baseline_id: "baseline-002",
      to_baseline_id: "baseline-001",
      reverted_commits: ["merge-b", "merge-a"],
      revert_commits: ["revert-merge-b", "revert-merge-a"],
      trunk_head: "revert-merge-a",
      undone: false,
    });
    expect(l.reconciler.activeBaseline()?.metrics.loss).toBe(0.35);

    const undone = await l.reconciler.undoRollback();
    expect(undone.undo_commits).toEqual(["revert-revert-merge-a", "revert-revert-merge-b"]);
    expect(undone.undone).toBe(true);
    expect(l.reconciler.activeBaseline()?.metrics.loss).toBe(0.5);
    await expect(l.reconciler.undoRollback()).rejects.toThrow("No rollback to undo");
  });

  it("reports no regression when nothing got worse", async () => {
    const l = await lab();
    await standardBatch(l);
    await l.reconciler.reconcile();
    l.tracker.add(makeRun("post", { commit: "merge-b", summary: { loss: 0.29, accuracy: 0.94 } }));
    const { regression } = await l.reconciler.establishBaseline("post");
    expect(regression).toBeNull();
  });

  it("refuses a baseline run from another commit while a merge awaits one", async () => {
    const l = await lab();
    await standardBatch(l);
    await l.reconciler.reconcile();
    l.tracker.add(makeRun("stale", { commit: "c0", summary: { loss: 0.3 } }));
    await expect(l.reconciler.establishBaseline("stale")).rejects.toBeInstanceOf(StateError);
  });

  it("refuses unfinished runs and runs that are already baselines", async () => {
    const l = await lab();
    l.tracker.add(makeRun("live", { state: "running", commit: "c0" }));
    await expect(l.reconciler.establishBaseline("live")).rejects.toThrow("a baseline needs a finished run");
    await expect(l.reconciler.establishBaseline("base")).rejects.toThrow("already a baseline");
  });

  it("restores trunk when a rollback revert fails part way", async () => {
    const l = await lab();
    await standardBatch(l);
    await l.reconciler.reconcile();
    l.tracker.add(makeRun("post", { commit: "merge-b", summary: { loss: 0.5, accuracy: 0.9 } }));
    await l.reconciler.establishBaseline("post");
    l.trunk.revertConflicts.add("merge-a");

    await expect(l.reconciler.rollback()).rejects.toThrow("rollback failed and trunk was restored: could not revert merge-a");
    expect(l.trunk.log.slice(-3)).toEqual(["revert merge-b", "abort revert merge-a", "revert revert-merge-b"]);
    expect(l.state.active_baseline_id).toBe("baseline-002");
    expect(l.state.rollbacks).toEqual([]);

    l.trunk.revertConflicts.clear();
    const rollback = await l.reconciler.rollback();
    expect(rollback.id).toBe("rollback-001");
    expect(rollback.revert_commits).toEqual(["revert-merge-b", "revert-merge-a"]);
  });

  it("restores trunk when undoing a rollback fails part way", async () => {
    const l = await lab();
    await standardBatch(l);
    await l.reconciler.reconcile();
    l.tracker.add(makeRun("post", { commit: "merge-b", summary: { loss: 0.5, accuracy: 0.9 } }));
    await l.reconciler.establishBaseline("post");
    await l.reconciler.rollback();
    l.trunk.revertConflicts.add("revert-merge-b");

    await expect(l.reconciler.undoRollback()).rejects.toBeInstanceOf(StateError);
    expect(l.trunk.log.slice(-3)).toEqual([
      "revert revert-merge-a",
      "abort revert revert-merge-b",
      "revert revert-revert-merge-a",
    ]);
    expect(l.state.active_baseline_id).toBe("baseline-001");
    expect(l.state.rollbacks[0]).toMatchObject({ undone: false, undo_commits: [] });
  });

  it("names the revert commits left behind when trunk cannot be restored", async () => {
    const l = await lab();
    await standardBatch(l);
    await l.reconciler.reconcile();
    l.tracker.add(makeRun("post", { commit: "merge-b", summary: { loss: 0.5, accuracy: 0.9 } }));
    await l.reconciler.establishBaseline("post");
    l.trunk.revertConflicts.add("merge-a");
    l.trunk.revertConflicts.add("revert-merge-b");

    await expect(l.reconciler.rollback()).rejects.toThrow(
      "rollback stopped part way and trunk could not be restored; revert commits left on main: revert-merge-b",
    );
    expect(l.state.active_baseline_id).toBe("baseline-002");
  });

  it("cannot roll back the first baseline", async () => {
    const l = await lab();
    await expect(l.reconciler.rollback()).rejects.toThrow("has no previous baseline");
  });
});

describe("merge planning", () => {
  it("orders by win count, then code-point name order", () => {
    expect(
      mergeOrder([
        { name: "b", win_count: 2 },
        { name: "a", win_count: 1 },
        { name: "C", win_count: 2 },
        { name: "c", win_count: 2 },
      ]),
    ).toEqual(["C", "b", "c", "a"]);
  });

  it("ignores identity keys when looking for parameter conflicts", () => {
    const conflicts = findParameterConflicts(
      [
        { name: "a", config: { branch: "a", commit: "x1", epochs: 10 } },
        { name: "b", config: { branch: "b", commit: "x2", epochs: 20, batch_size: 64 } },
      ],
      { epochs: 5, batch_size: 32 },
    );
    expect(conflicts).toEqual([
      {
        key: "epochs",
        baseline: 5,
        changes: [
          { branch: "a", value: 10 },
          { branch: "b", value: 20 },
        ],
      },
    ]);
  });
});
