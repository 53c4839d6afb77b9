import type { Batch } from "../types/batch.js";
import type { Baseline, PendingBaseline } from "../types/baseline.js";
import type { Branch, LifecycleState } from "../types/branch.js";
import type { MetricsConfig } from "../types/config.js";
import type { RegressionReport, RollbackRecord } from "../types/regression.js";
import type { Run } from "../types/run.js";
import type { LabState } from "../types/state.js";
import type { BranchTracker } from "../lifecycle/branch-tracker.js";
import type { RunRegistry } from "../registry/run-registry.js";
import type { ReviewHost } from "../hosting/review-host.js";
import { LABELS } from "../hosting/review-host.js";
import { ConflictError, LabError, NotFoundError, StateError, TrunkValidationError, errorMessage } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { compareMetrics, type CompareOptions } from "../compare/comparator.js";
import type { Contender } from "../compare/win-count.js";
import { rankBatch, renderVerdict, type VerdictOutcome } from "../verdict/verdict-engine.js";
import { isRunActive } from "../lifecycle/state-machine.js";
import { batchGate, currentBatch, getBatch, rebaseOpenBatches } from "../lifecycle/batches.js";
import { gateOutcome, type Reviewer } from "./reviewer.js";
import { OperatorResolver, type ConflictResolver } from "./resolver.js";
import { findParameterConflicts } from "./param-conflicts.js";
import { mergeOrder } from "./merge-plan.js";
import { detectRegression } from "./regression.js";
import type { Trunk } from "./trunk.js";

const log = createLogger("reconciler");

export type ReconcilerDeps = {
  state: LabState;
  branches: BranchTracker;
  registry: RunRegistry;
  reviewer: Reviewer;
  metrics: MetricsConfig;
  /** Required for merges and rollbacks only. */
  trunk?: Trunk;
  resolver?: ConflictResolver;
  host?: ReviewHost;
  now?: () => Date;
};

export type SyncChange = { branch: string; from: LifecycleState; to: LifecycleState; reason: string };

export type SyncReport = {
  polled: string[];
  changes: SyncChange[];
  discarded: string[];
  /** Branches whose active run the tracker no longer knows. */
  missing: string[];
  /** Branches that could not be advanced this tick; the others still were. */
  failed: SyncFailure[];
};

export type SyncFailure = { branch: string; code: string; error: string };

export type MergedBranch = { branch: string; commit: string };

export type ReconcileResult =
  | { status: "waiting"; batch: string; pending: string[] }
  | { status: "held"; batch: string; held: Array<{ branch: string; reason: string }> }
  | { status: "no-winners"; batch: string; losers: string[] }
  | { status: "merged"; batch: string; merge_order: string[]; merged: MergedBranch[]; pending_baseline: PendingBaseline | null };

export type EstablishResult = {
  baseline: Baseline;
  regression: RegressionReport | null;
};

const SMOKE_HALT = "smoke check failed";
const ANNOUNCE_HALT = "recording the merge failed after merging";

function seq(prefix: string, n: number): string {
  return `${prefix}-${String(n).padStart(3, "0")}`;
}

/**
 * Baseline Reconciler: batch-level decisions and regression safety.
 *
 * The only component that writes trunk, through the Trunk handle it is given.
 * Every step records its progress on the LabState before moving on, so a halt
 * (conflict, failed smoke check, held review) resumes where it stopped.
 */
export class BaselineReconciler {
  private readonly state: LabState;
  private readonly branches: BranchTracker;
  private readonly registry: RunRegistry;
  private readonly resolver: ConflictResolver;
  private readonly now: () => Date;

  constructor(private readonly deps: ReconcilerDeps) {
    this.state = deps.state;
    this.branches = deps.branches;
    this.registry = deps.registry;
    this.resolver = deps.resolver ?? new OperatorResolver();
    this.now = deps.now ?? (() => new Date());
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private compareOptions(): CompareOptions {
    const { primary, directions } = this.deps.metrics;
    return { metrics: primary.length > 0 ? primary : undefined, directions };
  }

  activeBaseline(): Baseline | null {
    const id = this.state.active_baseline_id;
    return id === null ? null : this.state.baselines.find((b) => b.id === id) ?? null;
  }

  baselineFor(batch: Batch): Baseline | null {
    return batch.baseline_id === null ? null : this.state.baselines.find((b) => b.id === batch.baseline_id) ?? null;
  }

  /** Verdict for a branch's run against its batch baseline. */
  verdictFor(branch: Branch, run: Run): VerdictOutcome {
    const baseline = this.baselineFor(getBatch(this.state, branch.batch_id));
    const comparison = baseline ? compareMetrics(run.summary, baseline.metrics, this.compareOptions()) : null;
    return renderVerdict({ runState: run.state, comparison, primary: this.deps.metrics.primary });
  }

  private requireTrunk(operation: string): Trunk {
    if (!this.deps.trunk) throw new StateError(`No trunk handle for ${operation}`, { operation });
    return this.deps.trunk;
  }

  private async activeRun(branch: Branch): Promise<Run | null> {
    return branch.run_id ? this.registry.getRun(branch.run_id) : null;
  }

  private halt(batch: Batch, reason: string): void {
    batch.status = "halted";
    batch.halt_reason = reason;
    batch.updated_at = this.timestamp();
    log.warn({ batch: batch.id, reason }, "batch halted");
  }

  private async closeLoser(branch: Branch): Promise<void> {
    const last = branch.transitions[branch.transitions.length - 1];
    const reason = last?.reason ?? "loser";
    if (this.deps.host && branch.review_request) {
      await this.deps.host.addLabels(branch.review_request, [LABELS.loser]);
      await this.deps.host.close(branch.review_request, `Closed by labctl: ${reason}`);
    }
    this.branches.close(branch.name, reason);
  }

  private async discard(branch: Branch, outcome: Extract<VerdictOutcome, { route: "verdict" }>): Promise<void> {
    this.branches.recordVerdict(branch.name, outcome.verdict, outcome.reason, outcome.earlyDiscard);
    if (outcome.earlyDiscard && branch.run_id) await this.registry.tag(branch.run_id, "discarded");
  }

  /**
   * One poll tick: advance every launched/running branch to its run's state
   * and apply early discard to finished ones. Never blocks on a run.
   */
  async sync(): Promise<SyncReport> {
    const report: SyncReport = { polled: [], changes: [], discarded: [], missing: [], failed: [] };

    for (const branch of this.branches.list()) {
      const pending = branch.state === "finished" && branch.verdict === "unevaluated";
      if (!isRunActive(branch.state) && !pending) continue;

      const before = branch.transitions.length;
      try {
        const run = await this.activeRun(branch);
        if (!run) {
          log.warn({ branch: branch.name, run: branch.run_id }, "active run not found");
          report.missing.push(branch.name);
          continue;
        }
        report.polled.push(branch.name);
        this.branches.observe(branch.name, run);

        if (branch.state === "finished" && branch.verdict === "unevaluated") {
          const outcome = this.verdictFor(branch, run);
          if (outcome.route === "verdict") {
            await this.discard(branch, outcome);
            if (outcome.earlyDiscard) report.discarded.push(branch.name);
          }
        }
      } catch (e) {
        if (!(e instanceof LabError)) throw e;
        log.warn({ branch: branch.name, run: branch.run_id, code: e.code, err: e.message }, "sync failed for branch");
        report.failed.push({ branch: branch.name, code: e.code, error: e.message });
      } finally {
        for (const t of branch.transitions.slice(before)) {
          report.changes.push({ branch: branch.name, from: t.from, to: t.to, reason: t.reason });
        }
      }
    }
    return report;
  }

  /** Reconcile a batch (the oldest unfinished one by default). Re-running resumes. */
  async reconcile(batchId?: string): Promise<ReconcileResult> {
    const batch = batchId ? getBatch(this.state, batchId) : currentBatch(this.state);
    if (!batch) throw new NotFoundError("No batch to reconcile", { operation: "reconcile" });
    if (batch.status === "merged" || batch.status === "baselined") return this.mergedResult(batch);

    const gate = batchGate(this.state, batch);
    if (!gate.ready) {
      log.info({ batch: batch.id, pending: gate.pending }, "batch not ready");
      return { status: "waiting", batch: batch.id, pending: gate.pending };
    }

    const priorHalt = batch.halt_reason;
    batch.status = "reconciling";
    batch.halt_reason = null;
    batch.updated_at = this.timestamp();

    await this.rank(batch);

    const held = await this.qualityGate(batch);
    if (held.length > 0) {
      this.halt(batch, `awaiting operator decision: ${held.map((h) => h.branch).join(", ")}`);
      return { status: "held", batch: batch.id, held };
    }

    const candidates = this.members(batch).filter((b) => b.state === "winner-pending-review" || b.state === "merged");
    if (candidates.length === 0) {
      batch.status = "baselined";
      batch.updated_at = this.timestamp();
      return { status: "no-winners", batch: batch.id, losers: this.members(batch).map((b) => b.name) };
    }

    return this.mergeWinners(batch, candidates, priorHalt);
  }

  private members(batch: Batch): Branch[] {
    return batch.members.map((name) => this.branches.get(name));
  }

  private mergedResult(batch: Batch): ReconcileResult {
    const merged = batch.merge_order
      .map((name) => this.branches.get(name))
      .filter((b) => b.merge_commit !== null)
      .map((b) => ({ branch: b.name, commit: b.merge_commit ?? "" }));
    if (merged.length === 0) return { status: "no-winners", batch: batch.id, losers: [...batch.members] };
    const pending = this.state.pending_baseline?.batch_id === batch.id ? this.state.pending_baseline : null;
    return { status: "merged", batch: batch.id, merge_order: [...batch.merge_order], merged, pending_baseline: pending };
  }

  /** Evaluate finished members, rank the survivors, close the losers. */
  private async rank(batch: Batch): Promise<void> {
    const survivors: Contender[] = [];

    for (const branch of this.members(batch)) {
      if (branch.state === "cancelled") {
        this.branches.demote(branch.name, "run cancelled");
        continue;
      }
      if (branch.state !== "finished" && branch.state !== "evaluated") continue;

      const run = await this.activeRun(branch);
      if (!run) {
        if (branch.state === "finished") this.branches.evaluate(branch.name, "loser", "run record missing");
        this.branches.demote(branch.name, "run record missing");
        continue;
      }

      if (branch.state === "finished") {
        const outcome = this.verdictFor(branch, run);
        if (outcome.route === "fix") continue;
        if (outcome.earlyDiscard) {
          await this.discard(branch, outcome);
          continue;
        }
        this.branches.evaluate(branch.name, outcome.verdict, outcome.reason);
      }
      survivors.push({ name: branch.name, metrics: run.summary });
    }

    if (survivors.length > 0) {
      const { primary, directions } = this.deps.metrics;
      const ranking = rankBatch(survivors, { primary, directions });
      log.info({ batch: batch.id, winCounts: ranking.winCounts, winners: ranking.winners }, "batch ranked");

      for (const name of ranking.winners) {
        const count = ranking.winCounts[name] ?? 0;
        this.branches.promote(name, count, `top win count ${count} over ${ranking.metrics.length} metric(s)`);
        const runId = this.branches.get(name).run_id;
        if (runId) await this.registry.tag(runId, "winner");
      }
      for (const name of ranking.losers) {
        const count = ranking.winCounts[name] ?? 0;
        this.branches.demote(name, `win count ${count} below top ${ranking.topCount}`, count);
      }
    }

    for (const branch of this.members(batch)) {
      if (branch.state === "loser") await this.closeLoser(branch);
    }
  }

  /** Apply operator decisions and review findings to pending winners. */
  private async qualityGate(batch: Batch): Promise<Array<{ branch: string; reason: string }>> {
    const held: Array<{ branch: string; reason: string }> = [];

    for (const branch of this.members(batch)) {
      if (branch.state !== "winner-pending-review") continue;

      switch (branch.decision) {
        case "close":
          this.branches.demote(branch.name, "closed by operator decision");
          await this.closeLoser(branch);
          continue;
        case "fix":
          this.branches.returnForFix(branch.name, "returned for fixing by operator decision");
          continue;
        case "merge":
          this.branches.hold(branch.name, null);
          continue;
        case null:
          break;
      }

      const outcome = gateOutcome(await this.deps.reviewer.review(branch));
      if (outcome.status === "passed") {
        this.branches.hold(branch.name, null);
        continue;
      }

      const reason =
        outcome.status === "missing"
          ? "review pending"
          : `blocking findings: ${outcome.findings
              .filter((f) => f.severity === "blocker")
              .map((f) => f.message)
              .join("; ")}`;
      this.branches.hold(branch.name, reason);
      held.push({ branch: branch.name, reason });
      if (outcome.status === "blocked" && this.deps.host && branch.review_request) {
        await this.deps.host.addLabels(branch.review_request, [LABELS.held]);
      }
    }
    return held;
  }

  private async mergeWinners(batch: Batch, candidates: Branch[], priorHalt: string | null): Promise<ReconcileResult> {
    const pendingBaseline = this.state.pending_baseline;
    if (pendingBaseline && pendingBaseline.batch_id !== batch.id) {
      throw new StateError(`Baseline for ${pendingBaseline.batch_id} is not established yet`, {
        batchId: batch.id,
        operation: "reconcile",
      });
    }

    const order = mergeOrder(candidates);
    batch.merge_order = order;

    const configs: Array<{ name: string; config: Run["config"] }> = [];
    for (const branch of candidates) {
      const run = await this.activeRun(branch);
      configs.push({ name: branch.name, config: run?.config ?? {} });
    }
    const conflicts = findParameterConflicts(configs, this.baselineFor(batch)?.config ?? {});
    if (conflicts.length > 0) {
      const branches = [...new Set(conflicts.flatMap((c) => c.changes.map((ch) => ch.branch)))].sort();
      const detail = conflicts
        .map((c) => `${c.key} (${c.changes.map((ch) => `${ch.branch}=${String(ch.value)}`).join(", ")})`)
        .join("; ");
      this.halt(batch, `hyperparameter conflict: ${detail}`);
      throw new ConflictError(
        `Winners change the same hyperparameters incompatibly: ${detail}`,
        { branches, parameters: conflicts.map((c) => c.key) },
        { batchId: batch.id, operation: "reconcile" },
      );
    }

    const trunk = this.requireTrunk("merge");
    if (priorHalt?.startsWith(SMOKE_HALT)) await this.assertSmoke(trunk, batch, "resuming");

    for (const name of order) {
      const branch = this.branches.get(name);
      if (branch.state !== "winner-pending-review") continue;
      const commit = await this.mergeOne(trunk, batch, branch);

      this.branches.markMerged(name, commit);
      await this.assertSmoke(trunk, batch, `after merging ${name}`);
      await this.announceMerge(trunk, batch, branch, commit);
    }

    const merged = order.map((name) => this.branches.get(name));
    const pending: PendingBaseline = {
      batch_id: batch.id,
      commit: await trunk.head(),
      merged_branches: merged.map((b) => b.name),
      merge_commits: merged.map((b) => b.merge_commit ?? ""),
      created_at: this.timestamp(),
    };
    this.state.pending_baseline = pending;
    batch.status = "merged";
    batch.updated_at = this.timestamp();
    log.info({ batch: batch.id, merged: pending.merged_branches, head: pending.commit }, "batch merged");

    return {
      status: "merged",
      batch: batch.id,
      merge_order: order,
      merged: merged.map((b) => ({ branch: b.name, commit: b.merge_commit ?? "" })),
      pending_baseline: pending,
    };
  }

  private async mergeOne(trunk: Trunk, batch: Batch, branch: Branch): Promise<string> {
    const message = `Merge ${branch.name} into ${trunk.branch} (${batch.id})`;
    const outcome = await trunk.merge(branch.name, message);
    if (outcome.status === "merged") return outcome.commit;

    const resolution = await this.resolver.resolve({ branch: branch.name, files: outcome.files, workdir: trunk.workdir });
    if (resolution.status === "resolved") return trunk.completeMerge(message);

    await trunk.abortMerge();
    const reason = `merge conflict on ${branch.name}: ${resolution.reason}`;
    this.halt(batch, reason);
    this.branches.hold(branch.name, reason);
    const alreadyMerged = this.members(batch)
      .filter((b) => b.state === "merged")
      .map((b) => b.name);
    throw new ConflictError(
      reason,
      { branches: [branch.name, ...alreadyMerged], files: outcome.files },
      { branch: branch.name, batchId: batch.id, operation: "merge" },
    );
  }

  /**
   * Tag the merged run and mark its review request. The merge itself stands;
   * a failure halts the batch and is not retried when the batch resumes.
   */
  private async announceMerge(trunk: Trunk, batch: Batch, branch: Branch, commit: string): Promise<void> {
    try {
      if (branch.run_id) await this.registry.tag(branch.run_id, "merged");
      if (this.deps.host && branch.review_request) {
        await this.deps.host.addLabels(branch.review_request, [LABELS.winner]);
        await this.deps.host.comment(branch.review_request, `Merged into ${trunk.branch} as ${commit} (${batch.id}).`);
      }
    } catch (e) {
      this.halt(batch, `${ANNOUNCE_HALT} ${branch.name}: ${errorMessage(e)}`);
      throw e;
    }
  }

  private async assertSmoke(trunk: Trunk, batch: Batch, when: string): Promise<void> {
    const smoke = await trunk.smokeCheck();
    if (smoke.pass) return;
    this.halt(batch, `${SMOKE_HALT} ${when}`);
    throw new TrunkValidationError(`Trunk smoke check failed ${when}`, smoke.output, {
      batchId: batch.id,
      operation: "smoke_check",
    });
  }

  /**
   * Make a finished run the active baseline. When a merged batch is waiting,
   * the run must come from its trunk commit. The previous baseline is kept and
   * compared against; a regression is reported, never reverted here.
   */
  async establishBaseline(runId: string, commit?: string): Promise<EstablishResult> {
    const run = await this.registry.getRun(runId);
    if (!run) throw new NotFoundError(`Run not found: ${runId}`, { runId, operation: "establish_baseline" });
    if (run.state !== "finished") {
      throw new StateError(`Run ${runId} is ${run.state}; a baseline needs a finished run`, { runId });
    }
    if (this.state.baselines.some((b) => b.run_id === runId)) {
      throw new StateError(`Run ${runId} is already a baseline`, { runId, operation: "establish_baseline" });
    }

    const pending = this.state.pending_baseline;
    if (pending && run.commit && run.commit !== pending.commit) {
      throw new StateError(`Run ${runId} was launched from ${run.commit}, not the merged trunk ${pending.commit}`, {
        runId,
        batchId: pending.batch_id,
        operation: "establish_baseline",
      });
    }
    const baseCommit = pending?.commit ?? run.commit ?? commit;
    if (!baseCommit) {
      throw new StateError(`Run ${runId} records no commit; pass one explicitly`, { runId, operation: "establish_baseline" });
    }

    const at = this.timestamp();
    const previous = this.activeBaseline();
    const baseline: Baseline = {
      id: seq("baseline", this.state.baselines.length + 1),
      run_id: run.id,
      commit: baseCommit,
      metrics: { ...run.summary },
      config: { ...run.config },
      established_at: at,
      previous_id: previous?.id ?? null,
      source_batch_id: pending?.batch_id ?? null,
      merged_branches: pending ? [...pending.merged_branches] : [],
      merge_commits: pending ? [...pending.merge_commits] : [],
    };
    this.state.baselines.push(baseline);
    this.state.active_baseline_id = baseline.id;

    if (pending) {
      const batch = getBatch(this.state, pending.batch_id);
      batch.status = "baselined";
      batch.updated_at = at;
      this.state.pending_baseline = null;
    }
    rebaseOpenBatches(this.state, baseline.id, at);
    await this.registry.tag(run.id, "baseline");
    log.info({ baseline: baseline.id, run: run.id, commit: baseCommit }, "baseline established");

    const regression = previous ? detectRegression(baseline, previous, this.compareOptions(), at) : null;
    if (regression) {
      this.state.regressions.push(regression);
      log.warn(
        { baseline: baseline.id, previous: previous?.id, metrics: regression.regressed.map((d) => d.metric) },
        "regression detected",
      );
    }
    return { baseline, regression };
  }

  /**
   * Revert the active baseline's merges on trunk, newest first, with history
   * kept, and reactivate the previous baseline.
   */
  async rollback(): Promise<RollbackRecord> {
    const current = this.activeBaseline();
    if (!current) throw new StateError("No active baseline to roll back", { operation: "rollback" });
    const previous = current.previous_id ? this.state.baselines.find((b) => b.id === current.previous_id) : undefined;
    if (!previous) {
      throw new StateError(`Baseline ${current.id} has no previous baseline`, { operation: "rollback" });
    }

    const trunk = this.requireTrunk("rollback");
    const reverted = [...current.merge_commits].reverse();
    const revertCommits: string[] = [];
    try {
      for (const commit of reverted) {
        revertCommits.push(await trunk.revertMerge(commit));
      }
    } catch (e) {
      return this.unwindReverts(trunk, revertCommits, "rollback", e);
    }

    const at = this.timestamp();
    this.state.active_baseline_id = previous.id;
    rebaseOpenBatches(this.state, previous.id, at);

    const report = [...this.state.regressions].reverse().find((r) => r.baseline_id === current.id) ?? null;
    const record: RollbackRecord = {
      id: seq("rollback", this.state.rollbacks.length + 1),
      from_baseline_id: current.id,
      to_baseline_id: previous.id,
      reverted_commits: reverted,
      revert_commits: revertCommits,
      undo_commits: [],
      trunk_head: await trunk.head(),
      report,
      undone: false,
      at,
    };
    this.state.rollbacks.push(record);
    log.warn({ rollback: record.id, from: current.id, to: previous.id, reverted }, "rolled back");
    return record;
  }

  /**
   * Put trunk back where it stood before a revert sequence that failed part
   * way: abandon the revert in progress, then revert the reverts already made,
   * newest first. Lab state is left untouched.
   */
  private async unwindReverts(trunk: Trunk, made: string[], operation: string, cause: unknown): Promise<never> {
    try {
      await trunk.abortRevert();
      for (const commit of [...made].reverse()) {
        await trunk.revertCommit(commit);
      }
    } catch (e) {
      log.error({ operation, made, err: errorMessage(e) }, "could not unwind reverts");
      throw new StateError(
        `${operation} stopped part way and trunk could not be restored; revert commits left on ${trunk.branch}: ${made.join(", ")}`,
        { operation, cause: e },
      );
    }
    log.warn({ operation, unwound: made.length, err: errorMessage(cause) }, "reverts unwound");
    throw new StateError(`${operation} failed and trunk was restored: ${errorMessage(cause)}`, { operation, cause });
  }

  /** Revert the latest rollback's revert commits and reactivate the baseline it replaced. */
  async undoRollback(): Promise<RollbackRecord> {
    const record = [...this.state.rollbacks].reverse().find((r) => !r.undone);
    if (!record) throw new StateError("No rollback to undo", { operation: "undo_rollback" });
    if (this.state.active_baseline_id !== record.to_baseline_id) {
      throw new StateError(
        `Active baseline is ${this.state.active_baseline_id}, not ${record.to_baseline_id}; ${record.id} cannot be undone`,
        { operation: "undo_rollback" },
      );
    }

    const trunk = this.requireTrunk("undo_rollback");
    const undo: string[] = [];
    try {
      for (const commit of [...record.revert_commits].reverse()) {
        undo.push(await trunk.revertCommit(commit));
      }
    } catch (e) {
      return this.unwindReverts(trunk, undo, "undo_rollback", e);
    }

    const at = this.timestamp();
    this.state.active_baseline_id = record.from_baseline_id;
    rebaseOpenBatches(this.state, record.from_baseline_id, at);
    record.undo_commits = undo;
    record.trunk_head = await trunk.head();
    record.undone = true;
    log.info({ rollback: record.id, baseline: record.from_baseline_id }, "rollback undone");
    return record;
  }
}
