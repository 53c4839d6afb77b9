import type { Branch, LifecycleState, OperatorDecision, Verdict } from "../types/branch.js";
import type { LabState } from "../types/state.js";
import type { Run } from "../types/run.js";
import { ConfigError, NotFoundError, RetryLimitExceededError, StateError } from "../core/errors.js";
import { checkBranchName } from "../git/branch-guard.js";
import { createLogger } from "../logging/logger.js";
import { assertTransition, canTransition, isRunActive, stateForRun } from "./state-machine.js";
import { getBatch, openBatch } from "./batches.js";

const log = createLogger("lifecycle");

export type BranchTrackerOptions = {
  /** Cap on the failed/crashed -> implementing loop. */
  maxRetries: number;
  now?: () => Date;
};

export type BranchFilter = {
  batchId?: string;
  state?: LifecycleState;
};

/**
 * Records branch lifecycle changes on a LabState. Every transition is checked
 * against the transition table and appended to the branch's audit log; the
 * caller persists the state afterwards.
 */
export class BranchTracker {
  private readonly now: () => Date;

  constructor(
    readonly state: LabState,
    private readonly opts: BranchTrackerOptions,
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  get(name: string): Branch {
    const branch = this.state.branches[name];
    if (!branch) throw new NotFoundError(`Branch not found: ${name}`, { branch: name });
    return branch;
  }

  list(filter: BranchFilter = {}): Branch[] {
    return Object.values(this.state.branches)
      .filter((b) => filter.batchId === undefined || b.batch_id === filter.batchId)
      .filter((b) => filter.state === undefined || b.state === filter.state)
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  private transition(branch: Branch, to: LifecycleState, reason: string, operation: string): void {
    assertTransition(branch.state, to, { branch: branch.name, batchId: branch.batch_id, operation });
    const at = this.timestamp();
    branch.transitions.push({ from: branch.state, to, at, reason });
    log.info({ branch: branch.name, from: branch.state, to, reason }, "transition");
    branch.state = to;
    branch.updated_at = at;
  }

  propose(name: string, idea: string | null = null): Branch {
    const valid = checkBranchName(name);
    if (!valid.allowed) {
      throw new ConfigError(valid.reason ?? `Invalid branch name '${name}'`, { branch: name, operation: "propose" });
    }
    if (this.state.branches[name]) {
      throw new StateError(`Branch already exists: ${name}`, { branch: name, operation: "propose" });
    }
    const at = this.timestamp();
    const batch = openBatch(this.state, at);
    const branch: Branch = {
      name,
      idea,
      batch_id: batch.id,
      state: "proposed",
      verdict: "unevaluated",
      run_id: null,
      superseded_runs: [],
      retry_count: 0,
      review_request: null,
      worktree: null,
      win_count: null,
      hold: null,
      decision: null,
      merge_commit: null,
      diagnoses: [],
      transitions: [],
      created_at: at,
      updated_at: at,
    };
    batch.members.push(name);
    batch.updated_at = at;
    this.state.branches[name] = branch;
    log.info({ branch: name, batch: batch.id }, "proposed");
    return branch;
  }

  accept(name: string, worktree: string | null = null): Branch {
    const branch = this.get(name);
    this.transition(branch, "implementing", "idea accepted", "accept");
    branch.worktree = worktree;
    return branch;
  }

  /** Attach a freshly submitted run. The previous run, if any, is kept as superseded history. */
  launch(name: string, runId: string): Branch {
    const branch = this.get(name);
    if (branch.run_id === runId || branch.superseded_runs.includes(runId)) {
      throw new StateError(`Run ${runId} was already launched for ${name}`, { branch: name, runId, operation: "launch" });
    }
    this.transition(branch, "launched", `run ${runId} submitted`, "launch");
    if (branch.run_id) branch.superseded_runs.push(branch.run_id);
    branch.run_id = runId;
    branch.verdict = "unevaluated";
    branch.win_count = null;
    return branch;
  }

  /**
   * Advance a launched/running branch to match its run. Returns whether the
   * branch changed. Runs other than the active one are ignored.
   */
  observe(name: string, run: Run): boolean {
    const branch = this.get(name);
    if (!isRunActive(branch.state) || run.id !== branch.run_id) return false;

    const target = stateForRun(run.state);
    if (target === branch.state) return false;
    if (branch.state === "running" && target === "launched") {
      // Preempted back into the queue: the branch stays running until the run moves on.
      log.info({ branch: name, run: run.id, state: run.state }, "run requeued");
      return false;
    }

    const reason = `run ${run.id} ${run.state}`;
    if (!canTransition(branch.state, target) && branch.state === "launched") {
      // Finished between two polls: record the running step it skipped.
      this.transition(branch, "running", reason, "observe");
    }
    this.transition(branch, target, reason, "observe");
    return true;
  }

  /**
   * Store a per-branch verdict. An early discard closes the evaluation at once
   * (finished -> evaluated -> loser); other verdicts wait for the batch.
   */
  recordVerdict(name: string, verdict: Verdict, reason: string, earlyDiscard = false): Branch {
    const branch = this.get(name);
    if (earlyDiscard) {
      this.evaluate(name, "loser", reason);
      return this.demote(name, reason);
    }
    branch.verdict = verdict;
    branch.updated_at = this.timestamp();
    return branch;
  }

  evaluate(name: string, verdict: Verdict, reason: string): Branch {
    const branch = this.get(name);
    this.transition(branch, "evaluated", reason, "evaluate");
    branch.verdict = verdict;
    return branch;
  }

  promote(name: string, winCount: number, reason: string): Branch {
    const branch = this.get(name);
    this.transition(branch, "winner-pending-review", reason, "promote");
    branch.verdict = "winner";
    branch.win_count = winCount;
    return branch;
  }

  demote(name: string, reason: string, winCount: number | null = null): Branch {
    const branch = this.get(name);
    this.transition(branch, "loser", reason, "demote");
    branch.verdict = "loser";
    if (winCount !== null) branch.win_count = winCount;
    branch.hold = null;
    return branch;
  }

  /** failed/crashed -> implementing, counting the attempt. */
  retry(name: string, diagnosis: string): Branch {
    const branch = this.get(name);
    if (branch.retry_count >= this.opts.maxRetries) {
      throw new RetryLimitExceededError(name, this.opts.maxRetries);
    }
    this.transition(branch, "implementing", `retry: ${diagnosis}`, "retry");
    branch.retry_count += 1;
    branch.diagnoses.push(diagnosis);
    branch.verdict = "unevaluated";
    return branch;
  }

  /** Give up on a failed, crashed or cancelled branch. */
  abandon(name: string, reason: string): Branch {
    return this.demote(name, `abandoned: ${reason}`);
  }

  cancel(name: string, reason: string): Branch {
    const branch = this.get(name);
    this.transition(branch, "cancelled", reason, "cancel");
    return branch;
  }

  /** Send a pending winner back to implementing, in the next open batch. */
  returnForFix(name: string, reason: string): Branch {
    const branch = this.get(name);
    this.transition(branch, "implementing", `returned for fix: ${reason}`, "return_for_fix");

    const at = this.timestamp();
    const from = getBatch(this.state, branch.batch_id);
    from.members = from.members.filter((m) => m !== name);
    from.merge_order = from.merge_order.filter((m) => m !== name);
    from.updated_at = at;

    const to = openBatch(this.state, at);
    to.members.push(name);
    to.updated_at = at;

    branch.batch_id = to.id;
    branch.verdict = "unevaluated";
    branch.win_count = null;
    branch.hold = null;
    branch.decision = null;
    branch.diagnoses.push(reason);
    return branch;
  }

  markMerged(name: string, mergeCommit: string): Branch {
    const branch = this.get(name);
    this.transition(branch, "merged", `merged as ${mergeCommit}`, "merge");
    branch.merge_commit = mergeCommit;
    branch.hold = null;
    return branch;
  }

  close(name: string, reason: string): Branch {
    const branch = this.get(name);
    this.transition(branch, "closed", reason, "close");
    return branch;
  }

  archive(name: string): Branch {
    const branch = this.get(name);
    this.transition(branch, "archived", "cleanup", "archive");
    branch.worktree = null;
    return branch;
  }

  hold(name: string, reason: string | null): Branch {
    const branch = this.get(name);
    branch.hold = reason;
    branch.updated_at = this.timestamp();
    return branch;
  }

  decide(name: string, decision: OperatorDecision | null): Branch {
    const branch = this.get(name);
    if (decision !== null && branch.state !== "winner-pending-review") {
      throw new StateError(`Decisions apply to pending winners; ${name} is ${branch.state}`, {
        branch: name,
        operation: "decide",
      });
    }
    branch.decision = decision;
    branch.updated_at = this.timestamp();
    return branch;
  }

  setReviewRequest(name: string, reviewRequest: string | null): Branch {
    const branch = this.get(name);
    branch.review_request = reviewRequest;
    branch.updated_at = this.timestamp();
    return branch;
  }
}
