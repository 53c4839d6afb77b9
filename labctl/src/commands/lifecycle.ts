import type { Branch, OperatorDecision } from "../types/branch.js";
import type { Issue } from "../hosting/review-host.js";
import type { SyncReport } from "../reconcile/reconciler.js";
import { LABELS } from "../hosting/review-host.js";
import { NotFoundError } from "../core/errors.js";
import { assertTransition, isRunActive } from "../lifecycle/state-machine.js";
import { EXIT } from "./exit-codes.js";
import type { BranchTracker } from "../lifecycle/branch-tracker.js";
import { branchTracker, loadContext, reconciler, type CommonOptions, type LabContext } from "./context.js";
import { fail, failure, type CommandResult } from "./result.js";

export type BranchResult = CommandResult<{ branch: Branch }>;

async function mutate(
  opts: CommonOptions,
  fn: (ctx: LabContext, tracker: BranchTracker) => Promise<Branch>,
): Promise<BranchResult> {
  try {
    const ctx = loadContext(opts);
    const branch = await ctx.store.update(ctx.config.project, (state) => fn(ctx, branchTracker(ctx, state)));
    return { ok: true, branch };
  } catch (e) {
    return failure(e);
  }
}

/** Register an idea as a proposed branch; with `issue`, also open an idea issue on the code host. */
export function propose(
  opts: CommonOptions & { branch: string; idea?: string; issue?: boolean },
): Promise<BranchResult> {
  return mutate(opts, async (ctx, tracker) => {
    const branch = tracker.propose(opts.branch, opts.idea ?? null);
    if (opts.issue && ctx.deps.host) {
      const issue = await ctx.deps.host.createIssue(opts.branch, opts.idea ?? "", [LABELS.idea]);
      branch.idea = branch.idea ? `${branch.idea} (#${issue.number})` : `#${issue.number}`;
    }
    return branch;
  });
}

/** Move a proposed branch to implementing, in its own working copy unless `worktree` is false. */
export function accept(opts: CommonOptions & { branch: string; worktree?: boolean }): Promise<BranchResult> {
  return mutate(opts, async (ctx, tracker) => {
    const current = tracker.get(opts.branch);
    assertTransition(current.state, "implementing", { branch: opts.branch, operation: "accept" });
    const worktrees = ctx.deps.worktrees;
    const dir =
      opts.worktree !== false && worktrees ? await worktrees.create(opts.branch, ctx.config.trunk.branch) : null;
    return tracker.accept(opts.branch, dir);
  });
}

/** Attach a run the tracker already knows to the branch. */
export function launch(opts: CommonOptions & { branch: string; runId: string }): Promise<BranchResult> {
  return mutate(opts, async (ctx, tracker) => {
    const run = await ctx.registry.getRun(opts.runId);
    if (!run) throw new NotFoundError(`Run not found: ${opts.runId}`, { branch: opts.branch, runId: opts.runId });
    const branch = tracker.launch(opts.branch, run.id);
    tracker.observe(branch.name, run);
    return branch;
  });
}

/** Cancel a branch, and its active run on the tracker when one is in flight. */
export function cancel(opts: CommonOptions & { branch: string; reason?: string }): Promise<BranchResult> {
  return mutate(opts, async (ctx, tracker) => {
    const current = tracker.get(opts.branch);
    assertTransition(current.state, "cancelled", { branch: opts.branch, operation: "cancel" });
    if (isRunActive(current.state) && current.run_id) await ctx.registry.cancel(current.run_id);
    return tracker.cancel(opts.branch, opts.reason ?? "cancelled by operator");
  });
}

export function retry(opts: CommonOptions & { branch: string; diagnosis: string }): Promise<BranchResult> {
  return mutate(opts, async (_ctx, tracker) => tracker.retry(opts.branch, opts.diagnosis));
}

export function abandon(opts: CommonOptions & { branch: string; reason?: string }): Promise<BranchResult> {
  return mutate(opts, async (_ctx, tracker) => tracker.abandon(opts.branch, opts.reason ?? "given up"));
}

/** Record the operator's call on a held winner; the next reconcile applies it. */
export function decide(opts: CommonOptions & { branch: string; decision: OperatorDecision }): Promise<BranchResult> {
  return mutate(opts, async (_ctx, tracker) => tracker.decide(opts.branch, opts.decision));
}

export type SyncResult = CommandResult<{ report: SyncReport }>;

/** One poll of every launched or running branch. */
export async function sync(opts: CommonOptions = {}): Promise<SyncResult> {
  try {
    const ctx = loadContext(opts);
    const report = await ctx.store.update(ctx.config.project, (state) => reconciler(ctx, state).sync());
    return { ok: true, report };
  } catch (e) {
    return failure(e);
  }
}

export type ArchiveResult = CommandResult<{ archived: string[] }>;

/** Archive one merged/closed branch, or all of them, removing their working copies. */
export async function archive(opts: CommonOptions & { branch?: string } = {}): Promise<ArchiveResult> {
  try {
    const ctx = loadContext(opts);
    const archived = await ctx.store.update(ctx.config.project, async (state) => {
      const tracker = branchTracker(ctx, state);
      const targets = opts.branch
        ? [tracker.get(opts.branch)]
        : [...tracker.list({ state: "merged" }), ...tracker.list({ state: "closed" })];
      const owners = Object.fromEntries(Object.values(state.branches).map((b) => [b.name, b.worktree]));

      const names: string[] = [];
      for (const branch of targets) {
        assertTransition(branch.state, "archived", { branch: branch.name, operation: "archive" });
        if (branch.worktree && ctx.deps.worktrees) {
          await ctx.deps.worktrees.remove(branch.name, branch.worktree, owners);
        }
        tracker.archive(branch.name);
        names.push(branch.name);
      }
      return names.sort();
    });
    return { ok: true, archived };
  } catch (e) {
    return failure(e);
  }
}

export type IdeasResult = CommandResult<{ ideas: Issue[] }>;

/** Open idea issues on the code host. */
export async function ideas(opts: CommonOptions & { limit?: number } = {}): Promise<IdeasResult> {
  try {
    const ctx = loadContext(opts);
    if (!ctx.deps.host) {
      return fail("INVALID_ARGS", "No code host configured (hosting.provider is none)", EXIT.INVALID_ARGS);
    }
    const issues = await ctx.deps.host.listIssues({ label: LABELS.idea, state: "open", limit: opts.limit });
    return { ok: true, ideas: issues };
  } catch (e) {
    return failure(e);
  }
}
