import path from "node:path";
import type { LabConfig } from "../types/config.js";
import type { LabState } from "../types/state.js";
import type { MetricsTracker } from "../registry/tracker.js";
import type { ReviewHost } from "../hosting/review-host.js";
import type { Reviewer } from "../reconcile/reviewer.js";
import type { ConflictResolver } from "../reconcile/resolver.js";
import type { Trunk } from "../reconcile/trunk.js";
import { loadConfig } from "../config/loader.js";
import { FileMetricsTracker } from "../registry/file-tracker.js";
import { RunRegistry } from "../registry/run-registry.js";
import { retryOptionsFromConfig, type RetryOptions } from "../registry/retry.js";
import { StateStore } from "../store/state-store.js";
import { BranchTracker } from "../lifecycle/branch-tracker.js";
import { GhReviewHost } from "../hosting/gh-host.js";
import { FileReviewer } from "../reconcile/reviewer.js";
import { OperatorResolver } from "../reconcile/resolver.js";
import { GitTrunk } from "../reconcile/trunk.js";
import { BaselineReconciler } from "../reconcile/reconciler.js";
import { GitOperations } from "../git/operations.js";
import { WorktreeManager } from "../git/worktrees.js";

/** Options every command accepts. */
export type CommonOptions = {
  configDir?: string;
  env?: string;
  project?: string;
  queue?: string;
  /** Base for relative paths in the config; defaults to the process cwd. */
  cwd?: string;
  /** Collaborators to use instead of the configured ones. */
  deps?: Partial<LabDeps>;
};

export type LabDeps = {
  tracker: MetricsTracker;
  host: ReviewHost | null;
  reviewer: Reviewer;
  resolver: ConflictResolver;
  trunk: Trunk;
  worktrees: WorktreeManager | null;
  retry: RetryOptions;
  now: () => Date;
};

export type LabContext = {
  config: LabConfig;
  stateDir: string;
  repoDir: string;
  registry: RunRegistry;
  store: StateStore;
  deps: LabDeps;
};

export function loadContext(opts: CommonOptions = {}, env: NodeJS.ProcessEnv = process.env): LabContext {
  const loaded = loadConfig(opts.env, opts.configDir, env);
  const config: LabConfig = {
    ...loaded,
    project: opts.project ?? loaded.project,
    queue: opts.queue ?? loaded.queue,
  };

  const cwd = opts.cwd ?? process.cwd();
  const stateDir = path.resolve(cwd, config.state_dir);
  const repoDir = path.resolve(cwd, config.trunk.repo);
  const retry = opts.deps?.retry ?? retryOptionsFromConfig(config.retry);
  const git = new GitOperations(repoDir);

  const deps: LabDeps = {
    tracker: opts.deps?.tracker ?? new FileMetricsTracker(path.resolve(cwd, config.tracker.runs_dir)),
    host:
      opts.deps?.host !== undefined
        ? opts.deps.host
        : config.hosting.provider === "gh"
          ? new GhReviewHost({ repo: config.hosting.repo, cwd: repoDir, retry })
          : null,
    reviewer: opts.deps?.reviewer ?? new FileReviewer(path.resolve(cwd, config.review.dir ?? path.join(stateDir, "reviews"))),
    resolver: opts.deps?.resolver ?? new OperatorResolver(),
    trunk: opts.deps?.trunk ?? new GitTrunk(git, config.trunk.branch, config.smoke),
    worktrees:
      opts.deps?.worktrees !== undefined ? opts.deps.worktrees : new WorktreeManager(git, path.join(stateDir, "worktrees")),
    retry,
    now: opts.deps?.now ?? (() => new Date()),
  };

  const scope = { project: config.project, ...(config.queue ? { queue: config.queue } : {}) };
  return {
    config,
    stateDir,
    repoDir,
    registry: new RunRegistry(deps.tracker, retry, scope),
    store: new StateStore(stateDir, { staleLockMs: config.lock.stale_ms }),
    deps,
  };
}

export function branchTracker(ctx: LabContext, state: LabState): BranchTracker {
  return new BranchTracker(state, { maxRetries: ctx.config.lifecycle.max_retries, now: ctx.deps.now });
}

export function reconciler(ctx: LabContext, state: LabState): BaselineReconciler {
  return new BaselineReconciler({
    state,
    branches: branchTracker(ctx, state),
    registry: ctx.registry,
    reviewer: ctx.deps.reviewer,
    metrics: ctx.config.metrics,
    trunk: ctx.deps.trunk,
    resolver: ctx.deps.resolver,
    host: ctx.deps.host ?? undefined,
    now: ctx.deps.now,
  });
}
