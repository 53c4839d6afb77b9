export type * from "./types/run.js";
export type * from "./types/branch.js";
export type * from "./types/baseline.js";
export type * from "./types/batch.js";
export type * from "./types/comparison.js";
export type * from "./types/config.js";
export type * from "./types/regression.js";
export type * from "./types/review.js";
export type * from "./types/state.js";
export { LIFECYCLE_STATES, VERDICTS } from "./types/branch.js";
export { RUN_STATES, isTerminalRunState } from "./types/run.js";

export * from "./core/errors.js";
export { createLogger } from "./logging/logger.js";
export { loadConfig, loadRawConfig, deepMerge } from "./config/loader.js";
export { validateConfig } from "./config/validator.js";
export { checkHyperparameters } from "./config/hyperparameters.js";

export type { MetricsTracker } from "./registry/tracker.js";
export { FileMetricsTracker } from "./registry/file-tracker.js";
export { RunRegistry } from "./registry/run-registry.js";
export { withRetry } from "./registry/retry.js";

export { compareMetrics, selectMetrics } from "./compare/comparator.js";
export { classifyDirection } from "./compare/direction.js";
export { computeWinCounts, type Contender } from "./compare/win-count.js";
export { renderVerdict, rankBatch, type RenderedVerdict, type VerdictOutcome, type BatchRanking } from "./verdict/verdict-engine.js";

export { TRANSITIONS, canTransition, assertTransition, isBatchReady } from "./lifecycle/state-machine.js";
export { BranchTracker } from "./lifecycle/branch-tracker.js";
export { openBatch, currentBatch, batchGate } from "./lifecycle/batches.js";
export { StateStore, emptyState } from "./store/state-store.js";

export { BaselineReconciler, type ReconcileResult, type SyncReport } from "./reconcile/reconciler.js";
export type { Trunk } from "./reconcile/trunk.js";
export { GitTrunk } from "./reconcile/trunk.js";
export type { Reviewer } from "./reconcile/reviewer.js";
export { FileReviewer } from "./reconcile/reviewer.js";
export type { ConflictResolver, ConflictRequest, ConflictResolution } from "./reconcile/resolver.js";
export { OperatorResolver } from "./reconcile/resolver.js";
export type { ReviewHost } from "./hosting/review-host.js";
export { GhReviewHost } from "./hosting/gh-host.js";
export { EXIT } from "./commands/exit-codes.js";
