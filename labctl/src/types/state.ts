import type { Batch } from "./batch.js";
import type { Baseline, PendingBaseline } from "./baseline.js";
import type { Branch } from "./branch.js";
import type { RegressionReport, RollbackRecord } from "./regression.js";

/** Persisted lab state, stored in {state_dir}/state.json. */
export type LabState = {
  schema_version: 1;
  project: string;
  branches: Record<string, Branch>;
  batches: Batch[];
  baselines: Baseline[];
  active_baseline_id: string | null;
  pending_baseline: PendingBaseline | null;
  regressions: RegressionReport[];
  rollbacks: RollbackRecord[];
  updated_at: string;
};
