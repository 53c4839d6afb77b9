/** Batch: the cohort of branches launched from the same baseline. */
export type BatchStatus = "open" | "reconciling" | "halted" | "merged" | "baselined";

export type Batch = {
  id: string;
  baseline_id: string | null;
  members: string[];
  status: BatchStatus;
  halt_reason: string | null;
  merge_order: string[];
  created_at: string;
  updated_at: string;
};
