/** Branch: an independently evaluated unit of experimental change. */
export const LIFECYCLE_STATES = [
  "proposed",
  "implementing",
  "launched",
  "running",
  "finished",
  "failed",
  "crashed",
  "cancelled",
  "evaluated",
  "winner-pending-review",
  "loser",
  "merged",
  "closed",
  "archived",
] as const;

export type LifecycleState = (typeof LIFECYCLE_STATES)[number];

export const VERDICTS = ["winner", "loser", "inconclusive", "unevaluated"] as const;

export type Verdict = (typeof VERDICTS)[number];

export type OperatorDecision = "merge" | "fix" | "close";

export type TransitionRecord = {
  from: LifecycleState;
  to: LifecycleState;
  at: string;
  reason: string;
};

export type Branch = {
  name: string;
  idea: string | null;
  batch_id: string;
  state: LifecycleState;
  verdict: Verdict;
  run_id: string | null;
  superseded_runs: string[];
  retry_count: number;
  review_request: string | null;
  worktree: string | null;
  win_count: number | null;
  hold: string | null;
  decision: OperatorDecision | null;
  merge_commit: string | null;
  diagnoses: string[];
  transitions: TransitionRecord[];
  created_at: string;
  updated_at: string;
};
