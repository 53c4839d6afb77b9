/** Run: one execution record of a branch's code, normalized from the tracking service. */
export const RUN_STATES = ["queued", "running", "finished", "failed", "crashed", "cancelled"] as const;

export type RunState = (typeof RUN_STATES)[number];

export type Scalar = string | number | boolean | null;

export type HistoryStep = {
  step: number;
  values: Record<string, number>;
};

export type Run = {
  id: string;
  name: string;
  branch: string | null;
  commit: string | null;
  state: RunState;
  summary: Record<string, number>;
  config: Record<string, Scalar>;
  created_at: string;
  finished_at: string | null;
  tags: string[];
  notes: string[];
  history?: HistoryStep[];
};

export type RunFilter = {
  project?: string;
  queue?: string;
  branch?: string;
  state?: RunState;
};

const TERMINAL_RUN_STATES: ReadonlySet<RunState> = new Set(["finished", "failed", "crashed", "cancelled"]);

export function isTerminalRunState(state: RunState): boolean {
  return TERMINAL_RUN_STATES.has(state);
}
