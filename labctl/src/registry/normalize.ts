import type { HistoryStep, Run, RunState, Scalar } from "../types/run.js";
import { InvalidRunRecordError } from "../core/errors.js";

/** A run as exported by the tracking service, before normalization. */
export type RunRecord = {
  id: string;
  name?: string;
  state: string;
  branch?: string | null;
  project?: string;
  queue?: string | null;
  summary?: Record<string, unknown>;
  config?: Record<string, Scalar>;
  created_at: string;
  finished_at?: string | null;
  tags?: string[];
  notes?: string[];
  history?: Array<Record<string, unknown>>;
};

const STATE_ALIASES: Record<string, RunState> = {
  queued: "queued",
  pending: "queued",
  preempting: "queued",
  preempted: "queued",
  running: "running",
  finished: "finished",
  failed: "failed",
  crashed: "crashed",
  killed: "cancelled",
  stopped: "cancelled",
  cancelled: "cancelled",
  canceled: "cancelled",
};

export function normalizeRunState(raw: string, runId?: string): RunState {
  const key = raw.trim().toLowerCase();
  const state = Object.hasOwn(STATE_ALIASES, key) ? STATE_ALIASES[key] : undefined;
  if (!state) {
    throw new InvalidRunRecordError(`Unknown run state: '${raw}'`, runId === undefined ? {} : { runId });
  }
  return state;
}

/**
 * Keep only numeric metrics. Keys starting with "_" are service bookkeeping
 * (_step, _runtime, _timestamp) and are dropped, as are NaN and infinities.
 */
export function numericMetrics(values: Record<string, unknown>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith("_")) continue;
    if (typeof value !== "number" || !Number.isFinite(value)) continue;
    out[key] = value;
  }
  return out;
}

export function normalizeHistory(rows: Array<Record<string, unknown>>): HistoryStep[] {
  return rows
    .map((row, index) => {
      const step = typeof row._step === "number" ? row._step : index;
      return { step, values: numericMetrics(row) };
    })
    .sort((a, b) => a.step - b.step);
}

export function normalizeRun(record: RunRecord): Run {
  const config = record.config ?? {};
  const branch = typeof config.branch === "string" ? config.branch : record.branch ?? null;
  const commit = typeof config.commit === "string" ? config.commit : null;

  const run: Run = {
    id: record.id,
    name: record.name ?? record.id,
    branch,
    commit,
    state: normalizeRunState(record.state, record.id),
    summary: numericMetrics(record.summary ?? {}),
    config,
    created_at: record.created_at,
    finished_at: record.finished_at ?? null,
    tags: [...(record.tags ?? [])],
    notes: [...(record.notes ?? [])],
  };
  if (record.history) run.history = normalizeHistory(record.history);
  return run;
}
