import type { Batch } from "../types/batch.js";
import type { LabState } from "../types/state.js";
import { NotFoundError } from "../core/errors.js";
import { isBatchReady } from "./state-machine.js";

export type BatchGate = {
  ready: boolean;
  /** Members still short of a batch-ready state, in join order. */
  pending: string[];
};

function nextBatchId(state: LabState): string {
  return `batch-${String(state.batches.length + 1).padStart(3, "0")}`;
}

/** The batch new and returned branches join: open, on the active baseline. Created on demand. */
export function openBatch(state: LabState, now: string): Batch {
  const existing = state.batches.find((b) => b.status === "open" && b.baseline_id === state.active_baseline_id);
  if (existing) return existing;

  const batch: Batch = {
    id: nextBatchId(state),
    baseline_id: state.active_baseline_id,
    members: [],
    status: "open",
    halt_reason: null,
    merge_order: [],
    created_at: now,
    updated_at: now,
  };
  state.batches.push(batch);
  return batch;
}

export function getBatch(state: LabState, batchId: string): Batch {
  const batch = state.batches.find((b) => b.id === batchId);
  if (!batch) throw new NotFoundError(`Batch not found: ${batchId}`, { batchId });
  return batch;
}

/** Oldest batch that still has members to reconcile, or null. */
export function currentBatch(state: LabState): Batch | null {
  return (
    state.batches.find(
      (b) => b.members.length > 0 && (b.status === "open" || b.status === "reconciling" || b.status === "halted"),
    ) ?? null
  );
}

/**
 * Barrier over member states. An empty batch is never ready: there is nothing
 * to rank.
 */
export function batchGate(state: LabState, batch: Batch): BatchGate {
  const pending = batch.members.filter((name) => {
    const branch = state.branches[name];
    return !branch || !isBatchReady(branch.state);
  });
  return { ready: batch.members.length > 0 && pending.length === 0, pending };
}

/**
 * Point open batches at a new baseline when none of their members has launched
 * yet; launched members keep comparing against the baseline they started from.
 */
export function rebaseOpenBatches(state: LabState, baselineId: string, now: string): string[] {
  const rebased: string[] = [];
  for (const batch of state.batches) {
    if (batch.status !== "open" || batch.baseline_id === baselineId) continue;
    const launched = batch.members.some((name) => {
      const s = state.branches[name]?.state;
      return s !== undefined && s !== "proposed" && s !== "implementing";
    });
    if (launched) continue;
    batch.baseline_id = baselineId;
    batch.updated_at = now;
    rebased.push(batch.id);
  }
  return rebased;
}
