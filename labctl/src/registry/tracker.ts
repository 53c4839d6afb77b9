import type { HistoryStep, Run, RunFilter } from "../types/run.js";

/**
 * The metrics-tracking service, seen from labctl.
 *
 * Implementations throw NotFoundError, TransientServiceError or AuthError so the
 * registry can tell "absent" from "try again" from "give up". Writes must be
 * idempotent: tagging a run twice is a no-op.
 */
export interface MetricsTracker {
  getRun(runId: string): Promise<Run>;
  listRuns(filter: RunFilter): Promise<Run[]>;
  getHistory(runId: string): Promise<HistoryStep[]>;
  setTag(runId: string, tag: string): Promise<void>;
  addNote(runId: string, note: string): Promise<void>;
  cancel(runId: string): Promise<void>;
  delete(runId: string, deleteArtifacts?: boolean): Promise<void>;
  /** Last lines of the run's console output, when the service keeps it. */
  getLogTail?(runId: string, lines: number): Promise<string[]>;
}
