import type { HistoryStep, Run, RunFilter } from "../types/run.js";
import type { MetricsTracker } from "./tracker.js";
import { NotFoundError } from "../core/errors.js";
import { DEFAULT_RETRY, withRetry, type RetryOptions } from "./retry.js";

export type LatestRun = {
  run: Run;
  history: HistoryStep[] | null;
};

/**
 * Run Registry Adapter: the read path from the tracking service into labctl
 * entities, plus the idempotent tag/note/cancel writes.
 *
 * Transient failures are retried with bounded backoff; not-found surfaces as
 * null or an empty list; auth failures propagate immediately.
 */
export class RunRegistry {
  constructor(
    private readonly tracker: MetricsTracker,
    private readonly retry: RetryOptions = DEFAULT_RETRY,
    private readonly scope: Pick<RunFilter, "project" | "queue"> = {},
  ) {}

  private call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(operation, fn, this.retry);
  }

  async getRun(runId: string): Promise<Run | null> {
    try {
      return await this.call("get_run", () => this.tracker.getRun(runId));
    } catch (e) {
      if (e instanceof NotFoundError) return null;
      throw e;
    }
  }

  async listRuns(filter: RunFilter = {}): Promise<Run[]> {
    try {
      return await this.call("list_runs", () => this.tracker.listRuns({ ...this.scope, ...filter }));
    } catch (e) {
      if (e instanceof NotFoundError) return [];
      throw e;
    }
  }

  async getHistory(runId: string): Promise<HistoryStep[] | null> {
    try {
      return await this.call("get_history", () => this.tracker.getHistory(runId));
    } catch (e) {
      if (e instanceof NotFoundError) return null;
      throw e;
    }
  }

  /** Most recently created run of `branch`, or null when it has none. */
  async latestForBranch(branch: string, opts: { history?: boolean } = {}): Promise<LatestRun | null> {
    const runs = await this.listRuns({ branch });
    if (runs.length === 0) return null;

    const run = runs.reduce((latest, r) => (r.created_at > latest.created_at ? r : latest));
    const history = opts.history ? await this.getHistory(run.id) : null;
    return { run, history };
  }

  async getLogTail(runId: string, lines: number): Promise<string[]> {
    const getLogTail = this.tracker.getLogTail?.bind(this.tracker);
    if (!getLogTail) return [];
    try {
      return await this.call("get_log_tail", () => getLogTail(runId, lines));
    } catch (e) {
      if (e instanceof NotFoundError) return [];
      throw e;
    }
  }

  tag(runId: string, tag: string): Promise<void> {
    return this.call("set_tag", () => this.tracker.setTag(runId, tag));
  }

  note(runId: string, note: string): Promise<void> {
    return this.call("add_note", () => this.tracker.addNote(runId, note));
  }

  cancel(runId: string): Promise<void> {
    return this.call("cancel", () => this.tracker.cancel(runId));
  }
}
