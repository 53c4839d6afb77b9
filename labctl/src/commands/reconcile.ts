import type { ReconcileResult } from "../reconcile/reconciler.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { loadContext, reconciler, type CommonOptions } from "./context.js";
import { failure, type CommandResult } from "./result.js";

export type ReconcileCommandResult = CommandResult<{ result: ReconcileResult; exitCode: ExitCode }>;

/** waiting and held batches exit BATCH_NOT_READY; a merged or no-winners batch is a success. */
export function reconcileExitCode(result: ReconcileResult): ExitCode {
  return result.status === "waiting" || result.status === "held" ? EXIT.BATCH_NOT_READY : EXIT.SUCCESS;
}

/**
 * Reconcile a batch: rank, quality gate, conflict check and sequential merges.
 * Halts are persisted before the error is reported, so re-running resumes.
 */
export async function reconcile(opts: CommonOptions & { batch?: string } = {}): Promise<ReconcileCommandResult> {
  try {
    const ctx = loadContext(opts);
    const result = await ctx.store.update(ctx.config.project, (state) => reconciler(ctx, state).reconcile(opts.batch));
    return { ok: true, result, exitCode: reconcileExitCode(result) };
  } catch (e) {
    return failure(e);
  }
}
