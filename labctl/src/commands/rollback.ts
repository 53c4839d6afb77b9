import type { RollbackRecord } from "../types/regression.js";
import { loadContext, reconciler, type CommonOptions } from "./context.js";
import { failure, type CommandResult } from "./result.js";

export type RollbackResult = CommandResult<{ rollback: RollbackRecord }>;

/** Revert the active baseline's merges on trunk and reactivate the previous baseline. */
export async function rollback(opts: CommonOptions = {}): Promise<RollbackResult> {
  try {
    const ctx = loadContext(opts);
    const record = await ctx.store.update(ctx.config.project, (state) => reconciler(ctx, state).rollback());
    return { ok: true, rollback: record };
  } catch (e) {
    return failure(e);
  }
}

/** Revert the latest rollback's reverts. */
export async function undoRollback(opts: CommonOptions = {}): Promise<RollbackResult> {
  try {
    const ctx = loadContext(opts);
    const record = await ctx.store.update(ctx.config.project, (state) => reconciler(ctx, state).undoRollback());
    return { ok: true, rollback: record };
  } catch (e) {
    return failure(e);
  }
}
