import path from "node:path";
import { StateError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import type { GitOperations } from "./operations.js";
import { branchActor, checkWorktreeAccess } from "./branch-guard.js";

const log = createLogger("worktrees");

/** Per-branch working copies under {stateDir}/worktrees/{branch}. */
export class WorktreeManager {
  constructor(
    private readonly git: GitOperations,
    private readonly rootDir: string,
  ) {}

  pathFor(branch: string): string {
    return path.join(this.rootDir, branch);
  }

  async create(branch: string, base: string): Promise<string> {
    const dir = this.pathFor(branch);
    await this.git.addWorktree(dir, branch, base);
    log.info({ branch, dir }, "worktree created");
    return dir;
  }

  /** Remove a branch's working copy and its branch ref. Only the owning workflow may do so. */
  async remove(branch: string, worktree: string, owners: Record<string, string | null>): Promise<void> {
    const guard = checkWorktreeAccess(branchActor(branch), worktree, owners);
    if (!guard.allowed) {
      throw new StateError(guard.reason ?? `Access to ${worktree} denied`, { branch, operation: "archive" });
    }
    await this.git.removeWorktree(worktree);
    if (await this.git.branchExists(branch)) await this.git.deleteBranch(branch);
    log.info({ branch, dir: worktree }, "worktree removed");
  }
}
