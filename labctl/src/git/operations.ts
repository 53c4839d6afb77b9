import fs from "node:fs";
import path from "node:path";
import { GitResponseError, simpleGit, type SimpleGit } from "simple-git";

export type MergeOutcome =
  | { status: "merged"; commit: string }
  | { status: "conflict"; files: string[]; message: string };

/**
 * Trunk and worktree git operations over simple-git.
 */
export class GitOperations {
  private git: SimpleGit;

  constructor(readonly repoPath: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(repoPath);
  }

  /** Get HEAD SHA of a ref (defaults to current HEAD). */
  async getCurrentSha(ref = "HEAD"): Promise<string> {
    const result = await this.git.revparse([ref]);
    return result.trim();
  }

  async branchExists(name: string): Promise<boolean> {
    const branches = await this.git.branchLocal();
    return branches.all.includes(name);
  }

  /**
   * Merge `source` into `target` with a merge commit. A textual conflict is
   * returned, not thrown, and leaves the merge in progress for a resolver.
   */
  async mergeBranch(source: string, target: string, message: string): Promise<MergeOutcome> {
    await this.git.checkout(target);
    try {
      await this.git.merge([source, "--no-ff", "-m", message]);
    } catch (e) {
      if (!(e instanceof GitResponseError)) throw e;
      const files = await this.conflictedFiles();
      if (files.length === 0) throw e;
      return { status: "conflict", files, message: e.message };
    }
    return { status: "merged", commit: await this.getCurrentSha() };
  }

  async conflictedFiles(): Promise<string[]> {
    const status = await this.git.status();
    return [...status.conflicted].sort();
  }

  async abortMerge(): Promise<void> {
    await this.git.merge(["--abort"]);
  }

  /** Conclude an in-progress merge after its conflicts were resolved in the working tree. */
  async completeMerge(message: string): Promise<string> {
    await this.git.add(["-A"]);
    await this.git.commit(message);
    return this.getCurrentSha();
  }

  /** Revert a merge commit against its first parent; history is kept. */
  async revertMerge(sha: string): Promise<string> {
    await this.git.raw(["revert", "-m", "1", "--no-edit", sha]);
    return this.getCurrentSha();
  }

  async revertCommit(sha: string): Promise<string> {
    await this.git.raw(["revert", "--no-edit", sha]);
    return this.getCurrentSha();
  }

  async revertInProgress(): Promise<boolean> {
    const marker = (await this.git.raw(["rev-parse", "--git-path", "REVERT_HEAD"])).trim();
    return fs.existsSync(path.resolve(this.repoPath, marker));
  }

  /** Abandon a revert stopped part way; nothing to do when none is in progress. */
  async abortRevert(): Promise<void> {
    if (await this.revertInProgress()) await this.git.raw(["revert", "--abort"]);
  }

  /** Check out `branch` into `dir`, creating the branch from `base` when it does not exist. */
  async addWorktree(dir: string, branch: string, base: string): Promise<void> {
    if (await this.branchExists(branch)) {
      await this.git.raw(["worktree", "add", dir, branch]);
    } else {
      await this.git.raw(["worktree", "add", "-b", branch, dir, base]);
    }
  }

  async removeWorktree(dir: string): Promise<void> {
    await this.git.raw(["worktree", "remove", "--force", dir]);
  }

  async deleteBranch(name: string): Promise<void> {
    await this.git.deleteLocalBranch(name, true);
  }
}
