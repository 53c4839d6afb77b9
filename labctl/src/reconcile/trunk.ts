import type { SmokeConfig } from "../types/config.js";
import type { GitOperations, MergeOutcome } from "../git/operations.js";
import { StateError } from "../core/errors.js";
import { TRUNK_WRITER, checkTrunkWrite } from "../git/branch-guard.js";
import { runSmokeCheck, type ShellRunner, type SmokeResult } from "./smoke.js";

/**
 * The single-writer handle on trunk. Only the reconciler holds one, and only
 * it merges or reverts.
 */
export interface Trunk {
  readonly branch: string;
  readonly workdir: string;
  head(): Promise<string>;
  merge(source: string, message: string): Promise<MergeOutcome>;
  completeMerge(message: string): Promise<string>;
  abortMerge(): Promise<void>;
  revertMerge(commit: string): Promise<string>;
  revertCommit(commit: string): Promise<string>;
  abortRevert(): Promise<void>;
  smokeCheck(): Promise<SmokeResult>;
}

export class GitTrunk implements Trunk {
  constructor(
    private readonly git: GitOperations,
    readonly branch: string,
    private readonly smoke: SmokeConfig,
    private readonly actor: string = TRUNK_WRITER,
    private readonly shell?: ShellRunner,
  ) {}

  get workdir(): string {
    return this.git.repoPath;
  }

  private assertWriter(operation: string): void {
    const guard = checkTrunkWrite(this.branch, this.branch, this.actor);
    if (!guard.allowed) throw new StateError(guard.reason ?? "trunk write denied", { operation });
  }

  head(): Promise<string> {
    return this.git.getCurrentSha(this.branch);
  }

  async merge(source: string, message: string): Promise<MergeOutcome> {
    this.assertWriter("merge");
    return this.git.mergeBranch(source, this.branch, message);
  }

  async completeMerge(message: string): Promise<string> {
    this.assertWriter("merge");
    return this.git.completeMerge(message);
  }

  abortMerge(): Promise<void> {
    return this.git.abortMerge();
  }

  async revertMerge(commit: string): Promise<string> {
    this.assertWriter("revert");
    return this.git.revertMerge(commit);
  }

  async revertCommit(commit: string): Promise<string> {
    this.assertWriter("revert");
    return this.git.revertCommit(commit);
  }

  abortRevert(): Promise<void> {
    return this.git.abortRevert();
  }

  smokeCheck(): Promise<SmokeResult> {
    return runSmokeCheck(this.smoke, this.workdir, this.shell);
  }
}
