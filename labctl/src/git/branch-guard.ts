/**
 * Branch guard: enforces who may write where.
 *
 * Rules:
 * 1. Only the reconciler actor may write to trunk
 * 2. A branch workflow may only touch its own working copy
 * 3. Branch names must be valid git ref names
 */

export type BranchGuardResult = {
  allowed: boolean;
  reason?: string;
};

export const TRUNK_WRITER = "reconciler";

/** Actor name of the implementation/fix workflow that owns `branch`. */
export function branchActor(branch: string): string {
  return `branch:${branch}`;
}

/** Check if `actor` may merge or revert on `target`. */
export function checkTrunkWrite(target: string, trunk: string, actor: string): BranchGuardResult {
  if (target === trunk && actor.toLowerCase() !== TRUNK_WRITER) {
    return {
      allowed: false,
      reason: `Actor '${actor}' is not allowed to write to '${trunk}'. Only '${TRUNK_WRITER}' may do so.`,
    };
  }
  if (target !== trunk && actor.toLowerCase() === TRUNK_WRITER) {
    return {
      allowed: false,
      reason: `The reconciler only writes '${trunk}', not '${target}'.`,
    };
  }
  return { allowed: true };
}

/**
 * Check if `actor` may modify the working copy at `worktree`.
 * `owners` maps each branch to its worktree path.
 */
export function checkWorktreeAccess(
  actor: string,
  worktree: string,
  owners: Record<string, string | null>,
): BranchGuardResult {
  const owner = Object.entries(owners).find(([, dir]) => dir === worktree)?.[0];
  if (owner === undefined) {
    return { allowed: false, reason: `No branch owns working copy '${worktree}'.` };
  }
  if (actor !== branchActor(owner)) {
    return {
      allowed: false,
      reason: `Working copy '${worktree}' belongs to '${owner}'; '${actor}' may not touch it.`,
    };
  }
  return { allowed: true };
}

// Space, control characters and the characters git reserves for revision syntax.
const FORBIDDEN_REF_CHARS = /[\x00-\x20\x7f~^:?*[\\]/;

function refNameProblem(name: string): string | null {
  if (name === "" || name === "@") return "not a branch name";
  if (name.startsWith("-")) return "starts with '-'";
  if (FORBIDDEN_REF_CHARS.test(name)) return "contains a space, control character or one of ~^:?*[\\";
  if (name.includes("..")) return "contains '..'";
  if (name.includes("@{")) return "contains '@{'";
  if (name.endsWith(".")) return "ends with '.'";
  for (const part of name.split("/")) {
    if (part === "") return "has an empty path component";
    if (part.startsWith(".")) return `component '${part}' starts with '.'`;
    if (part.endsWith(".lock")) return `component '${part}' ends with '.lock'`;
  }
  return null;
}

/** Check that `name` can be used as a git branch and a working copy directory. */
export function checkBranchName(name: string): BranchGuardResult {
  const problem = refNameProblem(name);
  if (problem) return { allowed: false, reason: `Invalid branch name '${name}': ${problem}` };
  return { allowed: true };
}
