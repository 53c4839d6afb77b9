import { byName } from "../verdict/verdict-engine.js";

/** Merge order: win count descending, then branch name in code-point order. */
export function mergeOrder(winners: Array<{ name: string; win_count: number | null }>): string[] {
  return [...winners]
    .sort((a, b) => (b.win_count ?? 0) - (a.win_count ?? 0) || byName(a.name, b.name))
    .map((w) => w.name);
}
