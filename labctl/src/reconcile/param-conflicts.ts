import type { Scalar } from "../types/run.js";
import { byName } from "../verdict/verdict-engine.js";

/** Run-config keys that identify the run rather than configure it. */
const IDENTITY_KEYS = new Set(["branch", "commit"]);

export type ParameterConflict = {
  key: string;
  baseline: Scalar | undefined;
  changes: Array<{ branch: string; value: Scalar }>;
};

/** Hyperparameters whose value differs from the baseline's. */
export function changedParameters(
  config: Record<string, Scalar>,
  baseline: Record<string, Scalar>,
): Record<string, Scalar> {
  const changed: Record<string, Scalar> = {};
  for (const [key, value] of Object.entries(config)) {
    if (IDENTITY_KEYS.has(key)) continue;
    if (Object.hasOwn(baseline, key) && baseline[key] === value) continue;
    changed[key] = value;
  }
  return changed;
}

/**
 * Keys that two or more winners move away from the baseline to different
 * values. Winners that agree on a value do not conflict.
 */
export function findParameterConflicts(
  winners: Array<{ name: string; config: Record<string, Scalar> }>,
  baseline: Record<string, Scalar>,
): ParameterConflict[] {
  const byKey = new Map<string, Array<{ branch: string; value: Scalar }>>();
  for (const w of winners) {
    for (const [key, value] of Object.entries(changedParameters(w.config, baseline))) {
      const list = byKey.get(key) ?? [];
      list.push({ branch: w.name, value });
      byKey.set(key, list);
    }
  }

  const conflicts: ParameterConflict[] = [];
  for (const [key, changes] of byKey) {
    if (changes.length < 2) continue;
    if (new Set(changes.map((c) => c.value)).size < 2) continue;
    conflicts.push({
      key,
      baseline: Object.hasOwn(baseline, key) ? baseline[key] : undefined,
      changes: [...changes].sort((a, b) => byName(a.branch, b.branch)),
    });
  }
  return conflicts.sort((a, b) => byName(a.key, b.key));
}
