import { minimatch } from "minimatch";
import type { MetricDirection } from "../types/comparison.js";

/** Name fragments that mark a metric as lower-is-better. */
export const LOWER_IS_BETTER_TOKENS = ["loss", "error", "perplexity", "mse", "mae", "rmse"] as const;

/** Caller-supplied directions, keyed by exact metric name or glob pattern. */
export type DirectionOverrides = Record<string, MetricDirection>;

const GLOB_CHARS = /[*?[\]{}!]/;

export function isMetricPattern(entry: string): boolean {
  return GLOB_CHARS.test(entry);
}

/** Match a metric name against an exact name or a glob ("final/*", "**\/*loss"). */
export function matchesMetric(metric: string, entry: string): boolean {
  return isMetricPattern(entry) ? minimatch(metric, entry) : metric === entry;
}

/**
 * Direction of a metric. Explicit overrides win (exact names before patterns);
 * otherwise lower-is-better iff the name contains one of LOWER_IS_BETTER_TOKENS.
 */
export function classifyDirection(metric: string, overrides: DirectionOverrides = {}): MetricDirection {
  const exact = Object.hasOwn(overrides, metric) ? overrides[metric] : undefined;
  if (exact) return exact;

  for (const [pattern, direction] of Object.entries(overrides)) {
    if (isMetricPattern(pattern) && minimatch(metric, pattern)) return direction;
  }

  const lower = metric.toLowerCase();
  return LOWER_IS_BETTER_TOKENS.some((token) => lower.includes(token)) ? "lower" : "higher";
}

/** Whether `value` beats `reference` for a metric with this direction. */
export function isBetter(value: number, reference: number, direction: MetricDirection): boolean {
  return direction === "lower" ? value < reference : value > reference;
}
