import type { ComparisonResult, ExcludedMetric, MetricDelta } from "../types/comparison.js";
import { classifyDirection, isMetricPattern, matchesMetric, type DirectionOverrides } from "./direction.js";

export type CompareOptions = {
  /** Metric names or glob patterns; omitted or empty means every metric the candidate reports. */
  metrics?: string[];
  directions?: DirectionOverrides;
};

export type MetricSelection = {
  metrics: string[];
  /** Requested entries that matched nothing in the candidate. */
  unmatched: string[];
};

/** Float noise below this is dropped from deltas so equal values compare as equal. */
const DELTA_PRECISION = 1e12;

export function roundDelta(delta: number): number {
  return Math.round(delta * DELTA_PRECISION) / DELTA_PRECISION;
}

/**
 * Resolve the metrics to compare. Patterns expand against the candidate's keys
 * in name order; exact names are kept even when the candidate lacks them so the
 * comparison can report them as excluded.
 */
export function selectMetrics(candidate: Record<string, number>, requested?: string[]): MetricSelection {
  const available = Object.keys(candidate)
    .filter((k) => Number.isFinite(candidate[k]))
    .sort();

  if (!requested || requested.length === 0) {
    return { metrics: available, unmatched: [] };
  }

  const metrics: string[] = [];
  const unmatched: string[] = [];
  const seen = new Set<string>();
  const add = (m: string): void => {
    if (seen.has(m)) return;
    seen.add(m);
    metrics.push(m);
  };

  for (const entry of requested) {
    if (!isMetricPattern(entry)) {
      add(entry);
      continue;
    }
    const matched = available.filter((m) => matchesMetric(m, entry));
    if (matched.length === 0) unmatched.push(entry);
    matched.forEach(add);
  }

  return { metrics, unmatched };
}

/**
 * Compare a candidate's metrics with the baseline's.
 *
 * delta = candidate - baseline; `improved` is delta < 0 for lower-is-better
 * metrics and delta > 0 otherwise. A metric missing on either side is listed in
 * `excluded` instead of failing the comparison. Pure and deterministic.
 */
export function compareMetrics(
  candidate: Record<string, number>,
  baseline: Record<string, number>,
  opts: CompareOptions = {},
): ComparisonResult {
  const { metrics, unmatched } = selectMetrics(candidate, opts.metrics);
  const deltas: MetricDelta[] = [];
  const excluded: ExcludedMetric[] = unmatched.map((metric) => ({ metric, reason: "missing_in_candidate" }));

  for (const metric of metrics) {
    const c = candidate[metric];
    const b = baseline[metric];
    if (typeof c !== "number" || !Number.isFinite(c)) {
      excluded.push({ metric, reason: "missing_in_candidate" });
      continue;
    }
    if (typeof b !== "number" || !Number.isFinite(b)) {
      excluded.push({ metric, reason: "missing_in_baseline" });
      continue;
    }

    const direction = classifyDirection(metric, opts.directions);
    const delta = roundDelta(c - b);
    const improved = direction === "lower" ? delta < 0 : delta > 0;
    const sign = delta === 0 ? 0 : improved ? 1 : -1;
    deltas.push({ metric, candidate: c, baseline: b, delta, direction, sign, improved });
  }

  return { deltas, excluded };
}
