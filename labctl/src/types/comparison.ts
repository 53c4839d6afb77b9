export type MetricDirection = "lower" | "higher";

export type MetricDelta = {
  metric: string;
  candidate: number;
  baseline: number;
  delta: number;
  direction: MetricDirection;
  /** Direction-adjusted sign: 1 better, -1 worse, 0 equal. */
  sign: 1 | -1 | 0;
  improved: boolean;
};

export type ExclusionReason = "missing_in_candidate" | "missing_in_baseline";

export type ExcludedMetric = {
  metric: string;
  reason: ExclusionReason;
};

export type ComparisonResult = {
  deltas: MetricDelta[];
  excluded: ExcludedMetric[];
};
