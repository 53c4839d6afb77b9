/** Configuration types: layered config system. */
import type { MetricDirection } from "./comparison.js";

export type TrunkConfig = {
  branch: string;
  repo: string;
};

export type TrackerConfig = {
  runs_dir: string;
};

export type MetricsConfig = {
  /** Metric names or glob patterns; empty means every metric the candidate reports. */
  primary: string[];
  directions: Record<string, MetricDirection>;
};

export type RetryConfig = {
  max_attempts: number;
  base_delay_ms: number;
  max_delay_ms: number;
  factor: number;
  jitter: boolean;
};

export type LifecycleConfig = {
  max_retries: number;
};

export type SmokeConfig = {
  command: string | null;
  junit_report: string | null;
  timeout_ms: number;
};

export type UnknownKeyPolicy = "pass" | "reject";

export type HyperparameterConfig = {
  unknown_keys: UnknownKeyPolicy;
};

export type LockConfig = {
  stale_ms: number;
};

export type ReviewConfig = {
  /** Directory of quality-gate findings; null means {state_dir}/reviews. */
  dir: string | null;
};

export type HostingProvider = "none" | "gh";

export type HostingConfig = {
  provider: HostingProvider;
  /** owner/name passed to the hosting CLI; null uses the current checkout's remote. */
  repo: string | null;
};

export type LabConfig = {
  schema_version: string;
  project: string;
  queue: string | null;
  state_dir: string;
  trunk: TrunkConfig;
  tracker: TrackerConfig;
  metrics: MetricsConfig;
  retry: RetryConfig;
  lifecycle: LifecycleConfig;
  smoke: SmokeConfig;
  hyperparameters: HyperparameterConfig;
  lock: LockConfig;
  review: ReviewConfig;
  hosting: HostingConfig;
};
