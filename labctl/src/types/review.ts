/** Quality-gate findings raised by the independent review pass. */
export type FindingSeverity = "blocker" | "warning" | "nit";

export type Finding = {
  severity: FindingSeverity;
  message: string;
  file?: string;
};

export type GateOutcome =
  | { status: "passed"; findings: Finding[] }
  | { status: "blocked"; findings: Finding[] }
  | { status: "missing"; findings: [] };
