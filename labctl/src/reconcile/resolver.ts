export type ConflictRequest = {
  branch: string;
  files: string[];
  /** Working tree holding the in-progress merge. */
  workdir: string;
};

export type ConflictResolution =
  | { status: "resolved" }
  | { status: "incompatible"; reason: string }
  | { status: "unresolved"; reason: string };

/**
 * Integrates both sides of a textual merge conflict, or reports that the two
 * changes cannot both hold. Must never drop one side to make the merge clean.
 */
export interface ConflictResolver {
  resolve(request: ConflictRequest): Promise<ConflictResolution>;
}

/** Leaves every conflict to an operator. */
export class OperatorResolver implements ConflictResolver {
  async resolve(request: ConflictRequest): Promise<ConflictResolution> {
    return {
      status: "unresolved",
      reason: `${request.files.length} conflicting file(s) need an operator: ${request.files.join(", ")}`,
    };
  }
}
