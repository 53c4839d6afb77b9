import fs from "node:fs/promises";
import path from "node:path";
import type { Branch } from "../types/branch.js";
import type { Finding, GateOutcome } from "../types/review.js";
import { StateError, errorMessage } from "../core/errors.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";

/**
 * Independent review pass over a pending winner. Resolves to null while the
 * review has not run yet.
 */
export interface Reviewer {
  review(branch: Branch): Promise<Finding[] | null>;
}

/** Reads findings written by the review pass to {dir}/{branch}.json. */
export class FileReviewer implements Reviewer {
  private readonly schemas: SchemaRegistry;

  constructor(
    private readonly dir: string,
    schemas?: SchemaRegistry,
  ) {
    this.schemas = schemas ?? createRegistry();
  }

  pathFor(branch: string): string {
    return path.join(this.dir, `${branch}.json`);
  }

  async review(branch: Branch): Promise<Finding[] | null> {
    const file = this.pathFor(branch.name);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
      throw new StateError(`Failed to read review ${file}: ${errorMessage(e)}`, { branch: branch.name, cause: e });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (e) {
      throw new StateError(`Review ${file} is not valid JSON`, { branch: branch.name, cause: e });
    }
    if (!this.schemas.is<Finding[]>("findings", data)) {
      const { errors } = this.schemas.validate("findings", data);
      throw new StateError(`Review ${file} does not match schema: ${errors}`, { branch: branch.name });
    }
    return data;
  }
}

export function gateOutcome(findings: Finding[] | null): GateOutcome {
  if (findings === null) return { status: "missing", findings: [] };
  return findings.some((f) => f.severity === "blocker")
    ? { status: "blocked", findings }
    : { status: "passed", findings };
}
