import type { UnknownKeyPolicy } from "../types/config.js";
import type { Scalar } from "../types/run.js";
import { createRegistry } from "../schema/registry.js";

export type HyperparameterCheck = {
  params: Record<string, Scalar>;
  unknown: string[];
  errors: string[];
};

/** Keys declared in schemas/hyperparameters.schema.json. */
export function recognizedHyperparameters(): string[] {
  const entry = createRegistry().get("hyperparameters");
  const properties = entry?.schema.properties;
  if (properties === null || typeof properties !== "object") return [];
  return Object.keys(properties).sort();
}

/**
 * Check a run's hyperparameters against the recognized keys.
 * Unknown keys are kept and listed under "pass", dropped and reported under "reject".
 */
export function checkHyperparameters(config: Record<string, Scalar>, policy: UnknownKeyPolicy): HyperparameterCheck {
  const recognized = new Set(recognizedHyperparameters());
  const unknown = Object.keys(config).filter((k) => !recognized.has(k)).sort();
  const errors: string[] = [];

  const check = createRegistry().validate("hyperparameters", config);
  if (!check.valid && check.errors) errors.push(check.errors);

  let params = config;
  if (policy === "reject" && unknown.length > 0) {
    params = Object.fromEntries(Object.entries(config).filter(([k]) => recognized.has(k)));
    for (const key of unknown) errors.push(`unrecognized hyperparameter: ${key}`);
  }

  return { params, unknown, errors };
}
