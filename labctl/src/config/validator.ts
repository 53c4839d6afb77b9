import { createRegistry } from "../schema/registry.js";
import type { LabConfig } from "../types/config.js";

export type ConfigValidationResult =
  | { valid: true; config: LabConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a merged config against schemas/config.schema.json. */
export function validateConfig(config: unknown): ConfigValidationResult {
  const registry = createRegistry();
  if (registry.is<LabConfig>("config", config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: registry.validate("config", config).errors ?? "invalid config" };
}
