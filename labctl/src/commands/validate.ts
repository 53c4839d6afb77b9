import fs from "node:fs";
import path from "node:path";
import { ConfigError, errorMessage } from "../core/errors.js";
import { CONFIG_DIR, loadRawConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { createRegistry } from "../schema/registry.js";
import { EXIT } from "./exit-codes.js";
import type { CommonOptions } from "./context.js";
import type { CommandResult } from "./result.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

export type ValidateResult = CommandResult<{ checked: string[]; diagnostics: Diagnostic[] }>;

function diag(level: Diagnostic["level"], code: string, message: string, file?: string): Diagnostic {
  return file ? { level, code, message, path: file } : { level, code, message };
}

function listEnvFiles(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isFile() && e.name.endsWith(".yaml") && e.name !== "base.yaml")
    .map((e) => e.name)
    .sort();
}

/**
 * Validate every config layering: base.yaml alone, then base.yaml under each
 * environment overlay, with LABCTL_* overrides applied. With a state directory,
 * the persisted state file is checked against its schema too.
 */
export function validateAll(
  opts: Pick<CommonOptions, "configDir" | "cwd"> & { stateDir?: string } = {},
  env: NodeJS.ProcessEnv = process.env,
): ValidateResult {
  const configDir = opts.configDir ? path.resolve(opts.cwd ?? process.cwd(), opts.configDir) : CONFIG_DIR;
  if (!fs.existsSync(configDir)) {
    return {
      ok: false,
      code: "CONFIG_DIR_MISSING",
      error: `Config directory not found: ${configDir}`,
      exitCode: EXIT.INVALID_ARGS,
    };
  }

  const diagnostics: Diagnostic[] = [];
  const checked: string[] = [];
  if (!fs.existsSync(path.join(configDir, "base.yaml"))) {
    diagnostics.push(diag("error", "CONFIG_BASE_MISSING", "base.yaml not found", configDir));
  }

  for (const layer of [undefined, ...listEnvFiles(configDir).map((f) => f.slice(0, -".yaml".length))]) {
    const label = layer ? `base.yaml + ${layer}.yaml` : "base.yaml";
    const file = path.join(configDir, layer ? `${layer}.yaml` : "base.yaml");
    checked.push(label);
    try {
      const check = validateConfig(loadRawConfig(layer, configDir, env));
      if (!check.valid) diagnostics.push(diag("error", "CONFIG_INVALID", `${label}: ${check.errors}`, file));
    } catch (e) {
      const code = e instanceof ConfigError ? "CONFIG_INVALID" : "CONFIG_READ_FAILED";
      diagnostics.push(diag("error", code, `${label}: ${errorMessage(e)}`, file));
    }
  }

  if (opts.stateDir) {
    const statePath = path.join(path.resolve(opts.cwd ?? process.cwd(), opts.stateDir), "state.json");
    if (!fs.existsSync(statePath)) {
      diagnostics.push(diag("info", "STATE_MISSING", "No state file yet", statePath));
    } else {
      checked.push("state.json");
      try {
        const data: unknown = JSON.parse(fs.readFileSync(statePath, "utf8"));
        const check = createRegistry().validate("lab-state", data);
        if (!check.valid) diagnostics.push(diag("error", "STATE_INVALID", `state.json: ${check.errors}`, statePath));
      } catch (e) {
        diagnostics.push(diag("error", "STATE_READ_FAILED", `state.json: ${errorMessage(e)}`, statePath));
      }
    }
  }

  const errors = diagnostics.filter((d) => d.level === "error");
  if (errors.length > 0) {
    return {
      ok: false,
      code: "VALIDATION_FAILED",
      error: errors.map((d) => d.message).join("; "),
      exitCode: EXIT.INVALID_ARGS,
      detail: { checked, diagnostics },
    };
  }
  return { ok: true, checked, diagnostics };
}
