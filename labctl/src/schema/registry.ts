import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: Record<string, unknown>;
};

export type SchemaCheck = { valid: boolean; errors: string | null };

const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Schema registry: discovers and loads all JSON Schemas from a directory.
 * Provides compile-on-demand validation functions.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private readonly ajv: AjvInstance = loadAjv();

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  load(): this {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      if (!isRecord(schema)) throw new Error(`Schema is not an object: ${filePath}`);

      // "run-record.schema.json" → "run-record"
      const name = file.replace(/\.schema\.json$/, "");
      const version = extractVersion(schema) ?? "1.0.0";

      this.entries.set(name, { name, version, filePath, schema });
    }

    return this;
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  getValidator(name: string): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  /** Type guard backed by the named schema. */
  is<T>(name: string, data: unknown): data is T {
    return this.getValidator(name)(data);
  }

  validate(name: string, data: unknown): SchemaCheck {
    const validate = this.getValidator(name);
    const valid = validate(data);
    return {
      valid,
      errors: valid ? null : this.ajv.errorsText(validate.errors),
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Extract the version from an "$id" ending in "@x.y.z". */
function extractVersion(schema: Record<string, unknown>): string | null {
  if (typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }
  return null;
}

let shared: SchemaRegistry | null = null;

/** Create and load a registry; the bundled schemas directory is loaded once and shared. */
export function createRegistry(schemaDir?: string): SchemaRegistry {
  if (schemaDir) return new SchemaRegistry(schemaDir).load();
  shared ??= new SchemaRegistry(DEFAULT_SCHEMA_DIR).load();
  return shared;
}
