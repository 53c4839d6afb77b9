import Ajv2020Module from "ajv/dist/2020.js";
import addFormatsModule from "ajv-formats";
import type { ValidateFunction } from "ajv";

export type AjvValidateFn = ValidateFunction;

export type AjvInstance = InstanceType<typeof Ajv2020Module.default>;

export function loadAjv(): AjvInstance {
  // Both packages are CommonJS; their ES default import is the module object.
  const ajv = new Ajv2020Module.default({ allErrors: true, strict: true, allowUnionTypes: true });
  addFormatsModule.default(ajv);
  return ajv;
}
