import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { CapabilityManifestSchema } from "./capability-manifest.schema.js";
import { DecisionOutputSchema } from "./decision.schema.js";
import type { CapabilityManifest } from "./types.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// ajv-formats exposes its function under .default when loaded from ESM.
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

const MAX_SCHEMA_CACHE = 200;
const MAX_SCHEMA_SIZE = 64_000;
const schemaCache = new Map<string, ValidateFunction>();

function getOrCompile(schema: Record<string, unknown>): ValidateFunction {
  const key = JSON.stringify(schema);
  if (key.length > MAX_SCHEMA_SIZE) {
    throw new Error(`Schema too large for compilation: ${key.length} bytes (max ${MAX_SCHEMA_SIZE})`);
  }
  let validate = schemaCache.get(key);
  if (!validate) {
    if (schemaCache.size >= MAX_SCHEMA_CACHE) {
      const oldest = schemaCache.keys().next().value;
      if (oldest !== undefined) schemaCache.delete(oldest);
    }
    validate = ajv.compile(schema);
    schemaCache.set(key, validate);
  }
  return validate;
}

export function clearSchemaCache(): void {
  schemaCache.clear();
}

const validateManifest = ajv.compile(CapabilityManifestSchema);
const validateDecisionOutput = ajv.compile(DecisionOutputSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateCapabilityManifestData(data: unknown): ValidationResult {
  const valid = validateManifest(data);
  return toResult(valid, validateManifest.errors);
}

export function isCapabilityManifest(data: unknown): data is CapabilityManifest {
  return validateManifest(data);
}

export function validateDecisionOutputData(data: unknown): ValidationResult {
  const valid = validateDecisionOutput(data);
  return toResult(valid, validateDecisionOutput.errors);
}

export function validateCapabilityInput(
  input: unknown,
  inputSchema: Record<string, unknown>
): ValidationResult {
  const validate = getOrCompile(inputSchema);
  const valid = validate(input);
  return toResult(valid, validate.errors);
}
