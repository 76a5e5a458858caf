export type * from "./types.js";
export { SIDE_EFFECT_CLASSES } from "./types.js";
export {
  ErrandError,
  ConfigError,
  DecisionParseError,
  ManifestError,
  errorMessage,
} from "./errors.js";
export type { ErrandErrorCode } from "./errors.js";
export { TimeoutError, AbortedError, withTimeout, raceAbort, sleep } from "./timeout.js";
export {
  validateCapabilityManifestData,
  isCapabilityManifest,
  validateDecisionOutputData,
  validateCapabilityInput,
  clearSchemaCache,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { CapabilityManifestSchema } from "./capability-manifest.schema.js";
export { DecisionOutputSchema, FINAL_ANSWER_ACTION } from "./decision.schema.js";
