import { SIDE_EFFECT_CLASSES } from "./types.js";

export const CapabilityManifestSchema = {
  type: "object",
  required: ["name", "version", "description", "effect", "input_schema", "path_arguments"],
  properties: {
    name: { type: "string", pattern: "^[a-z][a-z0-9_]*$", minLength: 1, maxLength: 64 },
    version: { type: "string", pattern: "^\\d+\\.\\d+\\.\\d+" },
    description: { type: "string", minLength: 1 },
    effect: { type: "string", enum: SIDE_EFFECT_CLASSES },
    input_schema: {
      type: "object",
      required: ["type"],
      properties: { type: { const: "object" } },
    },
    path_arguments: {
      type: "array",
      items: { type: "string", minLength: 1 },
      uniqueItems: true,
    },
    timeout_ms: { type: "number", minimum: 100, maximum: 600000 },
    high_risk: { type: "boolean" },
  },
  additionalProperties: false,
} as const;
