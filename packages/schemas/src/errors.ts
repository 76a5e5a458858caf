export type ErrandErrorCode =
  | "CONFIG_INVALID"
  | "DECISION_PARSE"
  | "DECISION_UPSTREAM"
  | "TIMEOUT"
  | "ABORTED"
  | "REGISTRY_SEALED"
  | "MANIFEST_INVALID"
  | "SESSION_BUSY";

export class ErrandError extends Error {
  readonly code: ErrandErrorCode;

  constructor(code: ErrandErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = "ErrandError";
  }
}

export class ConfigError extends ErrandError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super("CONFIG_INVALID", `Invalid configuration:\n${problems.map((p) => `  - ${p}`).join("\n")}`);
    this.problems = problems;
    this.name = "ConfigError";
  }
}

/** The decision function answered, but not with a usable decision. */
export class DecisionParseError extends ErrandError {
  readonly raw: string;

  constructor(message: string, raw = "") {
    super("DECISION_PARSE", message);
    this.raw = raw;
    this.name = "DecisionParseError";
  }
}

export class ManifestError extends ErrandError {
  constructor(message: string) {
    super("MANIFEST_INVALID", message);
    this.name = "ManifestError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
