import { describe, it, expect } from "vitest";
import { ConfigError, DecisionParseError, ErrandError, errorMessage } from "./errors.js";

describe("errors", () => {
  it("ConfigError lists every problem", () => {
    const err = new ConfigError(["port must be a number", "workspace must be absolute"]);
    expect(err).toBeInstanceOf(ErrandError);
    expect(err.code).toBe("CONFIG_INVALID");
    expect(err.message).toBe("Invalid configuration:\n  - port must be a number\n  - workspace must be absolute");
  });

  it("DecisionParseError keeps the raw model output", () => {
    const err = new DecisionParseError("not JSON", "hello");
    expect(err.code).toBe("DECISION_PARSE");
    expect(err.raw).toBe("hello");
    expect(err.name).toBe("DecisionParseError");
  });

  it("errorMessage handles non-Error values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});
