import type { CapabilitySummary, Decision, DecisionFunction, DecisionRequest } from "@errand/schemas";

function generateMockInput(schema: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const properties = isRecord(schema.properties) ? schema.properties : {};
  const required = Array.isArray(schema.required) ? schema.required.filter((r): r is string => typeof r === "string") : [];
  for (const key of required) {
    const prop = properties[key];
    if (!isRecord(prop)) continue;
    if (prop.const !== undefined) {
      result[key] = prop.const;
      continue;
    }
    switch (prop.type) {
      case "string":
        result[key] = Array.isArray(prop.enum) ? prop.enum[0] : `mock_${key}`;
        break;
      case "number": case "integer": result[key] = 0; break;
      case "boolean": result[key] = false; break;
      case "array": result[key] = []; break;
      case "object": result[key] = {}; break;
      default: result[key] = null;
    }
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Stand-in used when no model is configured: makes one read-only call,
 * then reports what it saw.
 */
export class MockDecider implements DecisionFunction {
  async decide(request: DecisionRequest): Promise<Decision> {
    const lastHuman = request.window.map((t) => t.kind).lastIndexOf("human");
    const sinceTask = lastHuman >= 0 ? request.window.slice(lastHuman + 1) : request.window;
    const observation = sinceTask.find((t) => t.kind === "observation");

    if (!observation) {
      const probe = pickProbe(request.capabilities);
      if (probe) {
        return {
          kind: "invoke",
          capability: probe.name,
          arguments: generateMockInput(probe.input_schema),
          thought: "Mock decider: inspect the workspace",
        };
      }
      return { kind: "final", answer: `[mock] No decision model configured. Task received: ${request.task.text}` };
    }

    const summary = observation.kind === "observation" && observation.result.success
      ? JSON.stringify(observation.result.payload).slice(0, 500)
      : "the probe failed";
    return {
      kind: "final",
      answer: `[mock] No decision model configured. Task received: ${request.task.text}. Observed: ${summary}`,
    };
  }
}

function pickProbe(capabilities: readonly CapabilitySummary[]): CapabilitySummary | undefined {
  return capabilities.find((c) => c.name === "list_files") ?? capabilities.find((c) => c.effect === "read_only");
}

export type ScriptStep = Decision | Error | ((request: DecisionRequest) => Decision | Promise<Decision>);

/**
 * Replays a fixed list of decisions (or errors) in order, then keeps
 * returning the fallback. Records every request it receives.
 */
export class ScriptedDecider implements DecisionFunction {
  readonly requests: DecisionRequest[] = [];
  private steps: ScriptStep[];
  private fallback: ScriptStep;

  constructor(steps: ScriptStep[], fallback: ScriptStep = { kind: "final", answer: "script exhausted" }) {
    this.steps = [...steps];
    this.fallback = fallback;
  }

  async decide(request: DecisionRequest): Promise<Decision> {
    this.requests.push(request);
    const step = this.steps.shift() ?? this.fallback;
    if (step instanceof Error) throw step;
    if (typeof step === "function") return step(request);
    return step;
  }
}
