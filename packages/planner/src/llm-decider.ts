import type { Decision, DecisionFunction, DecisionRequest } from "@errand/schemas";
import { DecisionParseError, FINAL_ANSWER_ACTION, validateDecisionOutputData } from "@errand/schemas";
import { buildSystemPrompt, buildUserPrompt, type PromptOptions } from "./prompts.js";

export interface ModelCallResult {
  text: string;
}

export type ModelCallFn = (systemPrompt: string, userPrompt: string, signal: AbortSignal) => Promise<ModelCallResult>;

const MAX_RESPONSE_SIZE = 500_000;
const FINAL_ALIASES = new Set([FINAL_ANSWER_ACTION, "final answer", "final"]);

function stripFences(raw: string): string {
  let text = raw.trim();
  if (text.startsWith("```")) {
    text = text.replace(/^```(?:json)?\n?/, "").replace(/\n?```$/, "");
  }
  return text.trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Turns raw model text into a Decision. Throws DecisionParseError when the
 * text is not one well-formed action.
 */
export function parseDecision(raw: string): Decision {
  if (raw.length > MAX_RESPONSE_SIZE) {
    throw new DecisionParseError(`Decision response too large: ${raw.length} characters (max ${MAX_RESPONSE_SIZE})`);
  }
  const text = stripFences(raw);
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw new DecisionParseError(`Decision was not valid JSON: ${text.slice(0, 200)}`, raw);
  }
  const validation = validateDecisionOutputData(data);
  if (!validation.valid || !isRecord(data) || typeof data.action !== "string") {
    throw new DecisionParseError(`Decision did not match the action format: ${validation.errors.join("; ")}`, raw);
  }

  const thought = typeof data.thought === "string" && data.thought.trim() !== "" ? data.thought : undefined;
  const input = data.action_input;

  if (FINAL_ALIASES.has(data.action.trim().toLowerCase())) {
    const answer = typeof input === "string" ? input : JSON.stringify(input);
    return thought ? { kind: "final", answer, thought } : { kind: "final", answer };
  }

  let args: Record<string, unknown>;
  if (isRecord(input)) {
    args = input;
  } else if (input === null || input === "") {
    args = {};
  } else {
    throw new DecisionParseError(`action_input for "${data.action}" must be an object`, raw);
  }
  const decision: Decision = { kind: "invoke", capability: data.action.trim(), arguments: args };
  if (thought) decision.thought = thought;
  return decision;
}

/** Decision function backed by a chat model speaking the structured action format. */
export class LLMDecider implements DecisionFunction {
  private callModel: ModelCallFn;
  private promptOptions: PromptOptions;

  constructor(callModel: ModelCallFn, promptOptions: PromptOptions = {}) {
    this.callModel = callModel;
    this.promptOptions = promptOptions;
  }

  async decide(request: DecisionRequest, signal: AbortSignal): Promise<Decision> {
    const systemPrompt = buildSystemPrompt(request.capabilities, this.promptOptions);
    const userPrompt = buildUserPrompt(request.task.text, request.window, this.promptOptions);
    const { text } = await this.callModel(systemPrompt, userPrompt, signal);
    return parseDecision(text);
  }
}
