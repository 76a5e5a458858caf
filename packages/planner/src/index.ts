export { LLMDecider, parseDecision } from "./llm-decider.js";
export type { ModelCallFn, ModelCallResult } from "./llm-decider.js";
export { MockDecider, ScriptedDecider } from "./mock-decider.js";
export type { ScriptStep } from "./mock-decider.js";
export { buildSystemPrompt, buildUserPrompt, wrapUntrusted, truncateOutput } from "./prompts.js";
export type { PromptOptions } from "./prompts.js";
