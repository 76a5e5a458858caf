export { Orchestrator, createTask, DEFAULT_LIMITS } from "./orchestrator.js";
export type { OrchestratorConfig } from "./orchestrator.js";
export { reportOutcome, collectAttempts } from "./result-reporter.js";
export type { RunReport, Attempt } from "./result-reporter.js";
