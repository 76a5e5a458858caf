/**
 * Errand core types
 *
 * Canonical data models shared by the registry, the guard, the store,
 * the decision functions and the orchestrator.
 */

// ─── Task ───────────────────────────────────────────────────────────

export interface Task {
  readonly task_id: string;
  readonly text: string;
  readonly created_at: string;
}

// ─── Capabilities ───────────────────────────────────────────────────

export type SideEffectClass =
  | "read_only"
  | "filesystem_write"
  | "filesystem_delete"
  | "network"
  | "process_exec";

export const SIDE_EFFECT_CLASSES: readonly SideEffectClass[] = [
  "read_only",
  "filesystem_write",
  "filesystem_delete",
  "network",
  "process_exec",
];

export interface CapabilityManifest {
  name: string;
  version: string;
  description: string;
  effect: SideEffectClass;
  input_schema: Record<string, unknown>;
  /** Argument names that carry filesystem paths. */
  path_arguments: readonly string[];
  timeout_ms?: number;
  high_risk?: boolean;
}

export type CapabilityPayload = string | number | boolean | null | Record<string, unknown> | unknown[];

export interface CapabilityResult {
  success: boolean;
  payload: CapabilityPayload;
  error: string | null;
}

/** What a decision function is shown about each capability. */
export interface CapabilitySummary {
  name: string;
  description: string;
  effect: SideEffectClass;
  input_schema: Record<string, unknown>;
}

export interface CapabilityContext {
  workspaceRoot: string;
  signal: AbortSignal;
  /** Resolves a path argument against the workspace root, following symlinks. Throws for paths outside it. */
  resolve(path: string): Promise<string>;
}

export type CapabilityHandler = (
  args: Record<string, unknown>,
  context: CapabilityContext,
) => Promise<unknown>;

export interface CapabilityDescriptor {
  readonly manifest: Readonly<CapabilityManifest>;
  readonly handler: CapabilityHandler;
}

// ─── Sandbox ────────────────────────────────────────────────────────

export interface SandboxPolicy {
  readonly workspace_root: string;
  readonly allow_delete: false;
  readonly allow_outside_workspace: false;
  readonly max_command_length: number;
}

export type GuardVerdict = { ok: true } | { ok: false; reason: string };

// ─── Conversation ───────────────────────────────────────────────────

export interface HumanTurn {
  kind: "human";
  text: string;
  at: string;
}

export interface DecisionTurn {
  kind: "decision";
  decision_id: string;
  capability: string;
  arguments: Record<string, unknown>;
  thought?: string;
  at: string;
}

export interface ObservationTurn {
  kind: "observation";
  /** null for synthetic observations that record a decision failure. */
  decision_id: string | null;
  capability: string | null;
  result: CapabilityResult;
  at: string;
}

export interface FinalTurn {
  kind: "final";
  text: string;
  at: string;
}

export type Turn = HumanTurn | DecisionTurn | ObservationTurn | FinalTurn;

export type TurnKind = Turn["kind"];

// ─── Decisions ──────────────────────────────────────────────────────

export interface InvokeDecision {
  kind: "invoke";
  capability: string;
  arguments: Record<string, unknown>;
  thought?: string;
}

export interface FinalDecision {
  kind: "final";
  answer: string;
  thought?: string;
}

export type Decision = InvokeDecision | FinalDecision;

export interface DecisionRequest {
  task: Task;
  window: readonly Turn[];
  capabilities: readonly CapabilitySummary[];
}

export interface DecisionFunction {
  decide(request: DecisionRequest, signal: AbortSignal): Promise<Decision>;
}

// ─── Runs ───────────────────────────────────────────────────────────

export type RunPhase =
  | "init"
  | "deciding"
  | "validating"
  | "invoking"
  | "recording"
  | "terminated";

export interface RunLimits {
  max_iterations: number;
  max_duration_ms: number;
}

export interface RunState {
  phase: RunPhase;
  iterations: number;
  readonly iteration_cap: number;
  readonly started_at: number;
  readonly deadline: number;
  terminal: boolean;
}

export type ExhaustionReason = "iteration_cap" | "deadline";

export type RunTermination =
  | { status: "success"; answer: string }
  | { status: "exhausted"; reason: ExhaustionReason }
  | { status: "fatal"; error: string };

export type RunOutcome = RunTermination & {
  task: Task;
  iterations: number;
  elapsed_ms: number;
  /** Turns appended during this run, in order. */
  turns: Turn[];
};

export type RunStatus = RunTermination["status"];
