import { v4 as uuid } from "uuid";
import type {
  CapabilityResult,
  Decision,
  DecisionFunction,
  InvokeDecision,
  RunLimits,
  RunOutcome,
  RunPhase,
  RunState,
  RunTermination,
  Task,
  Turn,
} from "@errand/schemas";
import {
  DecisionParseError,
  TimeoutError,
  errorMessage,
  raceAbort,
  sleep,
  withTimeout,
} from "@errand/schemas";
import type { ConversationStore } from "@errand/memory";
import { DEFAULT_WINDOW_TURNS } from "@errand/memory";
import type { CapabilityRegistry, SandboxGuard } from "@errand/tools";

export const DEFAULT_LIMITS: Readonly<RunLimits> = Object.freeze({
  max_iterations: 20,
  max_duration_ms: 600_000,
});

export interface OrchestratorConfig {
  registry: CapabilityRegistry;
  guard: SandboxGuard;
  decider: DecisionFunction;
  limits?: Partial<RunLimits>;
  /** Turns shown to the decision function per call. */
  windowTurns?: number;
  /** Consecutive decision failures tolerated before the run is fatal. */
  decisionRetries?: number;
  decisionTimeoutMs?: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
}

const VALID_TRANSITIONS: Record<RunPhase, RunPhase[]> = {
  init: ["deciding", "terminated"],
  deciding: ["validating", "recording", "terminated"],
  validating: ["invoking", "recording"],
  invoking: ["recording"],
  recording: ["deciding", "terminated"],
  terminated: [],
};

export function createTask(text: string): Task {
  return Object.freeze({ task_id: uuid(), text, created_at: new Date().toISOString() });
}

function backoff(attempt: number, baseMs: number, maxMs: number): number {
  const delay = Math.min(baseMs * Math.pow(2, attempt - 1), maxMs);
  return delay + Math.random() * baseMs;
}

function now(): string {
  return new Date().toISOString();
}

/**
 * Drives one task through decide → validate → invoke → record until the
 * decision function answers or a budget runs out. Stateless between runs:
 * the conversation store is handed in per call, and RunState lives only
 * inside run().
 */
export class Orchestrator {
  private registry: CapabilityRegistry;
  private guard: SandboxGuard;
  private decider: DecisionFunction;
  private limits: RunLimits;
  private windowTurns: number;
  private decisionRetries: number;
  private decisionTimeoutMs: number;
  private backoffBaseMs: number;
  private backoffMaxMs: number;

  constructor(config: OrchestratorConfig) {
    this.registry = config.registry;
    this.guard = config.guard;
    this.decider = config.decider;
    this.limits = { ...DEFAULT_LIMITS, ...config.limits };
    this.windowTurns = config.windowTurns ?? DEFAULT_WINDOW_TURNS;
    this.decisionRetries = config.decisionRetries ?? 3;
    this.decisionTimeoutMs = config.decisionTimeoutMs ?? 120_000;
    this.backoffBaseMs = config.backoffBaseMs ?? 500;
    this.backoffMaxMs = config.backoffMaxMs ?? 15_000;
  }

  async run(task: Task, store: ConversationStore): Promise<RunOutcome> {
    const startedAt = Date.now();
    const state: RunState = {
      phase: "init",
      iterations: 0,
      iteration_cap: this.limits.max_iterations,
      started_at: startedAt,
      deadline: startedAt + this.limits.max_duration_ms,
      terminal: false,
    };
    const turns: Turn[] = [];
    const record = (turn: Turn): void => {
      store.append(turn);
      turns.push(turn);
    };

    const deadline = new AbortController();
    const deadlineTimer = setTimeout(() => deadline.abort(), this.limits.max_duration_ms);
    deadlineTimer.unref();

    console.log(`[orchestrator] Run ${task.task_id} started (cap ${state.iteration_cap} iterations, ${this.limits.max_duration_ms}ms)`);

    let termination: RunTermination;
    try {
      record({ kind: "human", text: task.text, at: now() });
      termination = await this.loop(task, store, state, record, deadline.signal);
      if (state.phase !== "terminated") this.transition(state, "terminated");
    } catch (err) {
      termination = { status: "fatal", error: `internal error: ${errorMessage(err)}` };
      state.phase = "terminated";
    } finally {
      clearTimeout(deadlineTimer);
    }
    state.terminal = true;
    const elapsed = Date.now() - startedAt;
    const detail = termination.status === "exhausted" ? ` (${termination.reason})` : "";
    console.log(`[orchestrator] Run ${task.task_id} ${termination.status}${detail} after ${state.iterations} iterations in ${elapsed}ms`);
    return { ...termination, task, iterations: state.iterations, elapsed_ms: elapsed, turns };
  }

  private async loop(
    task: Task,
    store: ConversationStore,
    state: RunState,
    record: (turn: Turn) => void,
    deadline: AbortSignal,
  ): Promise<RunTermination> {
    let consecutiveFailures = 0;

    while (true) {
      if (deadline.aborted || Date.now() >= state.deadline) {
        return { status: "exhausted", reason: "deadline" };
      }
      if (state.iterations >= state.iteration_cap) {
        return { status: "exhausted", reason: "iteration_cap" };
      }

      this.transition(state, "deciding");
      state.iterations += 1;

      let decision: Decision;
      try {
        decision = await this.decide(task, store, deadline);
      } catch (err) {
        if (deadline.aborted) return { status: "exhausted", reason: "deadline" };
        consecutiveFailures += 1;
        const message = err instanceof DecisionParseError
          ? `could not parse decision: ${err.message}`
          : `decision function failed: ${errorMessage(err)}`;
        console.warn(`[orchestrator] Run ${task.task_id} iteration ${state.iterations}: ${message}`);
        this.transition(state, "recording");
        record({
          kind: "observation",
          decision_id: null,
          capability: null,
          result: { success: false, payload: null, error: message },
          at: now(),
        });
        if (consecutiveFailures > this.decisionRetries) {
          return {
            status: "fatal",
            error: `Decision function failed ${consecutiveFailures} times in a row. Last error: ${errorMessage(err)}`,
          };
        }
        if (!(err instanceof DecisionParseError)) {
          await sleep(backoff(consecutiveFailures, this.backoffBaseMs, this.backoffMaxMs), deadline);
        }
        continue;
      }
      consecutiveFailures = 0;

      if (decision.kind === "final") {
        record({ kind: "final", text: decision.answer, at: now() });
        this.transition(state, "terminated");
        return { status: "success", answer: decision.answer };
      }

      const decisionId = uuid();
      record({
        kind: "decision",
        decision_id: decisionId,
        capability: decision.capability,
        arguments: decision.arguments,
        ...(decision.thought ? { thought: decision.thought } : {}),
        at: now(),
      });

      this.transition(state, "validating");
      const result = await this.validateAndInvoke(state, decision, deadline);

      this.transition(state, "recording");
      record({ kind: "observation", decision_id: decisionId, capability: decision.capability, result, at: now() });
    }
  }

  private async decide(task: Task, store: ConversationStore, deadline: AbortSignal): Promise<Decision> {
    const controller = new AbortController();
    const forward = () => controller.abort();
    deadline.addEventListener("abort", forward, { once: true });
    try {
      const pending = this.decider.decide(
        { task, window: store.window(this.windowTurns), capabilities: this.registry.describe() },
        controller.signal,
      );
      return await withTimeout(raceAbort(pending, deadline, "Decision"), this.decisionTimeoutMs, "Decision");
    } catch (err) {
      if (err instanceof TimeoutError) controller.abort();
      throw err;
    } finally {
      deadline.removeEventListener("abort", forward);
    }
  }

  private async validateAndInvoke(state: RunState, decision: InvokeDecision, deadline: AbortSignal): Promise<CapabilityResult> {
    const descriptor = this.registry.get(decision.capability);
    if (descriptor) {
      const verdict = await this.guard.validate(descriptor, decision.arguments);
      if (!verdict.ok) {
        return { success: false, payload: null, error: `rejected: ${verdict.reason}` };
      }
    }
    this.transition(state, "invoking");
    const result = await this.registry.invoke(decision.capability, decision.arguments, { signal: deadline });
    if (deadline.aborted && !result.success && result.error === "aborted") {
      return { ...result, error: "aborted: run deadline exceeded" };
    }
    return result;
  }

  private transition(state: RunState, next: RunPhase): void {
    if (!VALID_TRANSITIONS[state.phase].includes(next)) {
      throw new Error(`Invalid run transition: ${state.phase} → ${next}`);
    }
    state.phase = next;
  }
}
