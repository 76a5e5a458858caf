import type { DecisionTurn, ObservationTurn, RunOutcome, RunStatus } from "@errand/schemas";

export interface RunReport {
  status: RunStatus;
  http_status: 200 | 500;
  body: string;
}

export interface Attempt {
  capability: string;
  arguments: Record<string, unknown>;
  success: boolean;
  error: string | null;
}

const MAX_ARGUMENT_CHARS = 120;
const MAX_OBSERVATION_CHARS = 1000;

/** Pairs each decision of the run with its observation, in order. */
export function collectAttempts(outcome: RunOutcome): Attempt[] {
  const observations = new Map<string, ObservationTurn>();
  for (const turn of outcome.turns) {
    if (turn.kind === "observation" && turn.decision_id !== null) observations.set(turn.decision_id, turn);
  }
  return outcome.turns
    .filter((t): t is DecisionTurn => t.kind === "decision")
    .map((d) => {
      const obs = observations.get(d.decision_id);
      return {
        capability: d.capability,
        arguments: d.arguments,
        success: obs?.result.success ?? false,
        error: obs ? obs.result.error : "no observation recorded",
      };
    });
}

function describeArguments(args: Record<string, unknown>): string {
  const text = JSON.stringify(args);
  return text.length > MAX_ARGUMENT_CHARS ? `${text.slice(0, MAX_ARGUMENT_CHARS)}…` : text;
}

function formatAttempts(attempts: Attempt[]): string {
  if (attempts.length === 0) return "No capabilities were invoked.";
  const lines = attempts.map((a, i) => {
    const mark = a.success ? "ok" : `failed: ${a.error ?? "unknown error"}`;
    return `${i + 1}. ${a.capability} ${describeArguments(a.arguments)} -> ${mark}`;
  });
  return `Attempted:\n${lines.join("\n")}`;
}

function lastObservation(outcome: RunOutcome): string | null {
  for (let i = outcome.turns.length - 1; i >= 0; i--) {
    const turn = outcome.turns[i];
    if (turn?.kind !== "observation") continue;
    const text = turn.result.success
      ? typeof turn.result.payload === "string" ? turn.result.payload : JSON.stringify(turn.result.payload)
      : `error: ${turn.result.error ?? "unknown error"}`;
    return text.length > MAX_OBSERVATION_CHARS ? `${text.slice(0, MAX_OBSERVATION_CHARS)}…` : text;
  }
  return null;
}

function stopReason(outcome: RunOutcome): string {
  if (outcome.status !== "exhausted") return "";
  return outcome.reason === "iteration_cap"
    ? `the iteration limit was reached after ${outcome.iterations} iterations`
    : `the time limit was reached after ${outcome.elapsed_ms}ms`;
}

/**
 * Maps a finished run onto the response contract: the answer on success,
 * otherwise what was attempted and why the run stopped.
 */
export function reportOutcome(outcome: RunOutcome): RunReport {
  switch (outcome.status) {
    case "success":
      return { status: "success", http_status: 200, body: outcome.answer };
    case "exhausted": {
      const sections = [`Task stopped before completion: ${stopReason(outcome)}.`, formatAttempts(collectAttempts(outcome))];
      const last = lastObservation(outcome);
      if (last !== null) sections.push(`Last observation: ${last}`);
      return { status: "exhausted", http_status: 200, body: sections.join("\n\n") };
    }
    case "fatal":
      return {
        status: "fatal",
        http_status: 500,
        body: [`Task failed: ${outcome.error}`, formatAttempts(collectAttempts(outcome))].join("\n\n"),
      };
  }
}
