import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import { mkdtemp, readFile, realpath, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import type { CapabilityDescriptor, DecisionRequest, ObservationTurn, Turn } from "@errand/schemas";
import { DecisionParseError } from "@errand/schemas";
import { ConversationStore } from "@errand/memory";
import { ScriptedDecider, type ScriptStep } from "@errand/planner";
import { CapabilityRegistry, SandboxGuard, builtinHandlers, createSandboxPolicy } from "@errand/tools";
import { Orchestrator, createTask, type OrchestratorConfig } from "./orchestrator.js";

const CAPABILITIES_DIR = fileURLToPath(new URL("../../../capabilities", import.meta.url));

const observations = (turns: Turn[]): ObservationTurn[] =>
  turns.filter((t): t is ObservationTurn => t.kind === "observation");

function lastObservation(request: DecisionRequest): ObservationTurn | undefined {
  return observations([...request.window]).at(-1);
}

describe("Orchestrator", () => {
  let root: string;
  let guard: SandboxGuard;
  let registry: CapabilityRegistry;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    root = await realpath(await mkdtemp(join(tmpdir(), "errand-run-")));
    guard = new SandboxGuard(createSandboxPolicy(root));
    registry = new CapabilityRegistry({ guard });
    await registry.loadFromDirectory(CAPABILITIES_DIR, builtinHandlers);
    const never = () => new Promise<never>(() => undefined);
    registry.register(
      {
        name: "stall",
        version: "1.0.0",
        description: "Never finishes",
        effect: "read_only",
        input_schema: { type: "object" },
        path_arguments: [],
        timeout_ms: 100,
      },
      never,
    );
    registry.register(
      {
        name: "hang",
        version: "1.0.0",
        description: "Never finishes, long timeout",
        effect: "network",
        input_schema: { type: "object" },
        path_arguments: [],
        timeout_ms: 60_000,
      },
      never,
    );
    registry.seal();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  function orchestrator(steps: ScriptStep[], config: Partial<OrchestratorConfig> = {}, fallback?: ScriptStep) {
    const decider = new ScriptedDecider(steps, fallback);
    return { decider, orch: new Orchestrator({ registry, guard, decider, backoffBaseMs: 1, ...config }) };
  }

  it("writes a file and answers (write then finish)", async () => {
    const { orch } = orchestrator([
      { kind: "invoke", capability: "write_file", arguments: { path: "notes.txt", content: "hello" } },
      (req) => ({ kind: "final", answer: lastObservation(req)?.result.success ? "Wrote hello to notes.txt" : "failed" }),
    ]);
    const store = new ConversationStore();
    const outcome = await orch.run(createTask("write 'hello' to notes.txt"), store);

    expect(outcome.status).toBe("success");
    expect(outcome).toMatchObject({ answer: "Wrote hello to notes.txt", iterations: 2 });
    expect(await readFile(join(root, "notes.txt"), "utf-8")).toBe("hello");
    expect(outcome.turns.map((t) => t.kind)).toEqual(["human", "decision", "observation", "final"]);
    expect(observations(outcome.turns)[0]?.result).toEqual({
      success: true,
      payload: { path: "notes.txt", bytes_written: 5, appended: false },
      error: null,
    });
    expect(store.full()).toEqual(outcome.turns);
  });

  it("records a rejection for delete requests and keeps going", async () => {
    await writeFile(join(root, "notes.txt"), "keep");
    const { orch } = orchestrator([
      { kind: "invoke", capability: "delete_file", arguments: { path: "notes.txt" } },
      { kind: "final", answer: "Deleting files is not permitted here." },
    ]);
    const outcome = await orch.run(createTask("delete notes.txt"), new ConversationStore());

    expect(outcome.status).toBe("success");
    expect(observations(outcome.turns)[0]?.result).toEqual({
      success: false,
      payload: null,
      error: "rejected: delete not permitted",
    });
    expect(await readFile(join(root, "notes.txt"), "utf-8")).toBe("keep");
  });

  it("never lets content from outside the workspace into the conversation", async () => {
    const { orch } = orchestrator([{ kind: "invoke", capability: "read_file", arguments: { path: "/etc/passwd" } }], {
      limits: { max_iterations: 3 },
    }, { kind: "invoke", capability: "read_file", arguments: { path: "../../../../etc/passwd" } });
    const store = new ConversationStore();
    const outcome = await orch.run(createTask("read /etc/passwd"), store);

    expect(outcome).toMatchObject({ status: "exhausted", reason: "iteration_cap", iterations: 3 });
    for (const obs of observations(store.full())) {
      expect(obs.result).toEqual({
        success: false,
        payload: null,
        error: 'rejected: path "path" resolves outside the workspace',
      });
    }
  });

  it("records a timeout and continues, one iteration per decision", async () => {
    const { orch } = orchestrator([
      { kind: "invoke", capability: "stall", arguments: {} },
      { kind: "final", answer: "gave up waiting" },
    ]);
    const outcome = await orch.run(createTask("wait briefly"), new ConversationStore());

    expect(outcome).toMatchObject({ status: "success", iterations: 2 });
    expect(observations(outcome.turns)[0]?.result).toEqual({ success: false, payload: null, error: "timeout" });
  });

  it("stops at the iteration cap even when the decision repeats", async () => {
    const { orch, decider } = orchestrator([], { limits: { max_iterations: 3 } }, {
      kind: "invoke",
      capability: "list_files",
      arguments: {},
    });
    const outcome = await orch.run(createTask("loop forever"), new ConversationStore());

    expect(outcome).toMatchObject({ status: "exhausted", reason: "iteration_cap", iterations: 3 });
    expect(decider.requests).toHaveLength(3);
    expect(outcome.turns.filter((t) => t.kind === "decision")).toHaveLength(3);
    expect(observations(outcome.turns)).toHaveLength(3);
  });

  it("abandons an in-flight invocation at the deadline", async () => {
    const { orch } = orchestrator([{ kind: "invoke", capability: "hang", arguments: {} }], {
      limits: { max_duration_ms: 150 },
    });
    const started = Date.now();
    const outcome = await orch.run(createTask("wait"), new ConversationStore());

    expect(outcome).toMatchObject({ status: "exhausted", reason: "deadline", iterations: 1 });
    expect(Date.now() - started).toBeLessThan(5000);
    expect(observations(outcome.turns)[0]?.result.error).toBe("aborted: run deadline exceeded");
  });

  it("stops a long-running SQL statement at the deadline", async () => {
    const query = "WITH RECURSIVE c(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM c) SELECT count(*) AS n FROM c";
    const { orch } = orchestrator([{ kind: "invoke", capability: "sql_query", arguments: { database: "db.sqlite", query } }], {
      limits: { max_duration_ms: 300 },
    });
    const started = Date.now();
    const outcome = await orch.run(createTask("count forever"), new ConversationStore());

    expect(outcome).toMatchObject({ status: "exhausted", reason: "deadline", iterations: 1 });
    expect(Date.now() - started).toBeLessThan(3000);
    expect(observations(outcome.turns)[0]?.result.error).toBe("aborted: run deadline exceeded");
  });

  it("ends at the deadline while the decision function is still thinking", async () => {
    const { orch } = orchestrator([() => new Promise<never>(() => undefined)], {
      limits: { max_duration_ms: 100 },
      decisionTimeoutMs: 60_000,
    });
    const outcome = await orch.run(createTask("think"), new ConversationStore());

    expect(outcome).toMatchObject({ status: "exhausted", reason: "deadline", iterations: 1 });
    expect(outcome.turns.map((t) => t.kind)).toEqual(["human"]);
  });

  it("recovers from parse failures within the retry budget", async () => {
    const { orch } = orchestrator([
      new DecisionParseError("Decision was not valid JSON: hmm"),
      new DecisionParseError("Decision was not valid JSON: hmm"),
      { kind: "final", answer: "done" },
    ]);
    const outcome = await orch.run(createTask("x"), new ConversationStore());

    expect(outcome).toMatchObject({ status: "success", iterations: 3 });
    const synthetic = observations(outcome.turns);
    expect(synthetic).toHaveLength(2);
    expect(synthetic[0]).toMatchObject({
      decision_id: null,
      capability: null,
      result: { success: false, payload: null, error: "could not parse decision: Decision was not valid JSON: hmm" },
    });
  });

  it("turns persistent parse failures into a fatal outcome", async () => {
    const { orch } = orchestrator([], { decisionRetries: 2 }, new DecisionParseError("bad"));
    const outcome = await orch.run(createTask("x"), new ConversationStore());

    expect(outcome).toMatchObject({
      status: "fatal",
      error: "Decision function failed 3 times in a row. Last error: bad",
      iterations: 3,
    });
    expect(observations(outcome.turns)).toHaveLength(3);
  });

  it("resets the failure count after a good decision", async () => {
    const bad = new DecisionParseError("bad");
    const { orch } = orchestrator(
      [bad, { kind: "invoke", capability: "list_files", arguments: {} }, bad, { kind: "final", answer: "ok" }],
      { decisionRetries: 1 },
    );
    expect((await orch.run(createTask("x"), new ConversationStore())).status).toBe("success");
  });

  it("backs off and retries after an upstream error", async () => {
    const { orch } = orchestrator([new Error("503 Service Unavailable"), { kind: "final", answer: "recovered" }]);
    const outcome = await orch.run(createTask("x"), new ConversationStore());

    expect(outcome).toMatchObject({ status: "success", answer: "recovered" });
    expect(observations(outcome.turns)[0]?.result.error).toBe("decision function failed: 503 Service Unavailable");
  });

  it("treats a slow decision as a failed attempt", async () => {
    const { orch } = orchestrator(
      [() => new Promise<never>(() => undefined), { kind: "final", answer: "second try" }],
      { decisionTimeoutMs: 50 },
    );
    const outcome = await orch.run(createTask("x"), new ConversationStore());

    expect(outcome).toMatchObject({ status: "success", answer: "second try" });
    expect(observations(outcome.turns)[0]?.result.error).toBe("decision function failed: Decision timed out after 50ms");
  });

  it("reports unknown capabilities and invalid arguments as observations", async () => {
    const { orch } = orchestrator([
      { kind: "invoke", capability: "teleport", arguments: {} },
      { kind: "invoke", capability: "write_file", arguments: { path: "a.txt" } },
      { kind: "final", answer: "done" },
    ]);
    const outcome = await orch.run(createTask("x"), new ConversationStore());

    expect(observations(outcome.turns).map((o) => o.result.error)).toEqual([
      "unknown capability",
      "invalid arguments: /: must have required property 'content'",
    ]);
  });

  it("pairs every decision with exactly one observation right after it", async () => {
    const { orch } = orchestrator([
      { kind: "invoke", capability: "write_file", arguments: { path: "a.txt", content: "1" } },
      new DecisionParseError("bad"),
      { kind: "invoke", capability: "delete_file", arguments: { path: "a.txt" } },
      { kind: "invoke", capability: "stall", arguments: {} },
      { kind: "invoke", capability: "nope", arguments: {} },
      { kind: "invoke", capability: "read_file", arguments: { path: "a.txt" } },
      { kind: "final", answer: "done" },
    ]);
    const { turns } = await orch.run(createTask("mixed"), new ConversationStore());

    const decisions = turns.filter((t) => t.kind === "decision");
    expect(decisions).toHaveLength(5);
    turns.forEach((turn, i) => {
      if (turn.kind !== "decision") return;
      const next = turns[i + 1];
      expect(next?.kind === "observation" && next.decision_id === turn.decision_id).toBe(true);
    });
    expect(observations(turns).filter((o) => o.decision_id !== null)).toHaveLength(5);
  });

  it("shows the decision function a bounded window", async () => {
    const { orch, decider } = orchestrator(
      [
        { kind: "invoke", capability: "list_files", arguments: {} },
        { kind: "invoke", capability: "list_files", arguments: {} },
        { kind: "final", answer: "done" },
      ],
      { windowTurns: 2 },
    );
    await orch.run(createTask("x"), new ConversationStore());

    expect(decider.requests.map((r) => r.window.length)).toEqual([1, 2, 2]);
    expect(decider.requests[2]?.window.map((t) => t.kind)).toEqual(["decision", "observation"]);
    expect(decider.requests[0]?.capabilities.map((c) => c.name)).toContain("write_file");
  });

  it("keeps conversations of concurrent runs apart", async () => {
    const a = orchestrator([{ kind: "invoke", capability: "list_files", arguments: {} }, { kind: "final", answer: "A" }]);
    const b = orchestrator([{ kind: "final", answer: "B" }]);
    const storeA = new ConversationStore();
    const storeB = new ConversationStore();

    const [outA, outB] = await Promise.all([
      a.orch.run(createTask("task A"), storeA),
      b.orch.run(createTask("task B"), storeB),
    ]);

    expect(outA).toMatchObject({ status: "success", answer: "A" });
    expect(outB).toMatchObject({ status: "success", answer: "B" });
    expect(storeA.full().map((t) => t.kind)).toEqual(["human", "decision", "observation", "final"]);
    expect(storeB.full()).toEqual([
      { kind: "human", text: "task B", at: expect.any(String) },
      { kind: "final", text: "B", at: expect.any(String) },
    ]);
  });

  it("lets a later run in the same session see earlier turns", async () => {
    const store = new ConversationStore();
    const first = orchestrator([{ kind: "final", answer: "first" }]);
    await first.orch.run(createTask("one"), store);
    const second = orchestrator([{ kind: "final", answer: "second" }]);
    const outcome = await second.orch.run(createTask("two"), store);

    expect(second.decider.requests[0]?.window.map((t) => t.kind)).toEqual(["human", "final", "human"]);
    expect(outcome.turns).toHaveLength(2);
    expect(store.size).toBe(4);
  });

  it("contains unexpected internal errors as fatal outcomes", async () => {
    class ExplodingGuard extends SandboxGuard {
      override async validate(_descriptor: CapabilityDescriptor): Promise<{ ok: true }> {
        throw new Error("guard exploded");
      }
    }
    const decider = new ScriptedDecider([{ kind: "invoke", capability: "list_files", arguments: {} }]);
    const orch = new Orchestrator({ registry, guard: new ExplodingGuard(guard.policy), decider });
    const outcome = await orch.run(createTask("x"), new ConversationStore());

    expect(outcome).toMatchObject({ status: "fatal", error: "internal error: guard exploded", iterations: 1 });
  });
});
