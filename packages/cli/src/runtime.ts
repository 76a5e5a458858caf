import { mkdir } from "node:fs/promises";
import type { DecisionFunction } from "@errand/schemas";
import { CapabilityRegistry, SandboxGuard, builtinHandlers, createSandboxPolicy } from "@errand/tools";
import type { CapabilityTimeouts } from "@errand/tools";
import { SessionRegistry } from "@errand/memory";
import { Orchestrator } from "@errand/kernel";
import type { ErrandConfig } from "./config.js";
import { createDecider } from "./llm-adapters.js";

export interface Runtime {
  config: Readonly<ErrandConfig>;
  guard: SandboxGuard;
  registry: CapabilityRegistry;
  sessions: SessionRegistry;
  orchestrator: Orchestrator;
}

export function timeoutsFromConfig(config: Readonly<ErrandConfig>): CapabilityTimeouts {
  const { defaultMs, networkMs, processMs } = config.timeouts;
  return {
    read_only: defaultMs,
    filesystem_write: defaultMs,
    filesystem_delete: defaultMs,
    network: networkMs,
    process_exec: processMs,
  };
}

/** Wires guard, registry, decider and orchestrator from one configuration. */
export async function createRuntime(
  config: Readonly<ErrandConfig>,
  decider: DecisionFunction = createDecider(config),
): Promise<Runtime> {
  await mkdir(config.workspaceRoot, { recursive: true });
  const guard = new SandboxGuard(createSandboxPolicy(config.workspaceRoot, config.maxCommandLength));
  const registry = new CapabilityRegistry({ guard, timeouts: timeoutsFromConfig(config) });
  const loaded = await registry.loadFromDirectory(config.capabilitiesDir, builtinHandlers);
  registry.seal();
  console.log(`[errand] Loaded ${loaded.length} capabilities from ${config.capabilitiesDir}`);

  const orchestrator = new Orchestrator({
    registry,
    guard,
    decider,
    limits: { max_iterations: config.run.maxIterations, max_duration_ms: config.run.maxDurationMs },
    windowTurns: config.run.windowTurns,
    decisionRetries: config.run.decisionRetries,
    decisionTimeoutMs: config.run.decisionTimeoutMs,
  });
  return { config, guard, registry, sessions: new SessionRegistry(), orchestrator };
}
