import { Command } from "commander";
import { ApiServer } from "@errand/api";
import { createTask, reportOutcome } from "@errand/kernel";
import type { DecisionFunction, RunStatus } from "@errand/schemas";
import { loadConfig, type ErrandConfig } from "./config.js";
import { createRuntime } from "./runtime.js";

export const EXIT_CODES: Readonly<Record<RunStatus, number>> = Object.freeze({
  success: 0,
  fatal: 1,
  exhausted: 2,
});

export function parsePort(value: string, label = "port"): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid ${label}: "${value}" (must be 0-65535)`);
  }
  return port;
}

export interface ProgramDeps {
  env?: Readonly<Record<string, string | undefined>>;
  /** Replaces the configured decision function. */
  decider?: DecisionFunction;
  write?: (text: string) => void;
}

export function buildProgram(deps: ProgramDeps = {}): Command {
  const write = deps.write ?? ((text: string) => { process.stdout.write(text); });
  const config = (): Readonly<ErrandConfig> => loadConfig(deps.env ?? process.env);

  const program = new Command();
  program.name("errand").description("Run natural-language tasks against a sandboxed workspace").version("0.1.0");

  program.command("run").description("Run one task and print the report").argument("<task>", "Task description")
    .option("-s, --session <id>", "Session id", "default")
    .action(async (taskText: string, opts: { session: string }) => {
      const runtime = await createRuntime(config(), deps.decider);
      const lease = runtime.sessions.acquire(opts.session);
      try {
        const outcome = await runtime.orchestrator.run(createTask(taskText), lease.store);
        const report = reportOutcome(outcome);
        write(`${report.body}\n`);
        process.exitCode = EXIT_CODES[report.status];
      } finally {
        lease.release();
      }
    });

  program.command("capabilities").description("List registered capabilities")
    .action(async () => {
      const runtime = await createRuntime(config(), deps.decider);
      for (const { manifest } of runtime.registry.list()) {
        const risk = manifest.high_risk ? " [high risk]" : "";
        write(`${manifest.name.padEnd(16)} ${manifest.effect.padEnd(17)} ${manifest.description}${risk}\n`);
      }
    });

  program.command("serve").description("Start the HTTP API")
    .option("-p, --port <port>", "Port number")
    .option("--insecure", "Allow running without an API token (unauthenticated)")
    .action(async (opts: { port?: string; insecure?: boolean }) => {
      const cfg = config();
      const port = opts.port !== undefined ? parsePort(opts.port) : cfg.server.port;
      const runtime = await createRuntime(cfg, deps.decider);
      const apiServer = new ApiServer({
        registry: runtime.registry,
        guard: runtime.guard,
        orchestrator: runtime.orchestrator,
        sessions: runtime.sessions,
        apiToken: cfg.server.apiToken,
        insecure: opts.insecure === true,
        corsOrigins: cfg.server.corsOrigins,
      });
      apiServer.listen(port);

      const shutdown = (): void => {
        console.log("\n[errand] Shutting down...");
        apiServer.shutdown().then(
          () => process.exit(0),
          (err: unknown) => {
            console.error("[errand] Shutdown failed:", err);
            process.exit(1);
          },
        );
      };
      process.once("SIGTERM", shutdown);
      process.once("SIGINT", shutdown);
    });

  return program;
}
