import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import { mkdtemp, mkdir, realpath, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import type { CapabilityHandler, CapabilityManifest } from "@errand/schemas";
import { CapabilityRegistry, DEFAULT_TIMEOUTS } from "./capability-registry.js";
import { SandboxGuard, createSandboxPolicy } from "./sandbox-guard.js";
import { builtinHandlers } from "./handlers/index.js";

const CAPABILITIES_DIR = fileURLToPath(new URL("../../../capabilities", import.meta.url));

const echoManifest = (overrides: Partial<CapabilityManifest> = {}): CapabilityManifest => ({
  name: "echo",
  version: "1.0.0",
  description: "Echo a message",
  effect: "read_only",
  input_schema: {
    type: "object",
    required: ["msg"],
    properties: { msg: { type: "string" } },
    additionalProperties: false,
  },
  path_arguments: [],
  ...overrides,
});

const echoHandler: CapabilityHandler = async (args) => ({ echo: args.msg });

describe("CapabilityRegistry", () => {
  let root: string;
  let registry: CapabilityRegistry;

  beforeEach(async () => {
    root = await realpath(await mkdtemp(join(tmpdir(), "errand-registry-")));
    registry = new CapabilityRegistry({ guard: new SandboxGuard(createSandboxPolicy(root)) });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("registers and describes capabilities", () => {
    registry.register(echoManifest(), echoHandler);
    expect(registry.get("echo")?.manifest.name).toBe("echo");
    expect(registry.describe()).toEqual([
      {
        name: "echo",
        description: "Echo a message",
        effect: "read_only",
        input_schema: echoManifest().input_schema,
      },
    ]);
  });

  it("freezes descriptors", () => {
    const descriptor = registry.register(echoManifest(), echoHandler);
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.manifest)).toBe(true);
  });

  it("rejects invalid manifests and duplicates", () => {
    expect(() => registry.register(echoManifest({ name: "Bad Name!" }), echoHandler)).toThrow("Invalid capability manifest");
    registry.register(echoManifest(), echoHandler);
    expect(() => registry.register(echoManifest(), echoHandler)).toThrow('Capability "echo" is already registered');
  });

  it("refuses registration once sealed", () => {
    registry.seal();
    expect(registry.isSealed).toBe(true);
    expect(() => registry.register(echoManifest(), echoHandler)).toThrow("registry is sealed");
  });

  it("invokes a capability and wraps its output", async () => {
    registry.register(echoManifest(), echoHandler);
    expect(await registry.invoke("echo", { msg: "hi" })).toEqual({ success: true, payload: { echo: "hi" }, error: null });
  });

  it("reports unknown capabilities without throwing", async () => {
    expect(await registry.invoke("nope", {})).toEqual({ success: false, payload: null, error: "unknown capability" });
  });

  it("validates arguments against the input schema", async () => {
    const handler = vi.fn(echoHandler);
    registry.register(echoManifest(), handler);
    const result = await registry.invoke("echo", { msg: 1 });
    expect(result).toEqual({ success: false, payload: null, error: "invalid arguments: /msg: must be string" });
    expect(handler).not.toHaveBeenCalled();
  });

  it("turns handler exceptions into failed results", async () => {
    registry.register(echoManifest(), async () => {
      throw new Error("disk on fire");
    });
    expect(await registry.invoke("echo", { msg: "x" })).toEqual({ success: false, payload: null, error: "disk on fire" });
  });

  it("times out slow handlers and aborts their signal", async () => {
    let seen: AbortSignal | undefined;
    registry.register(echoManifest({ timeout_ms: 100 }), (_args, ctx) => {
      seen = ctx.signal;
      return new Promise(() => undefined);
    });
    const result = await registry.invoke("echo", { msg: "x" });
    expect(result).toEqual({ success: false, payload: null, error: "timeout" });
    expect(seen?.aborted).toBe(true);
  });

  it("uses per-class default timeouts unless the manifest overrides", () => {
    const custom = new CapabilityRegistry({
      guard: new SandboxGuard(createSandboxPolicy(root)),
      timeouts: { network: 1234 },
    });
    expect(custom.timeoutFor(echoManifest({ effect: "network" }))).toBe(1234);
    expect(custom.timeoutFor(echoManifest({ effect: "process_exec" }))).toBe(DEFAULT_TIMEOUTS.process_exec);
    expect(custom.timeoutFor(echoManifest({ effect: "process_exec", timeout_ms: 500 }))).toBe(500);
    expect(DEFAULT_TIMEOUTS.network).toBe(30_000);
    expect(DEFAULT_TIMEOUTS.process_exec).toBe(300_000);
  });

  it("abandons the call when the caller's signal aborts", async () => {
    registry.register(echoManifest(), () => new Promise(() => undefined));
    const controller = new AbortController();
    const pending = registry.invoke("echo", { msg: "x" }, { signal: controller.signal });
    controller.abort();
    expect(await pending).toEqual({ success: false, payload: null, error: "aborted" });
  });

  it("does not start a call for an already aborted signal", async () => {
    const handler = vi.fn(echoHandler);
    registry.register(echoManifest(), handler);
    const controller = new AbortController();
    controller.abort();
    expect((await registry.invoke("echo", { msg: "x" }, { signal: controller.signal })).error).toBe("aborted");
    expect(handler).not.toHaveBeenCalled();
  });

  it("gives handlers a resolver rooted at the workspace", async () => {
    registry.register(echoManifest(), async (_args, ctx) => ({ root: ctx.workspaceRoot, resolved: await ctx.resolve("a/b.txt") }));
    const result = await registry.invoke("echo", { msg: "x" });
    expect(result.payload).toEqual({ root, resolved: join(root, "a", "b.txt") });
  });

  it("refuses to resolve paths that leave the workspace", async () => {
    registry.register(echoManifest(), async (_args, ctx) => ctx.resolve("/etc/passwd"));
    const result = await registry.invoke("echo", { msg: "x" });
    expect(result).toEqual({ success: false, payload: null, error: 'path "/etc/passwd" resolves outside the workspace' });
  });

  it("loads every bundled manifest with its handler", async () => {
    const loaded = await registry.loadFromDirectory(CAPABILITIES_DIR, builtinHandlers);
    expect(loaded.map((d) => d.manifest.name)).toEqual([
      "delete_file",
      "execute_command",
      "http_request",
      "list_files",
      "read_file",
      "run_code",
      "scrape_web",
      "sql_query",
      "write_file",
    ]);
    expect(registry.get("delete_file")?.manifest.effect).toBe("filesystem_delete");
    expect(registry.get("execute_command")?.manifest.high_risk).toBe(true);
    expect(registry.get("sql_query")?.manifest.high_risk).toBe(true);
  });

  it("skips manifests that fail to load and logs why", async () => {
    const dir = join(root, "caps");
    await mkdir(join(dir, "echo"), { recursive: true });
    await mkdir(join(dir, "orphan"), { recursive: true });
    await mkdir(join(dir, "broken"), { recursive: true });
    await writeFile(join(dir, "echo", "capability.yaml"), [
      "name: echo",
      'version: "1.0.0"',
      "description: Echo",
      "effect: read_only",
      "path_arguments: []",
      "input_schema:",
      "  type: object",
    ].join("\n"));
    await writeFile(join(dir, "orphan", "capability.yaml"), [
      "name: orphan",
      'version: "1.0.0"',
      "description: No handler",
      "effect: read_only",
      "path_arguments: []",
      "input_schema: { type: object }",
    ].join("\n"));
    await writeFile(join(dir, "broken", "capability.yaml"), "name: [unclosed");
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const loaded = await registry.loadFromDirectory(dir, { echo: echoHandler });

    expect(loaded.map((d) => d.manifest.name)).toEqual(["echo"]);
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy.mock.calls[1]?.[0]).toBe(
      `[registry] Failed to load capability "orphan": No handler for capability "orphan" (${join(dir, "orphan", "capability.yaml")})`,
    );
    errorSpy.mockRestore();
  });

  it("returns nothing for a missing directory", async () => {
    expect(await registry.loadFromDirectory(join(root, "missing"), builtinHandlers)).toEqual([]);
  });
});
