import { readFile, readdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import yaml from "js-yaml";
import type {
  CapabilityContext,
  CapabilityDescriptor,
  CapabilityHandler,
  CapabilityManifest,
  CapabilityPayload,
  CapabilityResult,
  CapabilitySummary,
  SideEffectClass,
} from "@errand/schemas";
import {
  AbortedError,
  ErrandError,
  ManifestError,
  TimeoutError,
  errorMessage,
  isCapabilityManifest,
  raceAbort,
  validateCapabilityInput,
  validateCapabilityManifestData,
  withTimeout,
} from "@errand/schemas";
import type { SandboxGuard } from "./sandbox-guard.js";

export const MANIFEST_FILENAME = "capability.yaml";

export type CapabilityTimeouts = Record<SideEffectClass, number>;

export const DEFAULT_TIMEOUTS: Readonly<CapabilityTimeouts> = Object.freeze({
  read_only: 30_000,
  filesystem_write: 30_000,
  filesystem_delete: 30_000,
  network: 30_000,
  process_exec: 300_000,
});

export interface CapabilityRegistryOptions {
  guard: SandboxGuard;
  timeouts?: Partial<CapabilityTimeouts>;
}

export interface InvokeOptions {
  /** Aborting abandons the call; the result is `error: "aborted"`. */
  signal?: AbortSignal;
}

/**
 * Name → {manifest, handler} dispatch table. Built at startup, then sealed
 * and shared read-only by every run.
 */
export class CapabilityRegistry {
  private capabilities = new Map<string, CapabilityDescriptor>();
  private sealed = false;
  private guard: SandboxGuard;
  private timeouts: CapabilityTimeouts;

  constructor(options: CapabilityRegistryOptions) {
    this.guard = options.guard;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };
  }

  register(manifest: CapabilityManifest, handler: CapabilityHandler): CapabilityDescriptor {
    if (this.sealed) {
      throw new ErrandError("REGISTRY_SEALED", `Cannot register "${manifest.name}": registry is sealed`);
    }
    const validation = validateCapabilityManifestData(manifest);
    if (!validation.valid) {
      throw new ManifestError(`Invalid capability manifest "${manifest.name}": ${validation.errors.join(", ")}`);
    }
    if (this.capabilities.has(manifest.name)) {
      throw new ManifestError(`Capability "${manifest.name}" is already registered`);
    }
    const frozen: Readonly<CapabilityManifest> = Object.freeze({
      ...manifest,
      path_arguments: Object.freeze([...manifest.path_arguments]),
    });
    const descriptor: CapabilityDescriptor = Object.freeze({ manifest: frozen, handler });
    this.capabilities.set(manifest.name, descriptor);
    return descriptor;
  }

  async loadFromFile(filePath: string, handlers: Readonly<Record<string, CapabilityHandler>>): Promise<CapabilityDescriptor> {
    if (!existsSync(filePath)) throw new ManifestError(`Capability manifest not found: ${filePath}`);
    const content = await readFile(filePath, "utf-8");
    const data: unknown = yaml.load(content);
    if (!isCapabilityManifest(data)) {
      const { errors } = validateCapabilityManifestData(data);
      throw new ManifestError(`Invalid capability manifest at "${filePath}": ${errors.join(", ")}`);
    }
    const handler = handlers[data.name];
    if (!handler) throw new ManifestError(`No handler for capability "${data.name}" (${filePath})`);
    return this.register(data, handler);
  }

  async loadFromDirectory(dirPath: string, handlers: Readonly<Record<string, CapabilityHandler>>): Promise<CapabilityDescriptor[]> {
    if (!existsSync(dirPath)) return [];
    const entries = await readdir(dirPath, { withFileTypes: true });
    const loaded: CapabilityDescriptor[] = [];
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      if (!entry.isDirectory()) continue;
      const manifestPath = join(dirPath, entry.name, MANIFEST_FILENAME);
      if (!existsSync(manifestPath)) continue;
      try {
        loaded.push(await this.loadFromFile(manifestPath, handlers));
      } catch (err) {
        console.error(`[registry] Failed to load capability "${entry.name}": ${errorMessage(err)}`);
      }
    }
    return loaded;
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get(name: string): CapabilityDescriptor | undefined {
    return this.capabilities.get(name);
  }

  list(): CapabilityDescriptor[] {
    return [...this.capabilities.values()];
  }

  describe(): CapabilitySummary[] {
    return this.list().map(({ manifest }) => ({
      name: manifest.name,
      description: manifest.description,
      effect: manifest.effect,
      input_schema: manifest.input_schema,
    }));
  }

  timeoutFor(manifest: Readonly<CapabilityManifest>): number {
    return manifest.timeout_ms ?? this.timeouts[manifest.effect];
  }

  /** Never throws: every failure comes back as `success: false`. */
  async invoke(name: string, args: Record<string, unknown>, options: InvokeOptions = {}): Promise<CapabilityResult> {
    const descriptor = this.capabilities.get(name);
    if (!descriptor) return failure("unknown capability");

    const { manifest, handler } = descriptor;
    const validation = validateCapabilityInput(args, manifest.input_schema);
    if (!validation.valid) {
      return failure(`invalid arguments: ${validation.errors.join(", ")}`);
    }
    if (options.signal?.aborted) return failure("aborted");

    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener("abort", forwardAbort, { once: true });
    const context: CapabilityContext = {
      workspaceRoot: this.guard.workspaceRoot,
      signal: controller.signal,
      resolve: async (path) => {
        const resolved = await this.guard.resolvePath(path);
        if (!resolved.inside) throw new Error(`path "${path}" resolves outside the workspace`);
        return resolved.path;
      },
    };
    const label = `Capability "${name}"`;

    try {
      const output = await withTimeout(
        raceAbort(handler(args, context), controller.signal, label),
        this.timeoutFor(manifest),
        label,
      );
      return { success: true, payload: toPayload(output), error: null };
    } catch (err) {
      if (err instanceof TimeoutError) {
        controller.abort();
        return failure("timeout");
      }
      if (err instanceof AbortedError) return failure("aborted");
      return failure(errorMessage(err));
    } finally {
      options.signal?.removeEventListener("abort", forwardAbort);
    }
  }
}

function failure(error: string): CapabilityResult {
  return { success: false, payload: null, error };
}

function toPayload(value: unknown): CapabilityPayload {
  if (value === undefined || value === null) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (Array.isArray(value)) return value;
  if (typeof value === "object") return Object.fromEntries(Object.entries(value));
  return String(value);
}
