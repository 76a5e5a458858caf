import { basename, dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import { readlink, realpath } from "node:fs/promises";
import type { CapabilityDescriptor, GuardVerdict, SandboxPolicy } from "@errand/schemas";
import { errorMessage } from "@errand/schemas";

export const DEFAULT_MAX_COMMAND_LENGTH = 8192;
const MAX_LINK_HOPS = 32;
const COMMAND_ARGUMENTS = ["command", "code"] as const;
const ALLOWED_PROTOCOLS = new Set(["http:", "https:"]);

export function createSandboxPolicy(
  workspaceRoot: string,
  maxCommandLength = DEFAULT_MAX_COMMAND_LENGTH,
): SandboxPolicy {
  if (!isAbsolute(workspaceRoot)) {
    throw new Error(`Workspace root must be an absolute path: "${workspaceRoot}"`);
  }
  return Object.freeze({
    workspace_root: resolve(workspaceRoot),
    allow_delete: false,
    allow_outside_workspace: false,
    max_command_length: maxCommandLength,
  });
}

/**
 * Resolve a path following symlinks. Segments that don't exist yet are
 * appended to the canonical form of the deepest existing ancestor; a
 * dangling symlink is followed to where it points.
 */
export async function canonicalize(targetPath: string, hops = 0): Promise<string> {
  const abs = resolve(targetPath);
  const real = await realpath(abs).catch(() => null);
  if (real !== null) return real;
  const parent = dirname(abs);
  if (parent === abs) return abs;
  const candidate = join(await canonicalize(parent, hops), basename(abs));
  const link = await readlink(candidate).catch(() => null);
  if (link === null) return candidate;
  if (hops >= MAX_LINK_HOPS) throw new Error(`Too many symbolic links resolving "${targetPath}"`);
  return canonicalize(resolve(dirname(candidate), link), hops + 1);
}

export function isWithin(root: string, candidate: string): boolean {
  if (candidate === root) return true;
  const rel = relative(root, candidate);
  return rel !== "" && rel.split(sep)[0] !== ".." && !isAbsolute(rel);
}

export interface ResolvedPath {
  inside: boolean;
  path: string;
}

/**
 * Sole enforcement point for the workspace boundary and the no-delete rule.
 *
 * Shell and code text handed to process_exec capabilities is not inspected:
 * a command can still reach outside the workspace on its own. Only declared
 * path arguments and a few structural limits are checked. SQL text is only
 * screened for ATTACH, DETACH and VACUUM INTO, which name other database files.
 */
export class SandboxGuard {
  readonly policy: SandboxPolicy;
  private rootPromise: Promise<string> | undefined;

  constructor(policy: SandboxPolicy) {
    this.policy = policy;
  }

  get workspaceRoot(): string {
    return this.policy.workspace_root;
  }

  /** Workspace root with its own symlinks resolved (e.g. /tmp → /private/tmp). */
  canonicalRoot(): Promise<string> {
    this.rootPromise ??= canonicalize(this.policy.workspace_root);
    return this.rootPromise;
  }

  async resolvePath(path: string): Promise<ResolvedPath> {
    const root = await this.canonicalRoot();
    const canonical = await canonicalize(resolve(this.policy.workspace_root, path));
    return { inside: isWithin(root, canonical), path: canonical };
  }

  async validate(descriptor: CapabilityDescriptor, args: Record<string, unknown>): Promise<GuardVerdict> {
    const { manifest } = descriptor;
    if (manifest.effect === "filesystem_delete") {
      return { ok: false, reason: "delete not permitted" };
    }

    for (const name of manifest.path_arguments) {
      const value = args[name];
      if (value === undefined) continue;
      if (typeof value !== "string") {
        return { ok: false, reason: `path "${name}" must be a string` };
      }
      let resolved: ResolvedPath;
      try {
        resolved = await this.resolvePath(value);
      } catch (err) {
        return { ok: false, reason: `path "${name}" could not be resolved: ${errorMessage(err)}` };
      }
      if (!resolved.inside) {
        return { ok: false, reason: `path "${name}" resolves outside the workspace` };
      }
    }

    if (manifest.effect === "process_exec") {
      const text = COMMAND_ARGUMENTS.map((key) => args[key]).find((v): v is string => typeof v === "string");
      if (text === undefined || text.trim() === "") {
        return { ok: false, reason: "command is empty" };
      }
      if (text.length > this.policy.max_command_length) {
        return { ok: false, reason: `command exceeds ${this.policy.max_command_length} characters` };
      }
    }

    if (manifest.effect === "network" && args.url !== undefined) {
      if (typeof args.url !== "string" || !hasAllowedProtocol(args.url)) {
        return { ok: false, reason: "url must be an http or https URL" };
      }
    }

    return { ok: true };
  }
}

function hasAllowedProtocol(url: string): boolean {
  try {
    return ALLOWED_PROTOCOLS.has(new URL(url).protocol);
  } catch {
    return false;
  }
}
