import { execFile } from "node:child_process";
import { truncate } from "./args.js";

const SENSITIVE_ENV_PREFIXES = ["AWS_", "AZURE_", "GCP_", "GOOGLE_", "OPENAI_", "AIPROXY_", "ANTHROPIC_", "GITHUB_", "NPM_TOKEN", "ERRAND_"];
const SENSITIVE_ENV_KEYS = new Set(["TOKEN", "SECRET", "PASSWORD", "CREDENTIAL", "API_KEY", "PRIVATE_KEY", "DATABASE_URL"]);
const SENSITIVE_SUFFIXES = ["_SECRET", "_TOKEN", "_KEY", "_PASSWORD"];

const SECRET_VALUE_PATTERNS = [
  /sk-[A-Za-z0-9_-]{20,}/g,
  /ghp_[A-Za-z0-9]{36,}/g,
  /github_pat_[A-Za-z0-9_]{22,}/g,
  /AKIA[0-9A-Z]{16}/g,
  /Bearer\s+[A-Za-z0-9_.\-/+=]{20,}/g,
  /eyJ[A-Za-z0-9_-]{20,}\.[A-Za-z0-9_-]{20,}/g,
];

export const MAX_OUTPUT_CHARS = 64 * 1024;
const MAX_BUFFER = 4 * 1024 * 1024;

/** Copy of process.env without anything that looks like a credential. */
export function sanitizeEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const clean: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue;
    const upper = key.toUpperCase();
    if (SENSITIVE_ENV_PREFIXES.some((p) => upper.startsWith(p))) continue;
    if (SENSITIVE_ENV_KEYS.has(upper)) continue;
    if (SENSITIVE_SUFFIXES.some((s) => upper.endsWith(s))) continue;
    clean[key] = value;
  }
  return clean;
}

export function redactSecrets(text: string): string {
  let result = text;
  for (const pattern of SECRET_VALUE_PATTERNS) {
    result = result.replace(pattern, "[REDACTED]");
  }
  return result;
}

export interface ProcessOutput {
  exit_code: number;
  stdout: string;
  stderr: string;
}

export interface RunProcessOptions {
  cwd: string;
  signal: AbortSignal;
  input?: string;
}

/**
 * Runs a binary to completion. A non-zero exit is reported in the result,
 * not thrown; only a spawn failure or an abort rejects.
 */
export function runProcess(file: string, args: string[], options: RunProcessOptions): Promise<ProcessOutput> {
  return new Promise((resolvePromise, reject) => {
    const child = execFile(
      file,
      args,
      { cwd: options.cwd, env: sanitizeEnv(), signal: options.signal, maxBuffer: MAX_BUFFER, encoding: "utf-8" },
      (error, stdout, stderr) => {
        if (error && (error.name === "AbortError" || (typeof error.code === "string" && error.code !== "ERR_CHILD_PROCESS_STDIO_MAXBUFFER"))) {
          reject(error.name === "AbortError" ? new Error("process aborted") : new Error(`${error.code}: ${error.message}`));
          return;
        }
        let exitCode = 0;
        if (error) exitCode = typeof error.code === "number" ? error.code : 1;
        resolvePromise({
          exit_code: exitCode,
          stdout: truncate(redactSecrets(stdout), MAX_OUTPUT_CHARS),
          stderr: truncate(redactSecrets(stderr), MAX_OUTPUT_CHARS),
        });
      },
    );
    if (options.input !== undefined && child.stdin) {
      child.stdin.end(options.input);
    }
  });
}
