import { fork } from "node:child_process";
import { fileURLToPath } from "node:url";
import type { CapabilityHandler } from "@errand/schemas";
import { stringArg } from "./args.js";
import { sanitizeEnv } from "./process.js";

export const MAX_ROWS = 500;

const RUNNER_PATH = fileURLToPath(new URL("./sql-runner.mjs", import.meta.url));

type SqlValue = string | number | bigint | null;
type SqlParams = SqlValue[] | Record<string, SqlValue>;

interface SqlJob {
  path: string;
  query: string;
  params: SqlParams;
  maxRows: number;
}

type RunnerReply = { ok: true; result: Record<string, unknown> } | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRunnerReply(value: unknown): value is RunnerReply {
  if (!isRecord(value)) return false;
  return value.ok === true ? isRecord(value.result) : value.ok === false && typeof value.error === "string";
}

function toSqlValue(value: unknown, label: string): SqlValue {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "bigint") return value;
  if (typeof value === "boolean") return Number(value);
  throw new Error(`${label} must be a scalar`);
}

function toParams(value: unknown): SqlParams {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) return value.map((v, i) => toSqlValue(v, `params[${i}]`));
  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, v]) => [key, toSqlValue(v, `params.${key}`)]));
  }
  throw new Error("params must be an array or an object");
}

const LEADING_NOISE = /^(?:\s+|--[^\n]*(?:\n|$)|\/\*[\s\S]*?\*\/)/;

/** First keyword of the statement, upper-cased, after comments and whitespace. */
export function leadingKeyword(query: string): string {
  let rest = query;
  for (let m = LEADING_NOISE.exec(rest); m !== null && m[0].length > 0; m = LEADING_NOISE.exec(rest)) {
    rest = rest.slice(m[0].length);
  }
  return /^[A-Za-z]+/.exec(rest)?.[0].toUpperCase() ?? "";
}

/**
 * Refuses statements that open or create database files other than the one
 * named by the `database` argument.
 */
export function assertStatementAllowed(query: string): void {
  const keyword = leadingKeyword(query);
  if (keyword === "ATTACH" || keyword === "DETACH") {
    throw new Error(`${keyword} statements are not permitted`);
  }
  if (keyword === "VACUUM" && /\bINTO\b/i.test(query)) {
    throw new Error("VACUUM INTO is not permitted");
  }
}

function runInChild(job: SqlJob, signal: AbortSignal): Promise<Record<string, unknown>> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error("query aborted"));
      return;
    }
    const child = fork(RUNNER_PATH, [], {
      execArgv: [],
      env: sanitizeEnv(),
      serialization: "advanced",
      stdio: ["ignore", "ignore", "ignore", "ipc"],
    });
    let settled = false;
    const settle = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      signal.removeEventListener("abort", onAbort);
      fn();
    };
    function onAbort(): void {
      settle(() => reject(new Error("query aborted")));
      if (!child.kill("SIGKILL")) console.warn(`[tools] Failed to stop SQL process ${child.pid ?? "?"}`);
    }
    signal.addEventListener("abort", onAbort, { once: true });
    child.once("message", (reply: unknown) => settle(() => {
      if (!isRunnerReply(reply)) reject(new Error("SQL process sent a malformed reply"));
      else if (reply.ok) resolve(reply.result);
      else reject(new Error(reply.error));
    }));
    child.once("error", (err) => settle(() => reject(err)));
    child.once("exit", (code, sig) => settle(() => {
      reject(new Error(`SQL process exited with ${sig ?? `code ${code ?? "?"}`}`));
    }));
    child.send(job, (err) => {
      if (err) settle(() => reject(err));
    });
  });
}

/**
 * Runs one statement against a SQLite file in the workspace, in a child
 * process that is killed when the call is aborted. Reader statements
 * return rows, the rest return the change count.
 */
export const sqlQueryHandler: CapabilityHandler = async (args, ctx) => {
  const requested = stringArg(args, "database");
  const query = stringArg(args, "query");
  const params = toParams(args.params);
  assertStatementAllowed(query);
  const path = await ctx.resolve(requested);
  return runInChild({ path, query, params, maxRows: MAX_ROWS }, ctx.signal);
};
