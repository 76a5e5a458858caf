import { isAbsolute } from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError } from "@errand/schemas";

export const DEFAULT_CAPABILITIES_DIR = fileURLToPath(new URL("../../../capabilities", import.meta.url));

export type DeciderKind = "openai" | "mock";

export interface ErrandConfig {
  llm: {
    baseURL: string;
    token?: string;
    model: string;
  };
  decider: DeciderKind;
  workspaceRoot: string;
  capabilitiesDir: string;
  run: {
    maxIterations: number;
    maxDurationMs: number;
    windowTurns: number;
    decisionRetries: number;
    decisionTimeoutMs: number;
  };
  timeouts: {
    networkMs: number;
    processMs: number;
    defaultMs: number;
  };
  maxCommandLength: number;
  server: {
    port: number;
    apiToken?: string;
    corsOrigins?: string[];
  };
}

type Env = Readonly<Record<string, string | undefined>>;

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === "object" && child !== null) deepFreeze(child);
  }
  return Object.freeze(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Builds the process configuration from environment variables. Every
 * invalid value is reported at once in a single ConfigError.
 */
export function loadConfig(env: Env = process.env): Readonly<ErrandConfig> {
  const problems: string[] = [];

  const integer = (key: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number => {
    const raw = nonEmpty(env[key]);
    if (raw === undefined) return fallback;
    const n = Number(raw);
    if (!Number.isInteger(n) || n < min || n > max) {
      problems.push(max === Number.MAX_SAFE_INTEGER
        ? `${key} must be an integer >= ${min} (got "${raw}")`
        : `${key} must be an integer between ${min} and ${max} (got "${raw}")`);
      return fallback;
    }
    return n;
  };

  const baseURL = nonEmpty(env.ERRAND_LLM_BASE_URL) ?? "https://api.openai.com/v1/";
  if (!URL.canParse(baseURL)) problems.push(`ERRAND_LLM_BASE_URL must be a URL (got "${baseURL}")`);
  const token = nonEmpty(env.ERRAND_LLM_TOKEN) ?? nonEmpty(env.AIPROXY_TOKEN) ?? nonEmpty(env.OPENAI_API_KEY);

  const rawDecider = nonEmpty(env.ERRAND_DECIDER) ?? (token ? "openai" : "mock");
  let decider: DeciderKind = "mock";
  if (rawDecider === "openai" || rawDecider === "mock") {
    decider = rawDecider;
  } else {
    problems.push(`ERRAND_DECIDER must be "openai" or "mock" (got "${rawDecider}")`);
  }
  if (decider === "openai" && !token) {
    problems.push("ERRAND_LLM_TOKEN (or AIPROXY_TOKEN / OPENAI_API_KEY) is required for the openai decider");
  }

  const workspaceRoot = nonEmpty(env.ERRAND_WORKSPACE) ?? "/data";
  if (!isAbsolute(workspaceRoot)) problems.push(`ERRAND_WORKSPACE must be an absolute path (got "${workspaceRoot}")`);

  const apiToken = nonEmpty(env.ERRAND_API_TOKEN);
  const corsRaw = nonEmpty(env.ERRAND_CORS_ORIGINS);
  const corsOrigins = corsRaw?.split(",").map((s) => s.trim()).filter((s) => s.length > 0);

  const config: ErrandConfig = {
    llm: {
      baseURL,
      ...(token ? { token } : {}),
      model: nonEmpty(env.ERRAND_CHAT_MODEL) ?? "gpt-4o-mini",
    },
    decider,
    workspaceRoot,
    capabilitiesDir: nonEmpty(env.ERRAND_CAPABILITIES_DIR) ?? DEFAULT_CAPABILITIES_DIR,
    run: {
      maxIterations: integer("ERRAND_MAX_ITERATIONS", 20, 1),
      maxDurationMs: integer("ERRAND_MAX_DURATION_MS", 600_000, 1000),
      windowTurns: integer("ERRAND_WINDOW_TURNS", 20, 1),
      decisionRetries: integer("ERRAND_DECISION_RETRIES", 3, 0),
      decisionTimeoutMs: integer("ERRAND_DECISION_TIMEOUT_MS", 120_000, 1000),
    },
    timeouts: {
      networkMs: integer("ERRAND_TIMEOUT_NETWORK_MS", 30_000, 100),
      processMs: integer("ERRAND_TIMEOUT_PROCESS_MS", 300_000, 100),
      defaultMs: integer("ERRAND_TIMEOUT_DEFAULT_MS", 30_000, 100),
    },
    maxCommandLength: integer("ERRAND_MAX_COMMAND_LENGTH", 8192, 1),
    server: {
      port: integer("ERRAND_PORT", 8000, 1, 65535),
      ...(apiToken ? { apiToken } : {}),
      ...(corsOrigins && corsOrigins.length > 0 ? { corsOrigins } : {}),
    },
  };

  if (problems.length > 0) throw new ConfigError(problems);
  return deepFreeze(config);
}
