import { LLMDecider, MockDecider } from "@errand/planner";
import type { ModelCallFn, ModelCallResult } from "@errand/planner";
import type { DecisionFunction } from "@errand/schemas";
import { ErrandError, sleep } from "@errand/schemas";
import type { ErrandConfig } from "./config.js";

const MAX_RETRIES = 3;
const BASE_DELAY_MS = 500;

export function isTransientError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();
  if (msg.includes("econnreset") || msg.includes("econnrefused") || msg.includes("etimedout") || msg.includes("fetch failed") || msg.includes("socket hang up")) return true;
  // HTTP 5xx or 429 from SDK errors
  if ("status" in err && typeof err.status === "number") {
    return err.status === 429 || err.status >= 500;
  }
  return false;
}

export async function withRetry<T>(fn: () => Promise<T>, signal?: AbortSignal, baseDelayMs = BASE_DELAY_MS): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt < MAX_RETRIES && isTransientError(err) && !signal?.aborted) {
        const delay = baseDelayMs * Math.pow(2, attempt) * (0.5 + Math.random() * 0.5);
        await sleep(delay, signal);
        continue;
      }
      throw err;
    }
  }
  throw lastError;
}

export interface OpenAICallOptions {
  baseURL: string;
  apiKey: string;
  model: string;
  retryDelayMs?: number;
}

/**
 * Chat-completions call in JSON mode. Works against any OpenAI-compatible
 * endpoint, including proxies that take their own token.
 */
export function createOpenAICallFn(options: OpenAICallOptions): ModelCallFn {
  const { baseURL, apiKey, model } = options;

  // Cache client across calls for HTTP connection pooling; clear on failure so next call retries
  let clientPromise: Promise<InstanceType<typeof import("openai").default>> | null = null;

  return async (systemPrompt: string, userPrompt: string, signal: AbortSignal): Promise<ModelCallResult> => {
    if (!clientPromise) {
      clientPromise = import("openai").then(
        ({ default: OpenAI }) => new OpenAI({ apiKey, baseURL, maxRetries: 0 }),
      ).catch((err: unknown) => { clientPromise = null; throw err; });
    }
    const client = await clientPromise;
    return withRetry(async () => {
      const response = await client.chat.completions.create(
        {
          model,
          temperature: 0,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: systemPrompt },
            { role: "user", content: userPrompt },
          ],
        },
        { signal },
      );
      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new ErrandError("DECISION_UPSTREAM", "Model returned no content");
      }
      return { text: content };
    }, signal, options.retryDelayMs);
  };
}

export function createDecider(config: Readonly<ErrandConfig>): DecisionFunction {
  switch (config.decider) {
    case "mock":
      return new MockDecider();
    case "openai": {
      const token = config.llm.token;
      if (!token) {
        throw new ErrandError("CONFIG_INVALID", "A model token is required for the openai decider");
      }
      const callModel = createOpenAICallFn({ baseURL: config.llm.baseURL, apiKey: token, model: config.llm.model });
      return new LLMDecider(callModel, { workspaceRoot: config.workspaceRoot });
    }
  }
}
