import type { CapabilityHandler } from "@errand/schemas";
import { optionalRecord, optionalString, stringArg, truncate } from "./args.js";
import { MAX_RESPONSE_BODY_SIZE, headersToRecord, readBodyWithLimit } from "./fetch.js";

export const MAX_BODY_CHARS = 100_000;
const BODYLESS_METHODS = new Set(["GET", "HEAD"]);

export const httpRequestHandler: CapabilityHandler = async (args, ctx) => {
  const url = stringArg(args, "url");
  const method = (optionalString(args, "method") ?? "GET").toUpperCase();
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(optionalRecord(args, "headers") ?? {})) {
    headers[key] = String(value);
  }
  let body = optionalString(args, "body");
  if (body === undefined && args.json !== undefined) {
    body = JSON.stringify(args.json);
    headers["content-type"] ??= "application/json";
  }

  const init: RequestInit = { method, headers, signal: ctx.signal, redirect: "follow" };
  if (body !== undefined && !BODYLESS_METHODS.has(method)) init.body = body;
  const response = await fetch(url, init);
  const text = await readBodyWithLimit(response, MAX_RESPONSE_BODY_SIZE);
  return {
    status: response.status,
    ok: response.ok,
    headers: headersToRecord(response.headers),
    body: truncate(text, MAX_BODY_CHARS),
  };
};
