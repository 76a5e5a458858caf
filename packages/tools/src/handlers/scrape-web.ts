import TurndownService from "turndown";
import type { CapabilityHandler } from "@errand/schemas";
import { stringArg, truncate } from "./args.js";
import { MAX_RESPONSE_BODY_SIZE, readBodyWithLimit } from "./fetch.js";

export const MAX_MARKDOWN_CHARS = 50_000;

const turndown = new TurndownService({ headingStyle: "atx", codeBlockStyle: "fenced" });
turndown.remove(["head", "title", "script", "style", "noscript", "iframe"]);

export function htmlToMarkdown(html: string): string {
  return turndown.turndown(html).replace(/\n{3,}/g, "\n\n").trim();
}

/** Fetches a page and returns it as Markdown. */
export const scrapeWebHandler: CapabilityHandler = async (args, ctx) => {
  const url = stringArg(args, "url");
  const response = await fetch(url, {
    signal: ctx.signal,
    headers: { "user-agent": "errand/0.1 (+scrape_web)", accept: "text/html,text/plain;q=0.9,*/*;q=0.5" },
  });
  if (!response.ok) throw new Error(`HTTP ${response.status} fetching ${url}`);
  const raw = await readBodyWithLimit(response, MAX_RESPONSE_BODY_SIZE);
  const contentType = response.headers.get("content-type") ?? "";
  const isHtml = contentType.includes("html") || /^\s*<(!doctype|html)/i.test(raw);
  const titleMatch = isHtml ? /<title[^>]*>([^<]*)<\/title>/i.exec(raw) : null;
  const content = isHtml ? htmlToMarkdown(raw) : raw;
  return {
    url: response.url || url,
    status: response.status,
    title: titleMatch?.[1]?.trim() ?? null,
    content: truncate(content, MAX_MARKDOWN_CHARS),
  };
};
