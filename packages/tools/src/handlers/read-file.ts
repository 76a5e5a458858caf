import { readFile, stat } from "node:fs/promises";
import type { CapabilityHandler } from "@errand/schemas";
import { stringArg } from "./args.js";

export const MAX_READ_SIZE = 10 * 1024 * 1024;

export const readFileHandler: CapabilityHandler = async (args, ctx) => {
  const requested = stringArg(args, "path");
  const fullPath = await ctx.resolve(requested);
  const stats = await stat(fullPath).catch(() => null);
  if (!stats) throw new Error(`File not found: ${requested}`);
  if (!stats.isFile()) throw new Error(`Not a regular file: ${requested}`);
  if (stats.size > MAX_READ_SIZE) {
    throw new Error(`File "${requested}" is ${stats.size} bytes, exceeding the ${MAX_READ_SIZE} byte limit`);
  }
  const content = await readFile(fullPath, { encoding: "utf-8", signal: ctx.signal });
  return { path: requested, content, size_bytes: stats.size };
};
