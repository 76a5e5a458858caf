import { readdir } from "node:fs/promises";
import type { Dirent } from "node:fs";
import type { CapabilityHandler } from "@errand/schemas";
import { optionalString } from "./args.js";

export const MAX_LIST_ENTRIES = 1000;

export type EntryType = "file" | "directory" | "symlink" | "other";

function entryType(entry: Dirent): EntryType {
  if (entry.isSymbolicLink()) return "symlink";
  if (entry.isDirectory()) return "directory";
  if (entry.isFile()) return "file";
  return "other";
}

export const listFilesHandler: CapabilityHandler = async (args, ctx) => {
  const requested = optionalString(args, "directory") ?? ".";
  const fullPath = await ctx.resolve(requested);
  const entries = await readdir(fullPath, { withFileTypes: true }).catch((err: NodeJS.ErrnoException) => {
    if (err.code === "ENOENT") throw new Error(`Directory not found: ${requested}`);
    if (err.code === "ENOTDIR") throw new Error(`Not a directory: ${requested}`);
    throw err;
  });
  const listed = entries
    .map((e) => ({ name: e.name, type: entryType(e) }))
    .sort((a, b) => a.name.localeCompare(b.name));
  return {
    directory: requested,
    entries: listed.slice(0, MAX_LIST_ENTRIES),
    truncated: listed.length > MAX_LIST_ENTRIES,
  };
};
