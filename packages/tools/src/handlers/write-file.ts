import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { CapabilityHandler } from "@errand/schemas";
import { stringArg } from "./args.js";

export const MAX_WRITE_SIZE = 10 * 1024 * 1024;

export const writeFileHandler: CapabilityHandler = async (args, ctx) => {
  const requested = stringArg(args, "path");
  const content = stringArg(args, "content");
  const append = args.append === true;

  const contentBytes = Buffer.byteLength(content, "utf-8");
  if (contentBytes > MAX_WRITE_SIZE) {
    throw new Error(`Content is ${contentBytes} bytes, exceeding the ${MAX_WRITE_SIZE} byte write limit`);
  }

  const fullPath = await ctx.resolve(requested);
  await mkdir(dirname(fullPath), { recursive: true });
  if (append) {
    await appendFile(fullPath, content, "utf-8");
  } else {
    await writeFile(fullPath, content, { encoding: "utf-8", signal: ctx.signal });
  }
  return { path: requested, bytes_written: contentBytes, appended: append };
};
