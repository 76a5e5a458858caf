import type { CapabilityHandler } from "@errand/schemas";
import { stringArg } from "./args.js";
import { runProcess } from "./process.js";

export const SHELL = "/bin/sh";

/**
 * Runs the command through the shell with the workspace as its working
 * directory. The command text itself is not inspected.
 */
export const executeCommandHandler: CapabilityHandler = async (args, ctx) => {
  const command = stringArg(args, "command");
  return runProcess(SHELL, ["-c", command], { cwd: ctx.workspaceRoot, signal: ctx.signal });
};
