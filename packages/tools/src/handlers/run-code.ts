import type { CapabilityHandler } from "@errand/schemas";
import { stringArg } from "./args.js";
import { runProcess } from "./process.js";

export type CodeLanguage = "python" | "node";

/** Interpreter per language; each reads the program from stdin. */
export const INTERPRETERS: Record<CodeLanguage, { file: string; args: string[] }> = {
  python: { file: "python3", args: ["-"] },
  node: { file: process.execPath, args: ["--input-type=module", "-"] },
};

function isLanguage(value: string): value is CodeLanguage {
  return Object.hasOwn(INTERPRETERS, value);
}

export const runCodeHandler: CapabilityHandler = async (args, ctx) => {
  const language = stringArg(args, "language");
  const code = stringArg(args, "code");
  if (!isLanguage(language)) throw new Error(`Unsupported language "${language}"`);
  const { file, args: argv } = INTERPRETERS[language];
  const output = await runProcess(file, argv, { cwd: ctx.workspaceRoot, signal: ctx.signal, input: code });
  return { language, ...output };
};
