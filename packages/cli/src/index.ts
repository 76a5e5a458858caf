#!/usr/bin/env node
import "dotenv/config";
import { buildProgram } from "./program.js";

process.on("unhandledRejection", (reason) => {
  console.error("[errand] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[errand] Uncaught exception:", err);
  process.exit(1);
});

await buildProgram().parseAsync(process.argv);
