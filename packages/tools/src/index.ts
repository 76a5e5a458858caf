export { CapabilityRegistry, DEFAULT_TIMEOUTS, MANIFEST_FILENAME } from "./capability-registry.js";
export type { CapabilityRegistryOptions, CapabilityTimeouts, InvokeOptions } from "./capability-registry.js";
export {
  SandboxGuard,
  createSandboxPolicy,
  canonicalize,
  isWithin,
  DEFAULT_MAX_COMMAND_LENGTH,
} from "./sandbox-guard.js";
export type { ResolvedPath } from "./sandbox-guard.js";
export {
  builtinHandlers,
  readFileHandler,
  writeFileHandler,
  listFilesHandler,
  deleteFileHandler,
  executeCommandHandler,
  runCodeHandler,
  sqlQueryHandler,
  httpRequestHandler,
  scrapeWebHandler,
  sanitizeEnv,
  redactSecrets,
  htmlToMarkdown,
} from "./handlers/index.js";
