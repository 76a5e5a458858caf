import type { CapabilityHandler } from "@errand/schemas";
import { readFileHandler } from "./read-file.js";
import { writeFileHandler } from "./write-file.js";
import { listFilesHandler } from "./list-files.js";
import { deleteFileHandler } from "./delete-file.js";
import { executeCommandHandler } from "./execute-command.js";
import { runCodeHandler } from "./run-code.js";
import { sqlQueryHandler } from "./sql-query.js";
import { httpRequestHandler } from "./http-request.js";
import { scrapeWebHandler } from "./scrape-web.js";

export {
  readFileHandler,
  writeFileHandler,
  listFilesHandler,
  deleteFileHandler,
  executeCommandHandler,
  runCodeHandler,
  sqlQueryHandler,
  httpRequestHandler,
  scrapeWebHandler,
};
export { sanitizeEnv, redactSecrets, runProcess } from "./process.js";
export type { ProcessOutput } from "./process.js";
export { htmlToMarkdown } from "./scrape-web.js";

/** Handler per capability name; manifests are matched against this table. */
export const builtinHandlers: Readonly<Record<string, CapabilityHandler>> = Object.freeze({
  read_file: readFileHandler,
  write_file: writeFileHandler,
  list_files: listFilesHandler,
  delete_file: deleteFileHandler,
  execute_command: executeCommandHandler,
  run_code: runCodeHandler,
  sql_query: sqlQueryHandler,
  http_request: httpRequestHandler,
  scrape_web: scrapeWebHandler,
});
