export { ApiServer, MAX_TASK_LENGTH, validateTaskInput, validateSessionIdInput } from "./server.js";
export type { ApiServerConfig } from "./server.js";
