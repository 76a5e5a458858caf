export { ConversationStore, DEFAULT_WINDOW_TURNS } from "./conversation-store.js";
export {
  SessionRegistry,
  SessionBusyError,
  DEFAULT_SESSION_ID,
  SESSION_ID_PATTERN,
  isValidSessionId,
} from "./session-registry.js";
export type { SessionLease, SessionInfo } from "./session-registry.js";
