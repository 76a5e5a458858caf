import { ErrandError } from "@errand/schemas";
import { ConversationStore } from "./conversation-store.js";

export const DEFAULT_SESSION_ID = "default";
export const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;
const DEFAULT_MAX_SESSIONS = 1000;

export class SessionBusyError extends ErrandError {
  constructor(sessionId: string) {
    super("SESSION_BUSY", `Session "${sessionId}" is already running a task`);
    this.name = "SessionBusyError";
  }
}

export interface SessionLease {
  readonly sessionId: string;
  readonly store: ConversationStore;
  release(): void;
}

interface SessionEntry {
  store: ConversationStore;
  busy: boolean;
  lastUsed: number;
}

export interface SessionInfo {
  session_id: string;
  turns: number;
  busy: boolean;
}

export function isValidSessionId(id: string): boolean {
  return SESSION_ID_PATTERN.test(id);
}

/**
 * One ConversationStore per session key. A run leases its session's store
 * exclusively, so two runs never append to the same conversation.
 */
export class SessionRegistry {
  private sessions = new Map<string, SessionEntry>();
  private maxSessions: number;

  constructor(maxSessions = DEFAULT_MAX_SESSIONS) {
    this.maxSessions = maxSessions;
  }

  /** Throws SessionBusyError if another run holds the session. */
  acquire(sessionId: string = DEFAULT_SESSION_ID): SessionLease {
    const entry = this.entry(sessionId);
    if (entry.busy) throw new SessionBusyError(sessionId);
    entry.busy = true;
    entry.lastUsed = Date.now();
    let released = false;
    return {
      sessionId,
      store: entry.store,
      release: () => {
        if (released) return;
        released = true;
        entry.busy = false;
        entry.lastUsed = Date.now();
      },
    };
  }

  get(sessionId: string): ConversationStore | undefined {
    return this.sessions.get(sessionId)?.store;
  }

  isBusy(sessionId: string): boolean {
    return this.sessions.get(sessionId)?.busy ?? false;
  }

  /** Empties a session's conversation. Refused while a run holds it. */
  reset(sessionId: string): void {
    const entry = this.sessions.get(sessionId);
    if (!entry) return;
    if (entry.busy) throw new SessionBusyError(sessionId);
    entry.store.reset();
  }

  list(): SessionInfo[] {
    return [...this.sessions.entries()].map(([session_id, e]) => ({
      session_id,
      turns: e.store.size,
      busy: e.busy,
    }));
  }

  get size(): number {
    return this.sessions.size;
  }

  private entry(sessionId: string): SessionEntry {
    if (!isValidSessionId(sessionId)) {
      throw new Error(`Invalid session id "${sessionId}"`);
    }
    let entry = this.sessions.get(sessionId);
    if (!entry) {
      this.evictIdle();
      entry = { store: new ConversationStore(), busy: false, lastUsed: Date.now() };
      this.sessions.set(sessionId, entry);
    }
    return entry;
  }

  // Drops the least recently used idle session when at capacity.
  private evictIdle(): void {
    if (this.sessions.size < this.maxSessions) return;
    let oldestKey: string | undefined;
    let oldestTime = Infinity;
    for (const [key, e] of this.sessions) {
      if (!e.busy && e.lastUsed < oldestTime) {
        oldestKey = key;
        oldestTime = e.lastUsed;
      }
    }
    if (oldestKey !== undefined) this.sessions.delete(oldestKey);
  }
}
