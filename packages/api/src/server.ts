import express from "express";
import type { Server } from "node:http";
import { readFile, stat } from "node:fs/promises";
import { timingSafeEqual } from "node:crypto";
import type { CapabilityRegistry, SandboxGuard } from "@errand/tools";
import type { Orchestrator } from "@errand/kernel";
import { createTask, reportOutcome } from "@errand/kernel";
import type { SessionLease, SessionRegistry } from "@errand/memory";
import { DEFAULT_SESSION_ID, SessionBusyError, isValidSessionId } from "@errand/memory";
import { errorMessage } from "@errand/schemas";

export const MAX_TASK_LENGTH = 10_000;
const MAX_READ_BYTES = 10 * 1024 * 1024;

/** Structured error logging; omits stack traces in production. */
function logError(label: string, err: unknown): void {
  if (process.env.NODE_ENV === "production") {
    console.error(`[api] ${label}: ${errorMessage(err)}`);
  } else {
    console.error(`[api] ${label}:`, err);
  }
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function bodyField(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return undefined;
  return Object.hasOwn(body, key) ? Reflect.get(body, key) : undefined;
}

/** Returns an error message, or null when the task text is acceptable. */
export function validateTaskInput(task: unknown, maxLength = MAX_TASK_LENGTH): string | null {
  if (typeof task !== "string" || task.trim().length === 0) {
    return "task is required and must be a non-empty string";
  }
  if (task.length > maxLength) {
    return `task must not exceed ${maxLength} characters`;
  }
  return null;
}

export function validateSessionIdInput(sessionId: unknown): string | null {
  if (sessionId === undefined) return null;
  if (typeof sessionId !== "string" || !isValidSessionId(sessionId)) {
    return "session_id must be 1-64 characters of letters, digits, '_' or '-'";
  }
  return null;
}

export interface ApiServerConfig {
  registry: CapabilityRegistry;
  guard: SandboxGuard;
  orchestrator: Orchestrator;
  sessions: SessionRegistry;
  apiToken?: string;
  insecure?: boolean;
  corsOrigins?: string | string[];
  maxTaskLength?: number;
}

function validateApiConfig(config: ApiServerConfig): void {
  const errors: string[] = [];
  if (config.maxTaskLength !== undefined) {
    if (!Number.isInteger(config.maxTaskLength) || config.maxTaskLength < 1) {
      errors.push("maxTaskLength must be a positive integer");
    }
  }
  if (config.apiToken !== undefined && config.apiToken.trim().length === 0) {
    errors.push("apiToken must not be blank");
  }
  if (Array.isArray(config.corsOrigins)) {
    for (const origin of config.corsOrigins) {
      if (origin.trim().length === 0) {
        errors.push("corsOrigins entries must be non-empty strings");
        break;
      }
    }
  }
  if (errors.length > 0) {
    throw new Error(`Invalid API server configuration:\n  - ${errors.join("\n  - ")}`);
  }
}

export class ApiServer {
  private app: express.Application;
  private registry: CapabilityRegistry;
  private guard: SandboxGuard;
  private orchestrator: Orchestrator;
  private sessions: SessionRegistry;
  private apiToken?: string;
  private corsOrigins?: string | string[];
  private maxTaskLength: number;
  private httpServer?: Server;

  constructor(config: ApiServerConfig) {
    validateApiConfig(config);
    this.registry = config.registry;
    this.guard = config.guard;
    this.orchestrator = config.orchestrator;
    this.sessions = config.sessions;
    this.apiToken = config.apiToken;
    this.corsOrigins = config.corsOrigins;
    this.maxTaskLength = config.maxTaskLength ?? MAX_TASK_LENGTH;

    if (!this.apiToken) {
      if (config.insecure !== true) {
        throw new Error(
          "API token is required. Set apiToken in config, ERRAND_API_TOKEN env var, or pass insecure: true (--insecure) to allow unauthenticated access.",
        );
      }
      console.warn("[api] WARNING: Running in insecure mode; all endpoints are unauthenticated.");
    }

    this.app = express();
    this.app.use(express.json({ limit: "1mb" }));
    this.app.use(express.text({ type: "text/plain", limit: "1mb" }));
    this.app.use((_req, res, next) => {
      res.setHeader("X-Content-Type-Options", "nosniff");
      res.setHeader("X-Frame-Options", "DENY");
      res.setHeader("X-XSS-Protection", "0");
      res.setHeader("Content-Security-Policy", "default-src 'none'; frame-ancestors 'none'; base-uri 'none'; form-action 'none'");
      res.setHeader("Cache-Control", "no-store");
      next();
    });

    if (this.corsOrigins === "*") {
      console.warn("[api] WARNING: CORS wildcard origin '*' allows any website to make requests. Use explicit origins in production.");
    }
    if (this.corsOrigins) {
      const origins = this.corsOrigins;
      this.app.use((req, res, next) => {
        const origin = req.headers.origin;
        const allowed = typeof origins === "string"
          ? origins === "*" || origin === origins
          : origin !== undefined && origins.includes(origin);
        if (allowed && origin) {
          res.setHeader("Access-Control-Allow-Origin", origin);
          res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
          res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");
          res.setHeader("Access-Control-Max-Age", "86400");
        }
        if (req.method === "OPTIONS") { res.status(204).end(); return; }
        next();
      });
    }
    this.setupRoutes();
  }

  listen(port: number): Server {
    const server = this.app.listen(port, () => {
      const addr = server.address();
      const actualPort = typeof addr === "object" && addr ? addr.port : port;
      console.log(`[api] Errand API listening on http://localhost:${actualPort}`);
    });
    this.httpServer = server;
    return server;
  }

  async shutdown(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    this.httpServer = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  getExpressApp(): express.Application { return this.app; }

  private setupRoutes(): void {
    const router = express.Router();

    router.get("/health", async (_req, res) => {
      const workspace = await stat(this.guard.workspaceRoot)
        .then((s) => (s.isDirectory() ? "ok" as const : "error" as const))
        .catch(() => "error" as const);
      const loaded = this.registry.list().length;
      const capabilities = loaded > 0 ? "ok" as const : "warning" as const;
      const active = this.sessions.list().filter((s) => s.busy).length;
      res.json({
        status: workspace === "error" ? "degraded" : capabilities === "warning" ? "warning" : "healthy",
        timestamp: new Date().toISOString(),
        checks: {
          workspace: { status: workspace, root: this.guard.workspaceRoot },
          capabilities: { status: capabilities, loaded },
          sessions: { status: "ok", known: this.sessions.size, active },
        },
      });
    });

    if (this.apiToken) {
      const expected = Buffer.from(this.apiToken);
      router.use((req, res, next) => {
        const auth = req.headers.authorization;
        if (!auth || !auth.startsWith("Bearer ")) {
          console.warn(`[api] AUTH_FAIL: missing/malformed Authorization header ${req.method} ${req.path.replace(/[\r\n]/g, "")}`);
          res.status(401).json({ error: "Unauthorized" });
          return;
        }
        const provided = Buffer.from(auth.slice(7));
        if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
          console.warn(`[api] AUTH_FAIL: invalid token ${req.method} ${req.path.replace(/[\r\n]/g, "")}`);
          res.status(401).json({ error: "Unauthorized" });
          return;
        }
        delete req.headers.authorization;
        next();
      });
    }

    const runHandler = async (req: express.Request, res: express.Response): Promise<void> => {
      const body: unknown = req.body;
      const task = typeof body === "string" && body.length > 0
        ? body
        : bodyField(body, "task") ?? queryString(req.query.task);
      const taskError = validateTaskInput(task, this.maxTaskLength);
      if (taskError !== null || typeof task !== "string") {
        res.status(400).json({ error: taskError ?? "task is required" });
        return;
      }
      const rawSession = bodyField(body, "session_id") ?? queryString(req.query.session_id);
      const sessionError = validateSessionIdInput(rawSession);
      if (sessionError !== null) {
        res.status(400).json({ error: sessionError });
        return;
      }
      const sessionId = typeof rawSession === "string" ? rawSession : DEFAULT_SESSION_ID;

      let lease: SessionLease;
      try {
        lease = this.sessions.acquire(sessionId);
      } catch (err) {
        if (err instanceof SessionBusyError) {
          res.status(409).json({ error: err.message });
          return;
        }
        throw err;
      }
      try {
        const outcome = await this.orchestrator.run(createTask(task), lease.store);
        const report = reportOutcome(outcome);
        res.status(report.http_status)
          .set("X-Run-Status", report.status)
          .type("text/plain")
          .send(report.body);
      } finally {
        lease.release();
      }
    };

    const wrap = (handler: (req: express.Request, res: express.Response) => Promise<void>, label: string) =>
      (req: express.Request, res: express.Response): void => {
        handler(req, res).catch((err: unknown) => {
          logError(label, err);
          if (!res.headersSent) res.status(500).json({ error: "Internal server error" });
        });
      };

    router.post("/run", wrap(runHandler, "Run failed"));
    router.get("/run", wrap(runHandler, "Run failed"));

    router.get("/read", wrap(async (req, res) => {
      const path = queryString(req.query.path);
      if (!path || path.trim().length === 0) {
        res.status(400).json({ error: "path query parameter is required" });
        return;
      }
      const resolved = await this.guard.resolvePath(path);
      if (!resolved.inside) {
        console.warn(`[api] READ_DENIED: "${path.replace(/[\r\n]/g, "")}" resolves outside the workspace`);
        res.status(403).json({ error: "Path is outside the workspace" });
        return;
      }
      const info = await stat(resolved.path).catch(() => null);
      if (!info || !info.isFile()) {
        res.status(404).json({ error: "File not found" });
        return;
      }
      if (info.size > MAX_READ_BYTES) {
        res.status(413).json({ error: `File exceeds ${MAX_READ_BYTES} bytes` });
        return;
      }
      const content = await readFile(resolved.path, "utf-8");
      res.status(200).type("text/plain").send(content);
    }, "Read failed"));

    router.post("/clear", wrap(async (req, res) => {
      const rawSession = bodyField(req.body, "session_id") ?? queryString(req.query.session_id);
      const sessionError = validateSessionIdInput(rawSession);
      if (sessionError !== null) {
        res.status(400).json({ error: sessionError });
        return;
      }
      const sessionId = typeof rawSession === "string" ? rawSession : DEFAULT_SESSION_ID;
      try {
        this.sessions.reset(sessionId);
      } catch (err) {
        if (err instanceof SessionBusyError) {
          res.status(409).json({ error: err.message });
          return;
        }
        throw err;
      }
      res.json({ session_id: sessionId, cleared: true });
    }, "Clear failed"));

    router.get("/chat_history", (req, res) => {
      const rawSession = queryString(req.query.session_id);
      const sessionError = validateSessionIdInput(rawSession);
      if (sessionError !== null) {
        res.status(400).json({ error: sessionError });
        return;
      }
      const sessionId = rawSession ?? DEFAULT_SESSION_ID;
      const turns = this.sessions.get(sessionId)?.full() ?? [];
      res.json({ session_id: sessionId, turns });
    });

    router.get("/capabilities", (_req, res) => {
      res.json({ capabilities: this.registry.describe() });
    });

    this.app.use(router);
  }
}
