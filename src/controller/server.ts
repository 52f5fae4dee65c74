import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { PollCapability } from "../capability/types";
import type { ServerConfig } from "../config/schema/server";
import type { SessionsConfig } from "../config/schema/sessions";
import type { Clock } from "../session/clock";
import type { LogEvent } from "../session/types";
import {
  DEFAULT_REFRESH_MS,
  DEFAULT_SERVER_HOST,
  DEFAULT_SERVER_PORT,
} from "../config/schema/server";
import { logger } from "../logger";
import { createSessionConfig } from "../session/config";
import { DefaultSessionErrorPolicy } from "../session/error-policy";
import { InvalidSessionConfigError } from "../session/errors";
import {
  getSessionRegistry,
  startSession,
  stopSession,
  type SessionHandle,
} from "../session/manager";
import type { SessionRegistry } from "../session/registry";
import { renderLogLines } from "./render";

export interface ControllerServerOptions {
  capability: PollCapability;
  server?: ServerConfig;
  sessions?: SessionsConfig;
  /** Defaults to the process-wide registry. */
  registry?: SessionRegistry<SessionHandle>;
  clock?: Clock;
}

type SessionRoute = {
  token: string;
  action?: "logs" | "stream";
};

export const MAX_BODY_BYTES = 64 * 1024;

class RequestBodyTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = "RequestBodyTooLargeError";
  }
}

class InvalidJsonBodyError extends Error {
  constructor() {
    super("Request body is not valid JSON");
    this.name = "InvalidJsonBodyError";
  }
}

export function serializeEvent(event: LogEvent): Record<string, unknown> {
  return {
    seq: event.seq,
    timestamp: event.timestamp.toISOString(),
    level: event.level,
    message: event.message,
  };
}

function describeHandle(handle: SessionHandle): Record<string, unknown> {
  return {
    token: handle.token,
    host: handle.runner.config.host,
    state: handle.state(),
    alive: handle.isAlive(),
    startedAt: handle.startedAt.toISOString(),
  };
}

function parseSessionRoute(pathname: string): SessionRoute | null {
  const parts = pathname.split("/").filter(Boolean);
  if (parts[0] !== "sessions" || parts.length < 2 || parts.length > 3) {
    return null;
  }
  let token: string;
  try {
    token = decodeURIComponent(parts[1] ?? "");
  } catch {
    return null;
  }
  if (!token) {
    return null;
  }
  const action = parts[2];
  if (action === undefined) {
    return { token };
  }
  if (action === "logs" || action === "stream") {
    return { token, action };
  }
  return null;
}

/**
 * HTTP front end over the session registry. Every request is a short callback that
 * touches the registry and channels only; session loops run on their own.
 */
export class ControllerServer {
  private server: ReturnType<typeof createServer> | null = null;
  private streams = new Set<() => void>();
  private readonly registry: SessionRegistry<SessionHandle>;

  constructor(private readonly options: ControllerServerOptions) {
    this.registry = options.registry ?? getSessionRegistry();
  }

  async start(): Promise<void> {
    if (this.server) {
      return;
    }
    const host = this.options.server?.host ?? DEFAULT_SERVER_HOST;
    const port = this.options.server?.port ?? DEFAULT_SERVER_PORT;

    this.server = createServer(async (req, res) => {
      try {
        await this.handleRequest(req, res);
      } catch (error) {
        logger.warn({ err: error }, "Controller request failed");
        if (!res.headersSent) {
          this.writeJson(req, res, 500, { error: "internal_error" });
        } else {
          res.end();
        }
      }
    });

    await new Promise<void>((resolve, reject) => {
      const s = this.server;
      if (!s) {
        reject(new Error("Controller server missing"));
        return;
      }
      s.once("error", reject);
      s.listen(port, host, () => {
        s.off("error", reject);
        resolve();
      });
    });

    logger.info({ host, port: this.getPort() }, "Controller listening");
  }

  /** Stops every registered session, then closes the server. */
  async close(): Promise<void> {
    const handles = this.registry.list().map(([, handle]) => handle);
    const results = await Promise.all(
      handles.map((handle) =>
        stopSession(handle, {
          graceMs: this.options.sessions?.stopGraceMs,
          clock: this.options.clock,
        }),
      ),
    );
    for (const handle of handles) {
      this.registry.remove(handle.token);
    }
    const stuck = results.filter((result) => !result.exited).length;
    if (stuck > 0) {
      logger.warn({ stuck }, "Sessions still inside a capability call at shutdown");
    }

    for (const detach of Array.from(this.streams)) {
      detach();
    }

    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    logger.info({ stopped: handles.length }, "Controller closed");
  }

  getPort(): number | null {
    const address = this.server?.address();
    if (!address || typeof address === "string") {
      return null;
    }
    return address.port;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", "http://localhost");

    if (method === "OPTIONS") {
      this.writeCorsHeaders(req, res);
      res.statusCode = 204;
      res.end();
      return;
    }

    if (!this.isAuthorized(req, url)) {
      this.writeJson(req, res, 401, { error: "unauthorized" });
      return;
    }

    if (method === "GET" && url.pathname === "/health") {
      this.writeJson(req, res, 200, { ok: true, sessions: this.registry.size });
      return;
    }

    if (url.pathname === "/sessions") {
      if (method === "POST") {
        await this.createSession(req, res);
        return;
      }
      if (method === "GET") {
        const sessions = this.registry.list().map(([, handle]) => describeHandle(handle));
        this.writeJson(req, res, 200, { sessions });
        return;
      }
    }

    const route = parseSessionRoute(url.pathname);
    if (route) {
      const handle = this.registry.lookup(route.token);
      if (!handle) {
        this.writeJson(req, res, 404, { error: "session_not_found" });
        return;
      }
      if (method === "GET" && !route.action) {
        this.writeJson(req, res, 200, describeHandle(handle));
        return;
      }
      if (method === "GET" && route.action === "logs") {
        this.drainLogs(req, res, handle, url.searchParams.get("format") === "text");
        return;
      }
      if (method === "GET" && route.action === "stream") {
        this.openStream(req, res, handle);
        return;
      }
      if (method === "DELETE" && !route.action) {
        await this.deleteSession(req, res, handle);
        return;
      }
    }

    this.writeJson(req, res, 404, { error: "not_found" });
  }

  private async createSession(req: IncomingMessage, res: ServerResponse): Promise<void> {
    let body: unknown;
    try {
      body = await this.readJsonBody(req);
    } catch (error) {
      if (error instanceof InvalidJsonBodyError) {
        this.writeJson(req, res, 400, { error: "invalid_json" });
        return;
      }
      if (error instanceof RequestBodyTooLargeError) {
        this.writeJson(req, res, 413, { error: "payload_too_large", limit: error.limit });
        return;
      }
      throw error;
    }

    const sessions = this.options.sessions;
    let handle: SessionHandle;
    try {
      const config = createSessionConfig(body, sessions?.defaults);
      handle = startSession(config, {
        capability: this.options.capability,
        clock: this.options.clock,
        errorPolicy: new DefaultSessionErrorPolicy(
          sessions?.retry?.maxRetries,
          sessions?.retry?.baseDelayMs,
        ),
        maxBufferedEvents: sessions?.maxBufferedEvents,
        registry: this.registry,
      });
    } catch (error) {
      if (error instanceof InvalidSessionConfigError) {
        this.writeJson(req, res, 400, { error: "invalid_session_config", issues: error.issues });
        return;
      }
      throw error;
    }

    logger.info({ session: handle.token, host: handle.runner.config.host }, "Session started");
    this.writeJson(req, res, 201, { token: handle.token, state: handle.state() });
  }

  private drainLogs(
    req: IncomingMessage,
    res: ServerResponse,
    handle: SessionHandle,
    asText: boolean,
  ): void {
    const events = handle.channel.drain();
    const state = handle.state();
    const alive = handle.isAlive();
    if (asText) {
      this.writeJson(req, res, 200, { lines: renderLogLines(events), state, alive });
      return;
    }
    this.writeJson(req, res, 200, { events: events.map(serializeEvent), state, alive });
  }

  private async deleteSession(
    req: IncomingMessage,
    res: ServerResponse,
    handle: SessionHandle,
  ): Promise<void> {
    const result = await stopSession(handle, {
      graceMs: this.options.sessions?.stopGraceMs,
      clock: this.options.clock,
    });
    this.registry.remove(handle.token);
    logger.info({ session: handle.token, ...result }, "Session stopped");
    this.writeJson(req, res, 200, { token: handle.token, ...result });
  }

  private openStream(req: IncomingMessage, res: ServerResponse, handle: SessionHandle): void {
    this.writeCorsHeaders(req, res);
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache, no-transform",
      Connection: "keep-alive",
    });
    res.write(`event: ready\ndata: ${JSON.stringify({ token: handle.token })}\n\n`);

    const flush = (): boolean => {
      for (const event of handle.channel.drain()) {
        res.write(`data: ${JSON.stringify(serializeEvent(event))}\n\n`);
      }
      if (!handle.isAlive() && handle.channel.size === 0) {
        res.write(`event: end\ndata: ${JSON.stringify({ state: handle.state() })}\n\n`);
        return true;
      }
      return false;
    };

    const timer = setInterval(() => {
      if (flush()) {
        detach();
      }
    }, this.options.server?.refreshMs ?? DEFAULT_REFRESH_MS);
    let detached = false;
    const detach = () => {
      if (detached) {
        return;
      }
      detached = true;
      clearInterval(timer);
      this.streams.delete(detach);
      res.end();
    };
    this.streams.add(detach);

    res.on("close", detach);
    if (flush()) {
      detach();
    }
  }

  private isAuthorized(req: IncomingMessage, url: URL): boolean {
    const expected = this.options.server?.authToken?.trim();
    if (!expected) {
      return true;
    }
    const auth = req.headers.authorization;
    const bearer =
      typeof auth === "string" && auth.startsWith("Bearer ") ? auth.slice(7) : undefined;
    const headerToken = req.headers["x-pollbot-auth"];
    const explicit = typeof headerToken === "string" ? headerToken : undefined;
    const queryToken = url.searchParams.get("auth") ?? undefined;
    return bearer === expected || explicit === expected || queryToken === expected;
  }

  private async readJsonBody(req: IncomingMessage): Promise<unknown> {
    const chunks: Buffer[] = [];
    let size = 0;
    // Past the limit the body is drained, not buffered.
    for await (const chunk of req) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      size += buffer.length;
      if (size <= MAX_BODY_BYTES) {
        chunks.push(buffer);
      }
    }
    if (size > MAX_BODY_BYTES) {
      throw new RequestBodyTooLargeError(MAX_BODY_BYTES);
    }
    const raw = Buffer.concat(chunks).toString("utf8").trim();
    if (!raw) {
      return {};
    }
    try {
      return JSON.parse(raw);
    } catch {
      throw new InvalidJsonBodyError();
    }
  }

  private writeJson(
    req: IncomingMessage,
    res: ServerResponse,
    statusCode: number,
    body: Record<string, unknown>,
  ): void {
    this.writeCorsHeaders(req, res);
    res.statusCode = statusCode;
    res.setHeader("content-type", "application/json; charset=utf-8");
    res.end(JSON.stringify(body));
  }

  private writeCorsHeaders(req: IncomingMessage, res: ServerResponse): void {
    const origin = req.headers.origin;
    const allowOrigins = this.options.server?.allowOrigins;
    if (!origin) {
      return;
    }
    if (!allowOrigins || allowOrigins.length === 0 || allowOrigins.includes(origin)) {
      res.setHeader("access-control-allow-origin", origin);
      res.setHeader("vary", "Origin");
      res.setHeader("access-control-allow-headers", "Content-Type, Authorization, X-Pollbot-Auth");
      res.setHeader("access-control-allow-methods", "GET,POST,DELETE,OPTIONS");
    }
  }
}
