import http from "node:http";
import { WebSocket, WebSocketServer } from "ws";
import { ConductorService } from "./core/conductorService.js";
import {
  asString,
  errorEnvelope,
  outboundEnvelope,
  parseIncomingEvent,
  progressEnvelope,
  sseFrame,
} from "./core/events.js";
import { isRecord } from "./core/json.js";
import { errorMessage, logger } from "./core/logger.js";
import { SlidingWindowRateLimiter } from "./core/rateLimiter.js";
import { ProgressEvent } from "./core/types.js";

export const API_PREFIX = "/api/v1";
export const DEFAULT_SESSION_ID = "default_session";

const MAX_BODY_BYTES = 16_384;

export interface ServiceProbe {
  name: string;
  check(): Promise<boolean>;
}

export interface AppOptions {
  maxEventBytes: number;
  rateLimitPerMinute: number;
  services: ServiceProbe[];
}

export interface AppServer {
  server: http.Server;
  wss: WebSocketServer;
  limiter: SlidingWindowRateLimiter;
}

/** HTTP routes under /api/v1 plus the /ws WebSocket on the same server. */
export function createApp(conductor: ConductorService, options: AppOptions): AppServer {
  const limiter = new SlidingWindowRateLimiter(options.rateLimitPerMinute, 60_000);

  const server = http.createServer((req, res) => {
    handleRequest(conductor, options, limiter, req, res).catch((error: unknown) => {
      logger.error(`request failed: ${errorMessage(error)}`);
      if (!res.headersSent) {
        sendJson(res, 500, { error: "internal_error" });
      } else if (!res.writableEnded) {
        res.end();
      }
    });
  });

  const wss = new WebSocketServer({
    server,
    path: "/ws",
    maxPayload: options.maxEventBytes,
  });
  wss.on("connection", (socket, request) => handleConnection(conductor, options, limiter, socket, request));

  return { server, wss, limiter };
}

async function handleRequest(
  conductor: ConductorService,
  options: AppOptions,
  limiter: SlidingWindowRateLimiter,
  req: http.IncomingMessage,
  res: http.ServerResponse,
): Promise<void> {
  const url = new URL(req.url ?? "/", "http://localhost");
  const path = url.pathname.startsWith(API_PREFIX) ? url.pathname.slice(API_PREFIX.length) : undefined;

  if (path === undefined) {
    sendJson(res, 404, { error: "not_found" });
    return;
  }

  if (req.method === "GET" && path === "/health") {
    sendJson(res, 200, { status: "healthy" });
    return;
  }

  if (req.method === "GET" && path === "/health/services") {
    const results = await Promise.all(
      options.services.map(async (service) => [service.name, (await service.check()) ? "up" : "down"] as const),
    );
    const services = Object.fromEntries(results);
    const status = results.every(([, state]) => state === "up") ? "healthy" : "degraded";
    sendJson(res, 200, { status, services });
    return;
  }

  if (req.method === "GET" && path === "/stream") {
    await handleStream(conductor, limiter, url, res);
    return;
  }

  if (req.method === "POST" && path === "/chat_sync") {
    const body = await readJsonBody(req, res);
    if (!body) {
      return;
    }
    const message = asString(body.message)?.trim();
    if (!message) {
      sendJson(res, 400, { error: "missing_message", message: "Body must include a non-empty 'message'." });
      return;
    }
    const sessionId = asString(body.session_id)?.trim() || DEFAULT_SESSION_ID;
    if (!limiter.allow(sessionId)) {
      sendJson(res, 429, { error: "rate_limited" });
      return;
    }
    sendJson(res, 200, await conductor.chat(sessionId, message));
    return;
  }

  if (req.method === "POST" && path === "/reset") {
    const body = await readJsonBody(req, res);
    if (!body) {
      return;
    }
    const sessionId = asString(body.session_id)?.trim();
    if (!sessionId) {
      sendJson(res, 400, { error: "missing_session_id" });
      return;
    }
    sendJson(res, 200, await conductor.reset(sessionId));
    return;
  }

  const historyMatch = /^\/sessions\/([^/]+)\/history$/.exec(path);
  if (req.method === "GET" && historyMatch) {
    const sessionId = decodeURIComponent(historyMatch[1]);
    const messages = conductor.history(sessionId);
    if (!messages) {
      sendJson(res, 404, { error: "session_not_found" });
      return;
    }
    sendJson(res, 200, { sessionId, messages });
    return;
  }

  sendJson(res, 404, { error: "not_found" });
}

async function handleStream(
  conductor: ConductorService,
  limiter: SlidingWindowRateLimiter,
  url: URL,
  res: http.ServerResponse,
): Promise<void> {
  const message = url.searchParams.get("message")?.trim();
  if (!message) {
    sendJson(res, 400, { error: "missing_message", message: "Message text is required" });
    return;
  }
  const sessionId = url.searchParams.get("session_id")?.trim() || DEFAULT_SESSION_ID;
  if (!limiter.allow(sessionId)) {
    sendJson(res, 429, { error: "rate_limited" });
    return;
  }

  res.writeHead(200, {
    "Content-Type": "text/event-stream",
    "Cache-Control": "no-cache",
    Connection: "keep-alive",
    "X-Accel-Buffering": "no",
  });

  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      logger.info("stream client disconnected", { sessionId });
      controller.abort();
    }
  });

  await conductor.runTurn({ sessionId, text: message, signal: controller.signal }, (event: ProgressEvent) => {
    if (!res.writableEnded) {
      res.write(sseFrame(event));
    }
  });

  if (!res.writableEnded) {
    res.end();
  }
}

function handleConnection(
  conductor: ConductorService,
  options: AppOptions,
  limiter: SlidingWindowRateLimiter,
  socket: WebSocket,
  request: http.IncomingMessage,
): void {
  const controller = new AbortController();
  let connectionSessionId: string | null = null;

  logger.info(`client connected from ${request.socket.remoteAddress ?? "unknown"}`);

  socket.on("message", async (raw) => {
    const text = Buffer.isBuffer(raw) ? raw.toString("utf8") : String(raw);

    const parsed = parseIncomingEvent(text, options.maxEventBytes);
    if (!parsed.ok) {
      safeSend(socket, errorEnvelope(connectionSessionId ?? "unknown", "invalid_event", parsed.error));
      return;
    }

    const event = parsed.event;
    if (connectionSessionId && connectionSessionId !== event.sessionId) {
      safeSend(
        socket,
        errorEnvelope(connectionSessionId, "session_mismatch", "Each connection may only use one sessionId."),
      );
      return;
    }
    connectionSessionId = event.sessionId;
    const sessionId = event.sessionId;

    logger.info(`inbound ${event.type}`, { sessionId });

    switch (event.type) {
      case "user.message": {
        const userText = asString(event.payload.text)?.trim();
        if (!userText) {
          safeSend(socket, errorEnvelope(sessionId, "invalid_message", "user.message must include payload.text"));
          return;
        }
        if (!limiter.allow(sessionId)) {
          safeSend(
            socket,
            errorEnvelope(sessionId, "rate_limited", "Too many messages for this session in the last minute."),
          );
          return;
        }
        await conductor.runTurn({ sessionId, text: userText, signal: controller.signal }, (progress) => {
          safeSend(socket, progressEnvelope(sessionId, progress));
        });
        return;
      }

      case "session.reset": {
        const { found } = await conductor.reset(sessionId);
        safeSend(socket, outboundEnvelope(sessionId, "session.reset", { found }));
        return;
      }

      default:
        safeSend(socket, errorEnvelope(sessionId, "unsupported_event", `Unsupported event type: ${event.type}`));
        return;
    }
  });

  socket.on("close", () => {
    controller.abort();
    logger.info("client disconnected", { sessionId: connectionSessionId ?? undefined });
  });

  socket.on("error", (error) => {
    logger.warn(`socket error: ${error.message}`, { sessionId: connectionSessionId ?? undefined });
  });
}

async function readJsonBody(
  req: http.IncomingMessage,
  res: http.ServerResponse,
): Promise<Record<string, unknown> | undefined> {
  let body = "";
  for await (const chunk of req) {
    body += chunk;
    if (body.length > MAX_BODY_BYTES) {
      sendJson(res, 413, { error: "payload_too_large" });
      return undefined;
    }
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body || "{}");
  } catch {
    parsed = undefined;
  }
  if (isRecord(parsed)) {
    return parsed;
  }
  sendJson(res, 400, { error: "invalid_request", message: "Body must be a JSON object." });
  return undefined;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function safeSend(socket: WebSocket, event: object): void {
  if (socket.readyState !== WebSocket.OPEN) {
    return;
  }

  try {
    socket.send(JSON.stringify(event));
  } catch (error) {
    logger.warn(`failed to send websocket event: ${errorMessage(error)}`);
  }
}
