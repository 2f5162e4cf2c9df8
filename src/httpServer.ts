import { randomUUID } from "node:crypto";
import { Buffer } from "node:buffer";
import { createServer as createHttpServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";

import type { StructuredLogger } from "./logger.js";
import { createHttpSessionId, type HttpRuntimeOptions } from "./serverOptions.js";

/** Default upper bound on accepted JSON-RPC request bodies. */
export const DEFAULT_MAX_BODY_BYTES = 4 * 1024 * 1024;

export interface HttpServerLimits {
  readonly maxBodyBytes?: number;
}

export interface HttpServerHandle {
  close: () => Promise<void>;
  /** Port actually bound (useful when `0` was requested). */
  port: number;
}

interface HttpSession {
  readonly transport: StreamableHTTPServerTransport;
  readonly server: McpServer;
}

class HttpBodyError extends Error {
  constructor(
    readonly status: number,
    readonly rpcCode: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpBodyError";
  }
}

function applySecurityHeaders(res: ServerResponse): void {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "no-referrer");
}

/** Keeps an upstream `x-request-id`, otherwise mints one. */
function ensureRequestId(req: IncomingMessage, res: ServerResponse): string {
  const incoming = req.headers["x-request-id"];
  const requestId = typeof incoming === "string" && incoming.trim() ? incoming.trim() : randomUUID();
  res.setHeader("x-request-id", requestId);
  return requestId;
}

/**
 * Reads the whole body. Past the limit the rest is drained and discarded, so
 * the 413 reaches a client that is still sending.
 */
async function readJsonBody(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  const buffers: Buffer[] = [];
  let totalBytes = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    totalBytes += buffer.length;
    if (totalBytes <= maxBytes) {
      buffers.push(buffer);
    }
  }
  if (totalBytes > maxBytes) {
    throw new HttpBodyError(413, -32600, "Payload Too Large");
  }
  try {
    const parsed: unknown = JSON.parse(Buffer.concat(buffers).toString("utf8"));
    return parsed;
  } catch {
    throw new HttpBodyError(400, -32700, "Parse error");
  }
}

function respondWithJsonRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  if (res.headersSent) {
    res.end();
    return;
  }
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify({ jsonrpc: "2.0", error: { code, message }, id: null }));
}

function sessionIdOf(req: IncomingMessage): string | undefined {
  const header = req.headers["mcp-session-id"];
  return typeof header === "string" && header.length > 0 ? header : undefined;
}

/**
 * Serves MCP over Streamable HTTP. Each session gets its own `McpServer`
 * built by {@link createServer}; the sandbox behind them is shared.
 */
export async function startHttpServer(
  createServer: () => McpServer,
  options: HttpRuntimeOptions,
  logger: StructuredLogger,
  limits: HttpServerLimits = {},
): Promise<HttpServerHandle> {
  const sessions = new Map<string, HttpSession>();
  const maxBodyBytes = limits.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

  const openSession = async (): Promise<StreamableHTTPServerTransport> => {
    const server = createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => createHttpSessionId(),
      onsessioninitialized: (sessionId) => {
        sessions.set(sessionId, { transport, server });
        logger.info("http_session_opened", { session_id: sessionId });
      },
    });
    transport.onerror = (error) => {
      logger.error("http_transport_error", { message: error.message });
    };
    transport.onclose = () => {
      const sessionId = transport.sessionId;
      if (sessionId && sessions.delete(sessionId)) {
        logger.info("http_session_closed", { session_id: sessionId });
      }
    };
    await server.connect(transport);
    return transport;
  };

  const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    applySecurityHeaders(res);
    const requestId = ensureRequestId(req, res);
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (url.pathname === "/healthz") {
      res.statusCode = 200;
      res.setHeader("Content-Type", "application/json");
      res.end(JSON.stringify({ status: "ok", sessions: sessions.size }));
      return;
    }
    if (url.pathname !== options.path) {
      respondWithJsonRpcError(res, 404, -32601, "Method not found");
      return;
    }

    const sessionId = sessionIdOf(req);
    const existing = sessionId ? sessions.get(sessionId) : undefined;

    if (req.method === "POST") {
      const body = await readJsonBody(req, maxBodyBytes);
      if (existing) {
        await existing.transport.handleRequest(req, res, body);
        return;
      }
      if (!sessionId && isInitializeRequest(body)) {
        const transport = await openSession();
        await transport.handleRequest(req, res, body);
        return;
      }
      logger.warn("http_session_missing", { request_id: requestId, session_id: sessionId ?? null });
      respondWithJsonRpcError(res, 400, -32000, "Bad Request: No valid session ID provided");
      return;
    }

    if (!existing) {
      respondWithJsonRpcError(res, 400, -32000, "Bad Request: No valid session ID provided");
      return;
    }
    await existing.transport.handleRequest(req, res);
  };

  const httpServer = createHttpServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      if (error instanceof HttpBodyError) {
        respondWithJsonRpcError(res, error.status, error.rpcCode, error.message);
        return;
      }
      logger.error("http_request_failure", { message: error instanceof Error ? error.message : String(error) });
      respondWithJsonRpcError(res, 500, -32603, "Internal error");
    });
  });

  httpServer.on("clientError", (error, socket) => {
    logger.warn("http_client_error", { message: error.message });
    socket.end("HTTP/1.1 400 Bad Request\r\n\r\n");
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  httpServer.on("error", (error) => {
    logger.error("http_server_error", { message: error.message });
  });

  const address = httpServer.address();
  const port = address !== null && typeof address === "object" ? portOf(address) : options.port;
  logger.info("http_listening", { host: options.host, port, path: options.path });

  return {
    port,
    close: async () => {
      for (const session of sessions.values()) {
        await session.transport.close();
        await session.server.close();
      }
      sessions.clear();
      const closed = new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
      httpServer.closeAllConnections();
      await closed;
    },
  };
}

function portOf(address: AddressInfo): number {
  return address.port;
}
