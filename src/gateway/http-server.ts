/**
 * REST API server
 *
 * Plain Node.js HTTP server that maps each route onto a gateway RPC method,
 * so both surfaces share one set of handlers and error codes.
 *
 *   GET  /health           → health
 *   GET  /dag/info         → dag.info
 *   POST /dag/execute      → dag.execute   body: { initial_input?, graph? }
 *   GET  /agents           → units.list
 *   GET  /executions       → executions.list  ?limit=
 *   GET  /executions/:id   → executions.get
 */
import http from "node:http";
import type { AddressInfo } from "node:net";
import type { GatewayRequestContext, GatewayRequestHandlers } from "./server-methods/types.js";
import { formatError, silentLogger, type SubsystemLogger } from "../logging.js";
import { ErrorCodes, httpStatusFor, type ErrorShape } from "./protocol/index.js";
import { isRecord } from "../llm/json.js";

// ── Helpers ───────────────────────────────────────────────────────────

export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export class PayloadTooLargeError extends Error {
  constructor(readonly limitBytes: number) {
    super(`request body exceeds ${limitBytes} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

/** Rejects once `maxBytes` is exceeded; the rest of the body is read and dropped. */
function readBody(req: http.IncomingMessage, maxBytes: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let overflowed = false;
    req.on("data", (chunk: Buffer) => {
      if (overflowed) {
        return;
      }
      size += chunk.length;
      if (size > maxBytes) {
        overflowed = true;
        chunks.length = 0;
        reject(new PayloadTooLargeError(maxBytes));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

function json(res: http.ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Content-Length": Buffer.byteLength(payload),
  });
  res.end(payload);
}

function error(res: http.ServerResponse, status: number, message: string, extra?: object): void {
  json(res, status, { error: message, ...extra });
}

// ── ApiServer ─────────────────────────────────────────────────────────

export type ApiServerOpts = {
  host: string;
  /** `0` lets the OS pick a free port. */
  port: number;
  handlers: GatewayRequestHandlers;
  context: GatewayRequestContext;
  /** Larger POST bodies are answered with 413. */
  maxBodyBytes?: number;
  log?: SubsystemLogger;
};

type Route = { method: string; params: Record<string, unknown> };

export class ApiServer {
  private server: http.Server | null = null;
  private readonly opts: ApiServerOpts;
  private port = 0;

  constructor(opts: ApiServerOpts) {
    this.opts = opts;
  }

  private get log(): SubsystemLogger {
    return this.opts.log ?? silentLogger;
  }

  async start(): Promise<{ port: number }> {
    if (this.server) {
      return { port: this.port };
    }
    const server = http.createServer((req, res) => {
      void this.handleRequest(req, res);
    });
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.opts.port, this.opts.host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    this.server = server;
    const address = server.address();
    this.port = isAddressInfo(address) ? address.port : this.opts.port;
    this.log.info(`api server listening on http://${this.opts.host}:${this.port}`);
    return { port: this.port };
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    this.log.info("api server stopped");
  }

  get isRunning(): boolean {
    return this.server != null;
  }

  get listenPort(): number {
    return this.port;
  }

  // ── Routing ─────────────────────────────────────────────────────────

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", "http://localhost");
    const pathname = url.pathname.replace(/\/+$/, "") || "/";

    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      const route = await this.matchRoute(req, method, pathname, url);
      if (!route) {
        error(res, 404, `Not found: ${method} ${pathname}`);
        return;
      }
      if ("status" in route) {
        error(res, route.status, route.message);
        return;
      }
      await this.dispatch(route, res);
    } catch (err) {
      this.log.error(`request error on ${method} ${pathname}: ${formatError(err)}`);
      if (!res.headersSent) {
        error(res, 500, formatError(err));
      }
    }
  }

  private async matchRoute(
    req: http.IncomingMessage,
    method: string,
    pathname: string,
    url: URL,
  ): Promise<Route | { status: number; message: string } | null> {
    if (method === "GET" && pathname === "/health") {
      return { method: "health", params: {} };
    }
    if (method === "GET" && pathname === "/dag/info") {
      return { method: "dag.info", params: {} };
    }
    if (method === "GET" && pathname === "/agents") {
      return { method: "units.list", params: {} };
    }
    if (method === "POST" && pathname === "/dag/execute") {
      let body: string;
      try {
        body = await readBody(req, this.opts.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES);
      } catch (err) {
        if (err instanceof PayloadTooLargeError) {
          return { status: 413, message: "Request body too large" };
        }
        throw err;
      }
      if (!body.trim()) {
        return { method: "dag.execute", params: {} };
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(body);
      } catch {
        return { status: 400, message: "Invalid JSON" };
      }
      if (!isRecord(parsed)) {
        return { status: 400, message: "Request body must be a JSON object" };
      }
      return { method: "dag.execute", params: parsed };
    }
    if (method === "GET" && pathname === "/executions") {
      const limit = url.searchParams.get("limit");
      return { method: "executions.list", params: limit === null ? {} : { limit: Number(limit) } };
    }
    const executionMatch = pathname.match(/^\/executions\/([^/]+)$/);
    if (executionMatch && method === "GET") {
      let id: string;
      try {
        id = decodeURIComponent(executionMatch[1]);
      } catch {
        return { status: 400, message: "Malformed URL" };
      }
      return { method: "executions.get", params: { id } };
    }
    return null;
  }

  private async dispatch(route: Route, res: http.ServerResponse): Promise<void> {
    const handler = this.opts.handlers[route.method];
    if (!handler) {
      error(res, 404, `Unknown method: ${route.method}`);
      return;
    }
    let responded = false;
    await handler({
      req: { type: "req", id: route.method, method: route.method },
      params: route.params,
      context: this.opts.context,
      respond: (ok: boolean, payload?: unknown, err?: ErrorShape) => {
        responded = true;
        if (ok) {
          json(res, 200, payload ?? {});
          return;
        }
        const shape = err ?? { code: ErrorCodes.UNAVAILABLE, message: "request failed" };
        error(res, httpStatusFor(shape.code), shape.message, {
          code: shape.code,
          ...(shape.details !== undefined ? { details: shape.details } : {}),
        });
      },
    });
    if (!responded) {
      error(res, 500, `${route.method} produced no response`);
    }
  }
}

function isAddressInfo(value: string | AddressInfo | null): value is AddressInfo {
  return value !== null && typeof value === "object";
}
