/**
 * HTTP transport.
 *
 * Endpoints:
 *  - POST /v1/answer    : { project, version, thread_slug, message } -> { textResponse }
 *  - POST /v1/elaborate : { thread_slug, message } -> { textResponse }
 *  - POST /v1/inject    : { project, version, textContent, metadata? } -> { status, id }
 *  - GET  /health       : index counts + readiness
 *  - POST|GET|DELETE /mcp : MCP streamable HTTP, one Server + transport per session.
 *
 * Failures are `{ error, kind }` with 400 (missing_fields, invalid_input),
 * 404 (not_found), 500 (storage) or 502 (generation). Abstention is a 200.
 *
 * MCP session model: a client sends `initialize` to POST /mcp without an
 * `mcp-session-id` header, receives the generated id, and sends it on every
 * later request. DNS rebinding protection is on unless disabled; an explicit
 * allowedHosts list replaces the local-only host whitelist.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { isRagError, type ErrorKind } from "../errors";
import type { RagService } from "../rag-service";

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  missing_fields: 400,
  invalid_input: 400,
  not_found: 404,
  storage: 500,
  generation: 502,
};

/** Map a thrown value onto an HTTP status and JSON body. */
export function toHttpError(e: unknown): { status: number; body: { error: string; kind: string } } {
  if (isRagError(e)) {
    return { status: STATUS_BY_KIND[e.kind], body: { error: e.message, kind: e.kind } };
  }
  return { status: 500, body: { error: "Internal server error", kind: "internal" } };
}

export interface HttpTransportOptions {
  port: number;
  host: string;
  allowedHosts?: string[];
  dnsRebindingProtection?: boolean;
}

type Handler = (body: unknown) => Promise<unknown>;

function route(name: string, handler: Handler) {
  return async (req: express.Request, res: express.Response) => {
    try {
      res.json(await handler(req.body));
    } catch (e) {
      const { status, body } = toHttpError(e);
      if (status >= 500) console.error(`[RAG] ${name} failed:`, e);
      res.status(status).json(body);
    }
  };
}

/**
 * Build the express app with the REST routes and MCP session endpoints.
 */
export function createHttpApp(
  service: RagService,
  createServer: () => Server,
  opts: HttpTransportOptions,
): express.Express {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  app.post("/v1/answer", route("answer", (b) => service.answer(b)));
  app.post("/v1/elaborate", route("elaborate", (b) => service.elaborate(b)));
  app.post("/v1/inject", route("inject", (b) => service.inject(b)));
  app.get("/health", (_req, res) => {
    res.json(service.health());
  });

  const defaultAllowedHosts = [
    ...new Set([
      "127.0.0.1",
      `127.0.0.1:${opts.port}`,
      "localhost",
      `localhost:${opts.port}`,
      opts.host,
      `${opts.host}:${opts.port}`,
    ]),
  ];

  /** Active session transports mapped by session id. */
  const transports = new Map<string, StreamableHTTPServerTransport>();

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = req.header("mcp-session-id");
      let transport = sessionId ? transports.get(sessionId) : undefined;

      // Session creation path: only when no header AND the body is a valid initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports.set(sid, created);
          },
          enableDnsRebindingProtection: opts.dnsRebindingProtection ?? true,
          allowedHosts: opts.allowedHosts?.length ? opts.allowedHosts : defaultAllowedHosts,
        });

        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return; // server.close() closes the transport again
          closing = true;
          if (created.sessionId) transports.delete(created.sessionId);
          server.close().catch((e: unknown) => console.error("[RAG] MCP server close failed:", e));
        };
        await server.connect(created);
        transport = created;
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[RAG] MCP HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  // GET (stream) and DELETE (teardown) are only valid on an existing session.
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = req.header("mcp-session-id");
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`[RAG] MCP HTTP ${req.method} error:`, err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  return app;
}

/** Bind the app; resolves once listening. */
export async function startHttpTransport(app: express.Express, opts: HttpTransportOptions) {
  await new Promise<void>((resolve) => {
    app.listen(opts.port, opts.host, () => {
      console.error(`[RAG] HTTP listening at http://${opts.host}:${opts.port} (MCP at /mcp)`);
      resolve();
    });
  });
}
