import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { APP_VERSION } from "./config";
import { describeError, isRagError, type RagError } from "./errors";
import type { RagService } from "./rag-service";

/** Map a service error onto the closest JSON-RPC error code. */
export function toMcpError(e: RagError): McpError {
  switch (e.kind) {
    case "missing_fields":
    case "invalid_input":
      return new McpError(ErrorCode.InvalidParams, e.message);
    case "not_found":
      return new McpError(ErrorCode.InvalidRequest, e.message);
    case "storage":
    case "generation":
      return new McpError(ErrorCode.InternalError, e.message, { kind: e.kind });
  }
}

/**
 * Factory for an MCP Server exposing the request operations as tools.
 * A fresh server is created per transport session; the service (and with it
 * the registry) is shared.
 *
 * Tool contracts:
 *  answer    { project, version, thread_slug, message } -> { textResponse }
 *  elaborate { thread_slug, message }                   -> { textResponse }
 *  inject    { project, version, textContent, metadata? } -> { status, id }
 *  status    {}                                         -> health report
 */
export function createMcpServerFactory(service: RagService): () => Server {
  return () => {
    const server = new Server(
      { name: "docs-rag-server", version: APP_VERSION },
      { capabilities: { tools: {} } },
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: [
        {
          name: "answer",
          description:
            "Answer a question from the documentation of one project/version. Returns \"I don't know.\" when retrieval evidence is too weak.",
          inputSchema: {
            type: "object",
            properties: {
              project: { type: "string", description: "Project name, e.g. 'k8s'." },
              version: { type: "string", description: "Version string, e.g. '1.29'." },
              thread_slug: { type: "string", description: "Conversation id; history is appended." },
              message: { type: "string", description: "The question." },
            },
            required: ["project", "version", "thread_slug", "message"],
          },
        },
        {
          name: "elaborate",
          description: "Reformat supplied content into a clear, structured summary (no retrieval).",
          inputSchema: {
            type: "object",
            properties: {
              thread_slug: { type: "string" },
              message: { type: "string", description: "Content to reformat." },
            },
            required: ["thread_slug", "message"],
          },
        },
        {
          name: "inject",
          description: "Add content to the live corpus of a project/version. Searchable immediately.",
          inputSchema: {
            type: "object",
            properties: {
              project: { type: "string" },
              version: { type: "string" },
              textContent: { type: "string" },
              metadata: {
                type: "object",
                description: "Flat map of string, number or boolean values.",
                additionalProperties: { type: ["string", "number", "boolean"] },
              },
            },
            required: ["project", "version", "textContent"],
          },
        },
        {
          name: "status",
          description: "Loaded index counts and server readiness.",
          inputSchema: { type: "object", properties: {} },
        },
      ],
    }));

    server.setRequestHandler(CallToolRequestSchema, async (req) => {
      const args = req.params.arguments ?? {};
      let result: unknown;
      try {
        switch (req.params.name) {
          case "answer":
            result = await service.answer(args);
            break;
          case "elaborate":
            result = await service.elaborate(args);
            break;
          case "inject":
            result = await service.inject(args);
            break;
          case "status":
            result = service.health();
            break;
          default:
            throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
        }
      } catch (e) {
        if (isRagError(e)) throw toMcpError(e);
        if (e instanceof McpError) throw e;
        console.error(`[RAG] Tool ${req.params.name} failed:`, e);
        throw new McpError(ErrorCode.InternalError, describeError(e));
      }
      return { content: [{ type: "text" as const, text: JSON.stringify(result) }] };
    });

    return server;
  };
}
