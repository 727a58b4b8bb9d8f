// packages/mcp-http/src/index.ts
import express from "express";
import { z } from "zod";
import type { JSONRPCId, JSONRPCResponse, ToolDef } from "./types.js";
import { toJSONSchema } from "./zodJson.js";

export type { JSONRPCId, JSONRPCResponse, McpContent, ToolDef, ToolResult } from "./types.js";
export { toJSONSchema } from "./zodJson.js";

export interface StartOptions {
  name?: string;
  version?: string;
  port?: number;
  path?: string; // e.g., "/mcp"
  logger?: (line: string) => void;
  tools?: ToolDef[];
}

const RequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number(), z.null()]).default(null),
  method: z.string(),
  params: z.unknown().optional(),
});

const CallParamsSchema = z.object({
  name: z.string(),
  arguments: z.unknown().optional(),
});

function rpcError(id: JSONRPCId, code: number, message: string, data?: unknown): JSONRPCResponse {
  return { jsonrpc: "2.0", id, error: data === undefined ? { code, message } : { code, message, data } };
}

/** Dispatches one JSON-RPC body; HTTP status travels alongside the response. */
export async function handleRpc(
  body: unknown,
  opts: Pick<StartOptions, "name" | "version" | "tools">
): Promise<{ status: number; response: JSONRPCResponse }> {
  const req = RequestSchema.safeParse(body);
  if (!req.success) return { status: 400, response: rpcError(null, -32600, "Invalid Request") };
  const { id, method, params } = req.data;

  switch (method) {
    case "initialize":
      return {
        status: 200,
        response: {
          jsonrpc: "2.0",
          id,
          result: {
            protocolVersion: "2024-11-05",
            capabilities: { tools: { list: {}, call: {} } },
            serverInfo: { name: opts.name ?? "mcp-http-server", version: opts.version ?? "1.0.0" },
          },
        },
      };

    case "tools/list": {
      const tools = (opts.tools ?? []).map((t) => ({
        name: t.name,
        description: t.description,
        inputSchema: toJSONSchema(t.inputSchema),
      }));
      return { status: 200, response: { jsonrpc: "2.0", id, result: { tools } } };
    }

    case "tools/call": {
      const call = CallParamsSchema.safeParse(params);
      if (!call.success) return { status: 400, response: rpcError(id, -32602, "Invalid params") };
      const tool = opts.tools?.find((t) => t.name === call.data.name);
      if (!tool) return { status: 404, response: rpcError(id, -32601, `Unknown tool: ${call.data.name}`) };

      const args = tool.inputSchema.safeParse(call.data.arguments ?? {});
      if (!args.success) {
        return { status: 200, response: rpcError(id, -32602, "Invalid params", args.error.issues) };
      }
      try {
        const result = await tool.handler(args.data);
        return { status: 200, response: { jsonrpc: "2.0", id, result } };
      } catch (e) {
        const message = e instanceof Error && e.message ? e.message : "Tool execution failed";
        return { status: 200, response: rpcError(id, -32000, message) };
      }
    }

    default:
      return { status: 404, response: rpcError(id, -32601, "Method not found") };
  }
}

export function createMcpApp(opts: StartOptions = {}) {
  const path = opts.path ?? "/mcp";
  const log = opts.logger ?? ((s: string) => console.log(`[mcp-http] ${s}`));

  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true });
  });

  app.post(path, (req, res) => {
    handleRpc(req.body, opts)
      .then(({ status, response }) => {
        res.status(status).json(response);
      })
      .catch((e: unknown) => {
        log(`POST ${path} error: ${e instanceof Error ? e.stack ?? e.message : String(e)}`);
        res.status(500).json({ error: e instanceof Error ? e.message : String(e) });
      });
  });

  // Legacy clients probe GET /mcp for SSE.
  app.get(path, (_req, res) => {
    res.status(200).type("text/plain").send("MCP endpoint expects POST JSON-RPC. SSE not enabled.\n");
  });

  return app;
}

export function startMcpHttpServer(opts: StartOptions = {}) {
  const port = opts.port ?? Number(process.env.PORT ?? 8720);
  const path = opts.path ?? "/mcp";
  const log = opts.logger ?? ((s: string) => console.log(`[mcp-http] ${s}`));
  return createMcpApp(opts).listen(port, () => log(`listening on :${port} (path ${path})`));
}
