import { describe, it, expect } from "vitest";
import { z } from "zod";
import { handleRpc, type ToolDef } from "../src/index.js";

const echoInput = z.object({ word: z.string() }).strict();

const echoTool: ToolDef<typeof echoInput> = {
  name: "test.echo",
  description: "Echo input",
  inputSchema: echoInput,
  handler: async ({ word }) => ({ content: [{ type: "text", text: word.toUpperCase() }] }),
};

const failingTool: ToolDef = {
  name: "test.fail",
  description: "Always throws",
  inputSchema: z.object({}),
  handler: async () => {
    throw new Error("kaput");
  },
};

const opts = { name: "test-server", version: "9.9.9", tools: [echoTool, failingTool] };

describe("handleRpc", () => {
  it("answers initialize with server info", async () => {
    const { status, response } = await handleRpc({ jsonrpc: "2.0", id: 1, method: "initialize" }, opts);
    expect(status).toBe(200);
    expect(response.result).toMatchObject({
      protocolVersion: "2024-11-05",
      serverInfo: { name: "test-server", version: "9.9.9" },
    });
  });

  it("lists tools with JSON schemas", async () => {
    const { response } = await handleRpc({ jsonrpc: "2.0", id: "a", method: "tools/list" }, opts);
    expect(response.result).toMatchObject({
      tools: [
        {
          name: "test.echo",
          description: "Echo input",
          inputSchema: { type: "object", properties: { word: { type: "string" } }, required: ["word"], additionalProperties: false },
        },
        { name: "test.fail" },
      ],
    });
  });

  it("calls a tool with validated arguments", async () => {
    const { status, response } = await handleRpc(
      { jsonrpc: "2.0", id: 2, method: "tools/call", params: { name: "test.echo", arguments: { word: "hi" } } },
      opts
    );
    expect(status).toBe(200);
    expect(response).toEqual({ jsonrpc: "2.0", id: 2, result: { content: [{ type: "text", text: "HI" }] } });
  });

  it("rejects arguments that fail the input schema", async () => {
    const { response } = await handleRpc(
      { jsonrpc: "2.0", id: 3, method: "tools/call", params: { name: "test.echo", arguments: { word: 5 } } },
      opts
    );
    expect(response.error).toMatchObject({ code: -32602, message: "Invalid params" });
  });

  it("reports handler exceptions as JSON-RPC errors", async () => {
    const { status, response } = await handleRpc(
      { jsonrpc: "2.0", id: 4, method: "tools/call", params: { name: "test.fail" } },
      opts
    );
    expect(status).toBe(200);
    expect(response.error).toEqual({ code: -32000, message: "kaput" });
  });

  it("returns 404 for unknown tools and methods", async () => {
    const unknownTool = await handleRpc(
      { jsonrpc: "2.0", id: 5, method: "tools/call", params: { name: "test.nope" } },
      opts
    );
    expect(unknownTool.status).toBe(404);
    expect(unknownTool.response.error).toEqual({ code: -32601, message: "Unknown tool: test.nope" });

    const unknownMethod = await handleRpc({ jsonrpc: "2.0", id: 6, method: "resources/list" }, opts);
    expect(unknownMethod.status).toBe(404);
    expect(unknownMethod.response.error).toEqual({ code: -32601, message: "Method not found" });
  });

  it("rejects bodies that are not JSON-RPC 2.0", async () => {
    const { status, response } = await handleRpc({ jsonrpc: "1.0", id: 7, method: "initialize" }, opts);
    expect(status).toBe(400);
    expect(response).toEqual({ jsonrpc: "2.0", id: null, error: { code: -32600, message: "Invalid Request" } });
  });
});
