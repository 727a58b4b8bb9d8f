import type { z } from "zod";

export type JSONRPCId = string | number | null;

export interface JSONRPCResponse {
  jsonrpc: "2.0";
  id: JSONRPCId;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
}

export type McpContent =
  | { type: "text"; text: string }
  | { type: "json"; json: unknown };

export interface ToolResult {
  content: McpContent[];
  isError?: boolean;
}

export interface ToolDef<S extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: S;
  handler: (args: z.output<S>) => Promise<ToolResult>;
}
