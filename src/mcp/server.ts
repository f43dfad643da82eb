/**
 * In-process tool server answering the agent's MCP JSON-RPC calls without a subprocess.
 * The agent reaches it through `mcp_message` control requests.
 */
import { z } from "zod";
import { type } from "arktype";
import { MCP_PROTOCOL_VERSION } from "../shared/constants.js";
import { errorMessage } from "../shared/errors.js";
import { componentLogger } from "../shared/logging.js";
import { jsonRpcError, jsonRpcResult } from "../protocols/jsonrpc/response.js";
import { JSON_RPC_ERROR, JsonRpcMessageSchema, type JsonRpcResponse } from "../protocols/jsonrpc/types.js";

export type ToolContent =
  | { type: "text"; text: string }
  | { type: "image"; data: string; mimeType: string }
  | { type: "resource"; resource: Record<string, unknown> };

export interface CallToolResult {
  content: ToolContent[];
  isError?: boolean;
}

export interface SdkMcpTool {
  name: string;
  description: string;
  inputSchema: z.ZodType;
  /** Validates raw arguments against `inputSchema` and runs the handler. */
  call(args: unknown): Promise<CallToolResult>;
}

/** Raised for arguments that fail the tool's schema; reported as invalid params. */
export class ToolInputError extends Error {
  constructor(readonly toolName: string, readonly issues: string) {
    super(`Invalid arguments for tool '${toolName}': ${issues}`);
    this.name = "ToolInputError";
  }
}

export function tool<Schema extends z.ZodType>(
  name: string,
  description: string,
  inputSchema: Schema,
  handler: (args: z.infer<Schema>) => Promise<CallToolResult>
): SdkMcpTool {
  return {
    name,
    description,
    inputSchema,
    async call(args: unknown): Promise<CallToolResult> {
      const parsed = inputSchema.safeParse(args ?? {});
      if (!parsed.success) {
        throw new ToolInputError(name, parsed.error.issues.map((i) => `${i.path.map(String).join(".") || "(root)"}: ${i.message}`).join("; "));
      }
      return handler(parsed.data);
    },
  };
}

const ToolCallParamsSchema = type({
  name: "string",
  "arguments?": "unknown",
});

export interface SdkMcpServerOptions {
  name: string;
  version?: string;
  tools?: SdkMcpTool[];
}

export class SdkMcpServer {
  readonly name: string;
  readonly version: string;
  private readonly tools = new Map<string, SdkMcpTool>();
  private readonly logger = componentLogger("mcp");

  constructor(options: SdkMcpServerOptions) {
    this.name = options.name;
    this.version = options.version ?? "1.0.0";
    for (const t of options.tools ?? []) {
      this.tools.set(t.name, t);
    }
  }

  listTools(): SdkMcpTool[] {
    return [...this.tools.values()];
  }

  /** Handles one JSON-RPC message. Never throws: failures come back as JSON-RPC errors. */
  async handle(message: unknown): Promise<JsonRpcResponse> {
    const msg = JsonRpcMessageSchema(message);
    if (msg instanceof type.errors) {
      return jsonRpcError(null, JSON_RPC_ERROR.INVALID_REQUEST, `Invalid JSON-RPC message: ${msg.summary}`);
    }
    const id = msg.id ?? null;

    switch (msg.method) {
      case "initialize":
        return jsonRpcResult(id, {
          protocolVersion: MCP_PROTOCOL_VERSION,
          capabilities: { tools: {} },
          serverInfo: { name: this.name, version: this.version },
        });
      case "notifications/initialized":
        return jsonRpcResult(id, {});
      case "tools/list":
        return jsonRpcResult(id, {
          tools: this.listTools().map((t) => ({
            name: t.name,
            description: t.description,
            inputSchema: z.toJSONSchema(t.inputSchema),
          })),
        });
      case "tools/call":
        return this.callTool(id, msg.params);
      default:
        return jsonRpcError(id, JSON_RPC_ERROR.METHOD_NOT_FOUND, `Method '${msg.method}' not found`);
    }
  }

  private async callTool(id: string | number | null, params: unknown): Promise<JsonRpcResponse> {
    const call = ToolCallParamsSchema(params);
    if (call instanceof type.errors) {
      return jsonRpcError(id, JSON_RPC_ERROR.INVALID_PARAMS, `Invalid tools/call params: ${call.summary}`);
    }
    const target = this.tools.get(call.name);
    if (!target) {
      return jsonRpcError(id, JSON_RPC_ERROR.INVALID_PARAMS, `Tool '${call.name}' not found`);
    }
    try {
      const result = await target.call(call.arguments);
      return jsonRpcResult(id, result);
    } catch (err) {
      this.logger.debug({ tool: call.name, err: errorMessage(err) }, "Tool handler failed");
      const code = err instanceof ToolInputError ? JSON_RPC_ERROR.INVALID_PARAMS : JSON_RPC_ERROR.INTERNAL_ERROR;
      return jsonRpcError(id, code, errorMessage(err));
    }
  }
}

/** Creates an in-process server config to place under `AgentOptions.mcpServers`. */
export function createSdkMcpServer(options: SdkMcpServerOptions): { type: "sdk"; name: string; instance: SdkMcpServer } {
  return { type: "sdk", name: options.name, instance: new SdkMcpServer(options) };
}
