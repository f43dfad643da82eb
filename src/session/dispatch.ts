import { type } from "arktype";
import type { SdkMcpServer } from "../mcp/server.js";
import { controlError, controlSuccess, isJsonObject, type ControlResponseLine } from "../protocols/control/codec.js";
import { HookCallbackRequestSchema, McpMessageRequestSchema, PermissionRequestSchema } from "../protocols/control/types.js";
import { jsonRpcError } from "../protocols/jsonrpc/response.js";
import { JSON_RPC_ERROR, JsonRpcIdSchema } from "../protocols/jsonrpc/types.js";
import { errorMessage } from "../shared/errors.js";
import { componentLogger } from "../shared/logging.js";
import type { CanUseTool, HookCallback, PermissionResult } from "../types.js";
import { toWireHookOutput } from "./hooks.js";

/** A control request the agent sent to the host. */
export interface InboundControlRequest {
  requestId: string;
  subtype: string;
  payload: Record<string, unknown>;
}

export interface CallbackDispatcherOptions {
  canUseTool?: CanUseTool;
  /** Looked up per request: hook ids are assigned during `initialize`. */
  hookCallback: (callbackId: string) => HookCallback | undefined;
  mcpServers: ReadonlyMap<string, SdkMcpServer>;
}

/**
 * Runs user callbacks for agent-issued control requests and turns every outcome,
 * including a thrown exception, into exactly one control response.
 */
export class CallbackDispatcher {
  private readonly logger = componentLogger("dispatch");

  constructor(private readonly options: CallbackDispatcherOptions) {}

  async dispatch(request: InboundControlRequest, signal: AbortSignal): Promise<ControlResponseLine> {
    try {
      const response = await this.handle(request, signal);
      return controlSuccess(request.requestId, response);
    } catch (err) {
      this.logger.debug({ requestId: request.requestId, subtype: request.subtype, err: errorMessage(err) }, "Control request failed");
      return controlError(request.requestId, errorMessage(err));
    }
  }

  private async handle({ subtype, payload }: InboundControlRequest, signal: AbortSignal): Promise<Record<string, unknown>> {
    switch (subtype) {
      case "can_use_tool":
        return this.permission(payload, signal);
      case "hook_callback":
        return this.hook(payload, signal);
      case "mcp_message":
      case "mcp_request":
        return this.mcp(payload);
      default:
        throw new Error(`Unsupported control request subtype: ${subtype}`);
    }
  }

  private async permission(payload: Record<string, unknown>, signal: AbortSignal): Promise<Record<string, unknown>> {
    const { canUseTool } = this.options;
    if (!canUseTool) {
      throw new Error("canUseTool callback is not provided");
    }
    const req = PermissionRequestSchema(payload);
    if (req instanceof type.errors) {
      throw new Error(`Invalid can_use_tool request: ${req.summary}`);
    }
    const result = await canUseTool(req.tool_name, req.input, {
      signal,
      suggestions: req.permission_suggestions ?? [],
      blockedPath: req.blocked_path ?? undefined,
      toolUseId: req.tool_use_id,
    });
    return permissionResponse(result, req.input);
  }

  private async hook(payload: Record<string, unknown>, signal: AbortSignal): Promise<Record<string, unknown>> {
    const req = HookCallbackRequestSchema(payload);
    if (req instanceof type.errors) {
      throw new Error(`Invalid hook_callback request: ${req.summary}`);
    }
    const callback = this.options.hookCallback(req.callback_id);
    if (!callback) {
      throw new Error(`No hook callback found for ID: ${req.callback_id}`);
    }
    const output = await callback(req.input ?? {}, req.tool_use_id ?? null, { signal });
    return toWireHookOutput(output ?? {});
  }

  private async mcp(payload: Record<string, unknown>): Promise<Record<string, unknown>> {
    const req = McpMessageRequestSchema(payload);
    if (req instanceof type.errors) {
      throw new Error(`Invalid mcp_message request: ${req.summary}`);
    }
    const server = this.options.mcpServers.get(req.server_name);
    if (!server) {
      return {
        mcp_response: jsonRpcError(messageId(req.message), JSON_RPC_ERROR.METHOD_NOT_FOUND, `Server '${req.server_name}' not found`),
      };
    }
    return { mcp_response: await server.handle(req.message) };
  }
}

export function permissionResponse(result: PermissionResult, input: Record<string, unknown>): Record<string, unknown> {
  if (result.behavior === "allow") {
    return {
      behavior: "allow",
      updatedInput: result.updatedInput ?? input,
      ...(result.updatedPermissions && { updatedPermissions: result.updatedPermissions }),
    };
  }
  return {
    behavior: "deny",
    message: result.message,
    ...(result.interrupt !== undefined && { interrupt: result.interrupt }),
  };
}

function messageId(message: unknown): string | number | null {
  if (!isJsonObject(message)) return null;
  const id = JsonRpcIdSchema(message.id);
  return id instanceof type.errors ? null : id;
}
