import { type } from "arktype";
import type { HookEvent, PermissionMode } from "../../types.js";

// ── Inbound records (agent → host) ───────────────────────────────────

export const ControlResponseRecordSchema = type({
  type: "'control_response'",
  response: {
    subtype: "'success' | 'error'",
    request_id: "string",
    "response?": "unknown",
    "error?": "string",
  },
});

export const ControlRequestRecordSchema = type({
  type: "'control_request'",
  request_id: "string",
  request: {
    subtype: "string",
  },
});

export const ControlCancelRecordSchema = type({
  type: "'control_cancel_request'",
  request_id: "string",
});

export const PermissionRequestSchema = type({
  subtype: "'can_use_tool'",
  tool_name: "string",
  input: "Record<string, unknown>",
  "permission_suggestions?": "unknown[] | null",
  "blocked_path?": "string | null",
  "tool_use_id?": "string",
});

export const HookCallbackRequestSchema = type({
  subtype: "'hook_callback'",
  callback_id: "string",
  "input?": "Record<string, unknown>",
  "tool_use_id?": "string | null",
});

export const McpMessageRequestSchema = type({
  subtype: "'mcp_message' | 'mcp_request'",
  server_name: "string",
  message: "unknown",
});

// ── Outbound requests (host → agent) ─────────────────────────────────

export interface HookMatcherWire {
  matcher: string | null;
  hookCallbackIds: string[];
  timeout?: number;
}

export type HooksWireConfig = Partial<Record<HookEvent, HookMatcherWire[]>>;

export type HostControlRequest =
  | { subtype: "initialize"; hooks: HooksWireConfig | null }
  | { subtype: "interrupt" }
  | { subtype: "set_permission_mode"; mode: PermissionMode }
  | { subtype: "set_model"; model: string | null };
