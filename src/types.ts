import type { SdkMcpServer } from "./mcp/server.js";

export type PermissionMode = "default" | "acceptEdits" | "plan" | "bypassPermissions";

export const PERMISSION_MODES: readonly PermissionMode[] = ["default", "acceptEdits", "plan", "bypassPermissions"];

export type HookEvent =
  | "PreToolUse"
  | "PostToolUse"
  | "Notification"
  | "UserPromptSubmit"
  | "SessionStart"
  | "SessionEnd"
  | "Stop"
  | "SubagentStop"
  | "PreCompact";

export const HOOK_EVENTS: readonly HookEvent[] = [
  "PreToolUse",
  "PostToolUse",
  "Notification",
  "UserPromptSubmit",
  "SessionStart",
  "SessionEnd",
  "Stop",
  "SubagentStop",
  "PreCompact",
];

/** Raw JSON object as read from or written to the pipe. */
export type JsonObject = Record<string, unknown>;

// ── Permission callback ──────────────────────────────────────────────

export interface PermissionUpdate {
  type: "addRules" | "replaceRules" | "removeRules" | "setMode" | "addDirectories" | "removeDirectories";
  [key: string]: unknown;
}

export interface ToolPermissionContext {
  /** Aborted when the agent cancels the request or the session closes. */
  signal: AbortSignal;
  suggestions: unknown[];
  blockedPath?: string;
  toolUseId?: string;
}

export interface PermissionResultAllow {
  behavior: "allow";
  updatedInput?: JsonObject;
  updatedPermissions?: PermissionUpdate[];
}

export interface PermissionResultDeny {
  behavior: "deny";
  message: string;
  interrupt?: boolean;
}

export type PermissionResult = PermissionResultAllow | PermissionResultDeny;

export type CanUseTool = (
  toolName: string,
  input: JsonObject,
  context: ToolPermissionContext
) => Promise<PermissionResult>;

// ── Hooks ────────────────────────────────────────────────────────────

export interface HookContext {
  signal: AbortSignal;
}

/**
 * Hook output as returned by user code. `continue_` and `async_` are accepted in place of
 * the wire keys `continue` and `async`; they are renamed when the response is written.
 */
export interface HookJsonOutput {
  continue_?: boolean;
  async_?: boolean;
  asyncTimeout?: number;
  suppressOutput?: boolean;
  stopReason?: string;
  decision?: "approve" | "block";
  systemMessage?: string;
  reason?: string;
  hookSpecificOutput?: JsonObject;
  [key: string]: unknown;
}

export type HookCallback = (
  input: JsonObject,
  toolUseId: string | null,
  context: HookContext
) => Promise<HookJsonOutput>;

export interface HookMatcher {
  /** Tool name pattern, e.g. "Bash" or "Write|Edit"; null matches everything. */
  matcher?: string | null;
  hooks: HookCallback[];
  /** Per-matcher timeout in seconds, forwarded to the agent. */
  timeout?: number;
}

export type HookConfig = Partial<Record<HookEvent, HookMatcher[]>>;

// ── MCP server configs ───────────────────────────────────────────────

export interface McpStdioServerConfig {
  type?: "stdio";
  command: string;
  args?: string[];
  env?: Record<string, string>;
}

export interface McpRemoteServerConfig {
  type: "sse" | "http";
  url: string;
  headers?: Record<string, string>;
}

export interface McpSdkServerConfig {
  type: "sdk";
  name: string;
  instance: SdkMcpServer;
}

export type McpServerConfig = McpStdioServerConfig | McpRemoteServerConfig | McpSdkServerConfig;

// ── Options ──────────────────────────────────────────────────────────

export interface AgentOptions {
  allowedTools?: string[];
  disallowedTools?: string[];
  systemPrompt?: string;
  appendSystemPrompt?: string;
  model?: string;
  maxTurns?: number;
  permissionMode?: PermissionMode;
  permissionPromptToolName?: string;
  continueConversation?: boolean;
  resume?: string;
  settings?: string;
  addDirs?: string[];
  mcpServers?: Record<string, McpServerConfig>;
  /** Arbitrary extra CLI flags; a null value emits the bare flag. */
  extraArgs?: Record<string, string | null>;

  cliPath?: string;
  cwd?: string;
  env?: Record<string, string>;
  /** Identifier handed to the agent process through its environment. */
  entrypoint?: string;
  /** Receives every stderr line of the agent process. */
  stderr?: (line: string) => void;
  maxBufferSize?: number;

  canUseTool?: CanUseTool;
  hooks?: HookConfig;
  requestTimeoutMs?: number;
  closeGraceMs?: number;
}
