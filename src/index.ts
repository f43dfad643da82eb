export { query, type Prompt, type QueryParams } from "./client/query.js";
export { AgentClient } from "./client/agent-client.js";
export { createSdkMcpServer, tool, SdkMcpServer, ToolInputError } from "./mcp/server.js";
export type { CallToolResult, SdkMcpServerOptions, SdkMcpTool, ToolContent } from "./mcp/server.js";
export { ControlSession, type ControlSessionOptions, type SessionState } from "./session/control-session.js";
export { HOOK_FIELD_RENAMES, toWireHookOutput } from "./session/hooks.js";
export { Transport } from "./transport/types.js";
export { SubprocessTransport, type AgentProcess, type SpawnProcess, type SpawnRequest } from "./transport/subprocess.js";
export { JsonStreamFramer } from "./transport/framer.js";
export { parseMessage } from "./protocols/messages.js";
export type {
  AssistantMessage,
  ContentBlock,
  Message,
  ResultMessage,
  StreamEvent,
  SystemMessage,
  TextBlock,
  ThinkingBlock,
  ToolResultBlock,
  ToolUseBlock,
  UserMessage,
} from "./protocols/messages.js";
export {
  AgentWireError,
  CliConnectionError,
  CliNotFoundError,
  ControlResponseError,
  ControlTimeoutError,
  MessageDecodeError,
  MessageParseError,
  ProcessError,
  UsageError,
} from "./shared/errors.js";
export { initLogger, type LogFormat, type LogLevel } from "./shared/logging.js";
export * from "./types.js";
