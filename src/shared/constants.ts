export const VERSION = "0.1.0";

/** Command looked up on PATH when no explicit CLI path is configured. */
export const DEFAULT_CLI_COMMAND = "claude";

/** Environment variable the agent CLI reads to learn which client launched it. */
export const ENTRYPOINT_ENV = "CLAUDE_CODE_ENTRYPOINT";
export const DEFAULT_ENTRYPOINT = "sdk-ts";
export const CLIENT_ENTRYPOINT = "sdk-ts-client";

export const MAX_BUFFER_SIZE = 1024 * 1024;
export const CONTROL_REQUEST_TIMEOUT_MS = 60_000;
export const CLOSE_GRACE_MS = 5_000;
export const TERMINATE_TIMEOUT_MS = 5_000;
export const STDERR_RING_SIZE = 100;

export const MCP_PROTOCOL_VERSION = "2024-11-05";
