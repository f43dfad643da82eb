import { getLogger } from "./logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  AGENT_FAILURE: 4,
} as const;

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

/** Base class for every error this package raises. */
export class AgentWireError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AgentWireError";
  }
}

/** The agent CLI could not be located or executed. */
export class CliNotFoundError extends AgentWireError {
  constructor(message: string, readonly cliPath?: string) {
    super(message);
    this.name = "CliNotFoundError";
  }
}

/** Connecting to, writing to, or using a closed agent process failed. */
export class CliConnectionError extends AgentWireError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CliConnectionError";
  }
}

/** The agent process exited with a non-zero status. */
export class ProcessError extends AgentWireError {
  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    super(stderr ? `${message}\nError output: ${stderr}` : message);
    this.name = "ProcessError";
  }
}

/** Framing failure: stdout produced more than the buffer limit without a parseable object. */
export class MessageDecodeError extends AgentWireError {
  constructor(
    message: string,
    readonly bufferLength: number,
    readonly limit: number
  ) {
    super(message);
    this.name = "MessageDecodeError";
  }
}

/** A framed record could not be decoded into a typed message. */
export class MessageParseError extends AgentWireError {
  constructor(message: string, readonly data: unknown) {
    super(message);
    this.name = "MessageParseError";
  }
}

/** A host-issued control request got no response before its deadline. */
export class ControlTimeoutError extends AgentWireError {
  constructor(readonly subtype: string, readonly timeoutMs: number) {
    super(`Control request timeout: ${subtype}`);
    this.name = "ControlTimeoutError";
  }
}

/** The agent answered a control request with an error subtype. */
export class ControlResponseError extends AgentWireError {
  constructor(message: string, readonly requestId: string) {
    super(message);
    this.name = "ControlResponseError";
  }
}

/** The API was called in a way the current session does not allow. */
export class UsageError extends AgentWireError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

/** Maps a failure escaping the CLI to its exit code. */
export function exitCodeFor(error: unknown): number {
  if (error instanceof UsageError) return EXIT.INVALID_ARGS;
  if (error instanceof ProcessError || error instanceof CliConnectionError || error instanceof CliNotFoundError) {
    return EXIT.AGENT_FAILURE;
  }
  return EXIT.GENERIC_ERROR;
}
