import { query as runAgentQuery, type QueryParams } from "../../client/query.js";
import { getDataDir, readConfig } from "../../config.js";
import type { Message } from "../../protocols/messages.js";
import { getEnv } from "../../shared/env.js";
import { EXIT, UsageError } from "../../shared/errors.js";
import { initLogger, isLogFormat, isLogLevel } from "../../shared/logging.js";
import { PERMISSION_MODES, type AgentOptions, type PermissionMode } from "../../types.js";
import { formatMessage } from "../render.js";

export interface RunOptions {
  json?: boolean;
  cliPath?: string;
  model?: string;
  permissionMode?: string;
  systemPrompt?: string;
  maxTurns?: number;
  cwd?: string;
  dataDir?: string;
  verbose?: boolean;
  logLevel?: string;
  logFormat?: string;
}

export interface RunDeps {
  query?: (params: QueryParams) => AsyncIterable<Message>;
  stdout?: NodeJS.WritableStream;
}

function isPermissionMode(s: string): s is PermissionMode {
  return (PERMISSION_MODES as readonly string[]).includes(s);
}

/** Runs one prompt and prints the conversation. Returns the process exit code. */
export async function runPrompt(prompt: string, opts: RunOptions, deps: RunDeps = {}): Promise<number> {
  const config = await readConfig(getDataDir(opts.dataDir));

  const level = opts.verbose ? "debug" : (opts.logLevel ?? getEnv("LOG_LEVEL") ?? config.log?.level ?? "info");
  const format = opts.logFormat ?? getEnv("LOG_FORMAT") ?? "text";
  if (!isLogLevel(level)) throw new UsageError(`Invalid log level: ${level}`);
  if (!isLogFormat(format)) throw new UsageError(`Invalid log format: ${format} (expected text, json or plain)`);
  initLogger(level, format);

  const permissionMode = opts.permissionMode ?? config.permissionMode;
  if (permissionMode !== undefined && !isPermissionMode(permissionMode)) {
    throw new UsageError(`Invalid permission mode: ${permissionMode} (expected ${PERMISSION_MODES.join(", ")})`);
  }

  const options: AgentOptions = {
    cliPath: opts.cliPath ?? config.cliPath,
    model: opts.model ?? config.model,
    permissionMode,
    systemPrompt: opts.systemPrompt,
    maxTurns: opts.maxTurns,
    cwd: opts.cwd,
  };

  const query = deps.query ?? runAgentQuery;
  const out = deps.stdout ?? process.stdout;
  let exitCode: number = EXIT.SUCCESS;
  for await (const message of query({ prompt, options })) {
    if (opts.json) {
      out.write(JSON.stringify(message) + "\n");
    } else {
      for (const line of formatMessage(message)) out.write(line + "\n");
    }
    if (message.type === "result" && message.isError) exitCode = EXIT.AGENT_FAILURE;
  }
  return exitCode;
}
