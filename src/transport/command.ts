import { accessSync, constants as fsConstants, statSync } from "node:fs";
import { homedir } from "node:os";
import { delimiter, join } from "node:path";
import { DEFAULT_CLI_COMMAND } from "../shared/constants.js";
import { getEnv } from "../shared/env.js";
import { CliNotFoundError } from "../shared/errors.js";
import type { AgentOptions, McpServerConfig } from "../types.js";

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Looks `command` up on PATH like `which`. */
export function which(command: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const dirs = (env.PATH ?? "").split(delimiter).filter(Boolean);
  const exts = process.platform === "win32" ? (env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";") : [""];
  for (const dir of dirs) {
    for (const ext of exts) {
      const candidate = join(dir, command + ext);
      if (isExecutableFile(candidate)) return candidate;
    }
  }
  return null;
}

export function fallbackCliLocations(home = homedir()): string[] {
  return [
    join(home, ".npm-global/bin", DEFAULT_CLI_COMMAND),
    join("/usr/local/bin", DEFAULT_CLI_COMMAND),
    join(home, ".local/bin", DEFAULT_CLI_COMMAND),
    join(home, "node_modules/.bin", DEFAULT_CLI_COMMAND),
    join(home, ".yarn/bin", DEFAULT_CLI_COMMAND),
  ];
}

export const CLI_NOT_FOUND_HINT =
  "Claude Code not found. Install with:\n" +
  "  npm install -g @anthropic-ai/claude-code\n" +
  "\nIf already installed locally, try:\n" +
  '  export PATH="$HOME/node_modules/.bin:$PATH"\n' +
  "\nOr pass cliPath in the options, or set AGENTWIRE_CLI_PATH.";

/**
 * Resolves the agent executable: explicit option, AGENTWIRE_CLI_PATH, PATH, then
 * the usual global install directories.
 */
export function findCli(cliPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (cliPath) return cliPath;
  const fromEnv = getEnv("CLI_PATH", env);
  if (fromEnv) return fromEnv;
  const onPath = which(DEFAULT_CLI_COMMAND, env);
  if (onPath) return onPath;
  for (const candidate of fallbackCliLocations()) {
    if (isExecutableFile(candidate)) return candidate;
  }
  if (!which("node", env)) {
    throw new CliNotFoundError(
      "Claude Code requires Node.js, which is not installed.\n\n" +
        "Install Node.js from: https://nodejs.org/\n" +
        "\nAfter installing Node.js, install Claude Code:\n" +
        "  npm install -g @anthropic-ai/claude-code"
    );
  }
  throw new CliNotFoundError(CLI_NOT_FOUND_HINT);
}

/** The `--mcp-config` payload; in-process servers are announced by name only. */
export function mcpConfigArg(servers: Record<string, McpServerConfig>): string {
  const entries: Record<string, unknown> = {};
  for (const [key, config] of Object.entries(servers)) {
    entries[key] = config.type === "sdk" ? { type: "sdk", name: config.name } : config;
  }
  return JSON.stringify({ mcpServers: entries });
}

/** Argument vector (without the executable) for one agent run. */
export function buildCliArgs(options: AgentOptions, prompt: string | null): string[] {
  const args = ["--output-format", "stream-json", "--verbose"];

  if (options.systemPrompt) args.push("--system-prompt", options.systemPrompt);
  if (options.appendSystemPrompt) args.push("--append-system-prompt", options.appendSystemPrompt);
  if (options.allowedTools?.length) args.push("--allowedTools", options.allowedTools.join(","));
  if (options.maxTurns) args.push("--max-turns", String(options.maxTurns));
  if (options.disallowedTools?.length) args.push("--disallowedTools", options.disallowedTools.join(","));
  if (options.model) args.push("--model", options.model);

  const promptTool = options.permissionPromptToolName ?? (options.canUseTool ? "stdio" : undefined);
  if (promptTool) args.push("--permission-prompt-tool", promptTool);

  if (options.permissionMode) args.push("--permission-mode", options.permissionMode);
  if (options.continueConversation) args.push("--continue");
  if (options.resume) args.push("--resume", options.resume);
  if (options.settings) args.push("--settings", options.settings);
  for (const dir of options.addDirs ?? []) args.push("--add-dir", dir);
  if (options.mcpServers && Object.keys(options.mcpServers).length > 0) {
    args.push("--mcp-config", mcpConfigArg(options.mcpServers));
  }

  for (const [flag, value] of Object.entries(options.extraArgs ?? {})) {
    if (value === null) args.push(`--${flag}`);
    else args.push(`--${flag}`, value);
  }

  if (prompt === null) args.push("--input-format", "stream-json");
  else args.push("--print", prompt);

  return args;
}
