import { Command, Option } from "commander";
import { EXIT, exit } from "../shared/errors.js";
import { LOG_FORMATS, LOG_LEVELS } from "../shared/logging.js";
import { PERMISSION_MODES } from "../types.js";
import { runDoctor } from "./commands/doctor.js";
import { runPrompt, type RunOptions } from "./commands/run.js";
import { getPackageJsonVersion, parsePositiveInt } from "./utils.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("agentwire")
    .description("Drive a Claude Code agent from the command line over its stdio control protocol")
    .version(getPackageJsonVersion())
    // subcommands inherit this, so it must come before them
    .exitOverride((err) => {
      if (err.exitCode === 0) exit(EXIT.SUCCESS);
      exit(EXIT.INVALID_ARGS);
    });

  program
    .command("run")
    .description("Send one prompt and print the conversation")
    .argument("<prompt>", "Prompt text")
    .option("--json", "Print every decoded message as one JSON line")
    .option("--cli-path <path>", "Agent executable (default: claude on PATH)")
    .option("--model <model>", "Model name or alias")
    .addOption(new Option("--permission-mode <mode>", "Tool permission mode").choices(PERMISSION_MODES))
    .option("--system-prompt <text>", "Replace the system prompt")
    .option("--max-turns <n>", "Stop after this many turns", parsePositiveInt)
    .option("--cwd <dir>", "Working directory for the agent")
    .option("--data-dir <path>", "Directory holding config.json", "~/.agentwire")
    .option("-v, --verbose", "Verbose logging")
    .addOption(new Option("--log-level <level>", "Log level").choices(LOG_LEVELS))
    .addOption(new Option("--log-format <format>", "Log format").choices(LOG_FORMATS))
    .action(async (prompt: string, opts: RunOptions) => {
      exit(await runPrompt(prompt, opts));
    });

  program
    .command("doctor")
    .description("Check that the agent CLI can be found")
    .option("--cli-path <path>", "Agent executable to check")
    .option("--data-dir <path>", "Directory holding config.json", "~/.agentwire")
    .action(async (opts: { cliPath?: string; dataDir?: string }) => {
      exit(await runDoctor(opts));
    });

  return program;
}
