import chalk from "chalk";
import { getConfigPath, getDataDir, readConfig } from "../../config.js";
import { EXIT, CliNotFoundError } from "../../shared/errors.js";
import { findCli } from "../../transport/command.js";
import { getPackageJsonVersion } from "../utils.js";

export interface DoctorOptions {
  cliPath?: string;
  dataDir?: string;
}

const RULE = "───────────────────────────────────────────────────────────────\n";

/** Prints environment checks. Returns a non-zero exit code when the agent CLI is missing. */
export async function runDoctor(
  opts: DoctorOptions,
  out: NodeJS.WritableStream = process.stderr,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const dataDir = getDataDir(opts.dataDir);
  const config = await readConfig(dataDir);

  out.write(chalk.bold("agentwire doctor") + "\n");
  out.write(RULE);
  out.write(`Version:     v${getPackageJsonVersion()}\n`);
  out.write(`Node.js:     ${process.version}\n`);
  out.write(`Config:      ${getConfigPath(dataDir)}\n`);

  let code: number = EXIT.SUCCESS;
  try {
    out.write(`Agent CLI:   ${chalk.green(findCli(opts.cliPath ?? config.cliPath, env))}\n`);
  } catch (err) {
    if (!(err instanceof CliNotFoundError)) throw err;
    out.write(`Agent CLI:   ${chalk.red("not found")}\n\n${err.message}\n`);
    code = EXIT.GENERIC_ERROR;
  }
  out.write(RULE);
  return code;
}
