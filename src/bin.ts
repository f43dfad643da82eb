#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { errorMessage, exit, exitCodeFor } from "./shared/errors.js";
import { getLogger } from "./shared/logging.js";

async function main() {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  getLogger().error(errorMessage(error));
  exit(exitCodeFor(error));
});
