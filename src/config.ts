import { readFile } from "node:fs/promises";
import path from "node:path";
import { homedir } from "node:os";
import { type } from "arktype";
import { errorMessage } from "./shared/errors.js";
import { getLogger } from "./shared/logging.js";

const CONFIG_FILENAME = "config.json";

export function getDataDir(custom?: string): string {
  if (custom) return path.resolve(custom.replace(/^~(?=$|\/)/, homedir()));
  return path.join(homedir(), ".agentwire");
}

export function getConfigPath(dataDir: string): string {
  return path.join(dataDir, CONFIG_FILENAME);
}

/** CLI defaults as stored on disk. Command-line flags take precedence. */
export const CliConfigSchema = type({
  "cliPath?": "string",
  "model?": "string",
  "permissionMode?": "'default' | 'acceptEdits' | 'plan' | 'bypassPermissions'",
  "log?": {
    "level?": "'error' | 'warn' | 'info' | 'debug' | 'trace'",
  },
});

export type CliConfig = typeof CliConfigSchema.infer;

export async function readConfig(dataDir: string): Promise<CliConfig> {
  const configPath = getConfigPath(dataDir);
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
      getLogger().warn(`Ignoring ${configPath}: ${errorMessage(err)}`);
    }
    return {};
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    getLogger().warn(`Ignoring ${configPath}: ${errorMessage(err)}`);
    return {};
  }
  const config = CliConfigSchema(data);
  if (config instanceof type.errors) {
    getLogger().warn(`Ignoring ${configPath}: ${config.summary}`);
    return {};
  }
  return config;
}
