/** Environment variables read by the library and the CLI. */
export const AGENTWIRE_ENV = {
  CLI_PATH: "AGENTWIRE_CLI_PATH",
  LOG_LEVEL: "AGENTWIRE_LOG_LEVEL",
  LOG_FORMAT: "AGENTWIRE_LOG_FORMAT",
} as const;

export function getEnv(key: keyof typeof AGENTWIRE_ENV, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[AGENTWIRE_ENV[key]];
  return value ? value : undefined;
}
