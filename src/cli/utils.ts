import { readFileSync } from "node:fs";
import { InvalidArgumentError } from "commander";
import { VERSION } from "../shared/constants.js";

export function getPackageJsonVersion(): string {
  try {
    const raw = readFileSync(new URL("../../package.json", import.meta.url), "utf8");
    const pkg = JSON.parse(raw) as { version?: string };
    return pkg?.version ?? VERSION;
  } catch {
    return VERSION;
  }
}

/** commander argument parser for positive integers. */
export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}
