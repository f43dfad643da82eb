import { spawn } from "node:child_process";
import { existsSync } from "node:fs";
import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { DEFAULT_ENTRYPOINT, ENTRYPOINT_ENV, STDERR_RING_SIZE, TERMINATE_TIMEOUT_MS } from "../shared/constants.js";
import { CliConnectionError, CliNotFoundError, ProcessError, errorMessage } from "../shared/errors.js";
import { componentLogger } from "../shared/logging.js";
import { RingBuffer } from "../shared/ring-buffer.js";
import type { AgentOptions } from "../types.js";
import { buildCliArgs, findCli } from "./command.js";
import { JsonStreamFramer } from "./framer.js";
import { Transport } from "./types.js";

/** The slice of `ChildProcess` the transport relies on. */
export interface AgentProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "spawn", listener: () => void): unknown;
  once(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export interface SpawnRequest {
  command: string;
  args: string[];
  cwd?: string;
  env: NodeJS.ProcessEnv;
}

export type SpawnProcess = (request: SpawnRequest) => AgentProcess;

const spawnChild: SpawnProcess = ({ command, args, cwd, env }) => spawn(command, args, { cwd, env });

export interface SubprocessTransportOptions {
  /** A string runs one `--print` turn; null keeps stdin open for streamed input. */
  prompt: string | null;
  options?: AgentOptions;
  /** Replaces `child_process.spawn`; tests pass a fake process here. */
  spawnProcess?: SpawnProcess;
}

/** Runs the agent CLI as a child process and frames its stdout. */
export class SubprocessTransport extends Transport {
  private readonly prompt: string | null;
  private readonly options: AgentOptions;
  private readonly spawnProcess: SpawnProcess;
  private readonly stderrLines = new RingBuffer<string>(STDERR_RING_SIZE);
  private readonly logger = componentLogger("transport");

  private process: AgentProcess | null = null;
  private stderrReader: Interface | null = null;
  private exited: Promise<number | null> | null = null;
  private exitCode: number | null | undefined = undefined;
  private ready = false;
  private closing: Promise<void> | null = null;

  constructor({ prompt, options = {}, spawnProcess = spawnChild }: SubprocessTransportOptions) {
    super();
    this.prompt = prompt;
    this.options = options;
    this.spawnProcess = spawnProcess;
  }

  async connect(): Promise<void> {
    if (this.process) return;
    const cliPath = findCli(this.options.cliPath);
    const { cwd } = this.options;
    if (cwd && !existsSync(cwd)) {
      throw new CliConnectionError(`Working directory does not exist: ${cwd}`);
    }
    const args = buildCliArgs(this.options, this.prompt);
    const env: NodeJS.ProcessEnv = {
      ...process.env,
      ...this.options.env,
      [ENTRYPOINT_ENV]: this.options.entrypoint ?? DEFAULT_ENTRYPOINT,
    };
    this.logger.debug({ cliPath, args }, "Spawning agent process");

    let proc: AgentProcess;
    try {
      proc = this.spawnProcess({ command: cliPath, args, cwd, env });
    } catch (err) {
      throw spawnFailure(err, cliPath);
    }
    this.exited = new Promise((resolve) => {
      proc.once("close", (code, signal) => {
        this.exitCode = code;
        this.ready = false;
        this.logger.debug({ code, signal }, "Agent process exited");
        resolve(code);
      });
    });
    await new Promise<void>((resolve, reject) => {
      proc.once("spawn", () => resolve());
      proc.on("error", (err) => {
        reject(spawnFailure(err, cliPath));
        this.logger.debug({ err: err.message }, "Agent process error");
      });
    });

    this.process = proc;
    proc.stdin.on("error", (err) => this.logger.debug({ err: err.message }, "stdin error"));
    proc.stdout.setEncoding("utf8");
    this.stderrReader = createInterface({ input: proc.stderr, crlfDelay: Infinity });
    this.stderrReader.on("line", (line) => this.onStderrLine(line));

    if (this.prompt !== null) {
      proc.stdin.end();
    }
    this.ready = true;
  }

  private onStderrLine(line: string): void {
    this.stderrLines.push(line);
    this.logger.debug({ line }, "agent stderr");
    if (!this.options.stderr) return;
    try {
      this.options.stderr(line);
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, "stderr callback threw");
    }
  }

  /** Last captured stderr lines, oldest first. */
  get stderrOutput(): string {
    return this.stderrLines.toArray().join("\n");
  }

  async write(data: string): Promise<void> {
    const proc = this.process;
    if (!proc || !this.ready) {
      throw new CliConnectionError("Transport is not ready for writing");
    }
    if (proc.stdin.writableEnded) {
      throw new CliConnectionError("Cannot write: stdin is closed");
    }
    await new Promise<void>((resolve, reject) => {
      proc.stdin.write(data, (err) => {
        if (err) reject(new CliConnectionError(`Failed to write to process stdin: ${err.message}`, { cause: err }));
        else resolve();
      });
    });
  }

  async endInput(): Promise<void> {
    const proc = this.process;
    if (!proc || proc.stdin.writableEnded) return;
    await new Promise<void>((resolve) => proc.stdin.end(resolve));
  }

  async *readMessages(): AsyncGenerator<Record<string, unknown>> {
    const proc = this.process;
    if (!proc || !this.exited) {
      throw new CliConnectionError("Not connected");
    }
    const framer = new JsonStreamFramer(this.options.maxBufferSize);
    for await (const chunk of proc.stdout) {
      for (const message of framer.push(String(chunk))) {
        yield message;
      }
    }

    const code = await this.exited;
    if (this.closing) return;
    if (code !== null && code !== 0) {
      throw new ProcessError(`Command failed with exit code ${code}`, code, this.stderrOutput);
    }
  }

  isReady(): boolean {
    return this.ready;
  }

  close(): Promise<void> {
    this.closing ??= this.terminate();
    return this.closing;
  }

  private async terminate(): Promise<void> {
    this.ready = false;
    const proc = this.process;
    if (!proc || !this.exited) return;
    this.stderrReader?.close();
    if (!proc.stdin.writableEnded) proc.stdin.end();
    if (this.exitCode !== undefined) return;

    proc.kill("SIGTERM");
    const escalate = setTimeout(() => {
      this.logger.debug("Agent ignored SIGTERM, sending SIGKILL");
      proc.kill("SIGKILL");
    }, TERMINATE_TIMEOUT_MS);
    try {
      await this.exited;
    } finally {
      clearTimeout(escalate);
    }
  }
}

function spawnFailure(err: unknown, cliPath: string): Error {
  if (err instanceof Error && "code" in err && err.code === "ENOENT") {
    return new CliNotFoundError(`Claude Code not found at: ${cliPath}`, cliPath);
  }
  return new CliConnectionError(`Failed to start Claude Code: ${errorMessage(err)}`, { cause: err });
}
