import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { MessageQueue } from "../../src/session/message-queue.js";
import { Transport } from "../../src/transport/types.js";
import type { JsonObject } from "../../src/types.js";

/** In-memory transport: tests push agent records and inspect what the host wrote. */
export class FakeTransport extends Transport {
  readonly inbound = new MessageQueue<JsonObject>();
  /** Raw bytes written, in order. */
  raw = "";
  connected = false;
  inputEnded = false;
  closeCount = 0;
  /** Split each write in two with a pause between halves. */
  slowWrites = false;
  /** Delay before each write lands. */
  writeDelayMs = 0;
  /** Called with every parsed outbound record. */
  onWrite: ((record: JsonObject) => void) | null = null;

  async connect(): Promise<void> {
    this.connected = true;
  }

  async write(data: string): Promise<void> {
    if (this.writeDelayMs > 0) {
      await new Promise((r) => setTimeout(r, this.writeDelayMs));
    }
    if (this.slowWrites) {
      const mid = Math.floor(data.length / 2);
      this.raw += data.slice(0, mid);
      await new Promise((r) => setTimeout(r, 1));
      this.raw += data.slice(mid);
    } else {
      this.raw += data;
    }
    for (const line of data.split("\n")) {
      if (line) this.onWrite?.(JSON.parse(line));
    }
  }

  async *readMessages(): AsyncGenerator<JsonObject> {
    while (true) {
      const entry = await this.inbound.take();
      if (entry.kind === "end") return;
      if (entry.kind === "error") throw entry.error;
      yield entry.value;
    }
  }

  async endInput(): Promise<void> {
    this.inputEnded = true;
  }

  async close(): Promise<void> {
    this.closeCount += 1;
    this.inbound.end();
  }

  isReady(): boolean {
    return this.connected && this.closeCount === 0;
  }

  /** Simulates the agent writing one record. */
  push(record: JsonObject): void {
    this.inbound.push(record);
  }

  /** Outbound records parsed from everything written so far. */
  get written(): JsonObject[] {
    return this.raw
      .split("\n")
      .filter(Boolean)
      .map((line) => JSON.parse(line));
  }

  /** Outbound control requests, in write order. */
  controlRequests(): { request_id: string; request: JsonObject }[] {
    return this.written.flatMap((r) =>
      r.type === "control_request" && typeof r.request_id === "string" && isObject(r.request)
        ? [{ request_id: r.request_id, request: r.request }]
        : []
    );
  }

  /** The response payload written for an agent-issued request id. */
  responseFor(requestId: string): JsonObject | undefined {
    for (const r of this.written) {
      if (r.type === "control_response" && isObject(r.response) && r.response.request_id === requestId) {
        return r.response;
      }
    }
    return undefined;
  }
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Fake child process with piped streams; emits "spawn" on the next tick. */
export class FakeProcess extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: NodeJS.Signals[] = [];
  stdinText = "";
  private exited = false;

  constructor(spawnError?: Error) {
    super();
    this.stdin.on("data", (chunk: Buffer | string) => {
      this.stdinText += typeof chunk === "string" ? chunk : chunk.toString("utf8");
    });
    setImmediate(() => {
      if (spawnError) this.emit("error", spawnError);
      else this.emit("spawn");
    });
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    this.exit(null, signal);
    return true;
  }

  /** Ends both output pipes and reports the exit status. */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) return;
    this.exited = true;
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit("close", code, signal));
  }
}

/** Lets queued promise callbacks and I/O callbacks run. */
export function tick(): Promise<void> {
  return new Promise((r) => setImmediate(r));
}

export async function waitFor(predicate: () => boolean, attempts = 200): Promise<void> {
  for (let i = 0; i < attempts; i++) {
    if (predicate()) return;
    await tick();
  }
  throw new Error("condition not met");
}

export function resultRecord(overrides: JsonObject = {}): JsonObject {
  return {
    type: "result",
    subtype: "success",
    duration_ms: 1200,
    duration_api_ms: 900,
    is_error: false,
    num_turns: 1,
    session_id: "session-1",
    total_cost_usd: 0.0123,
    result: "done",
    ...overrides,
  };
}

export function assistantRecord(text: string): JsonObject {
  return {
    type: "assistant",
    message: { role: "assistant", model: "test-model", content: [{ type: "text", text }] },
    parent_tool_use_id: null,
  };
}
