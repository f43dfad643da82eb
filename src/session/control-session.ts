import { type } from "arktype";
import type { SdkMcpServer } from "../mcp/server.js";
import { controlError, controlRequest, isJsonObject, serializeLine } from "../protocols/control/codec.js";
import {
  ControlCancelRecordSchema,
  ControlRequestRecordSchema,
  ControlResponseRecordSchema,
  type HostControlRequest,
} from "../protocols/control/types.js";
import { CLOSE_GRACE_MS, CONTROL_REQUEST_TIMEOUT_MS } from "../shared/constants.js";
import { CliConnectionError, ControlResponseError, ControlTimeoutError, UsageError, errorMessage } from "../shared/errors.js";
import { createCallbackIdGenerator, createRequestIdGenerator } from "../shared/ids.js";
import { componentLogger } from "../shared/logging.js";
import { WriteLock } from "../shared/write-lock.js";
import type { Transport } from "../transport/types.js";
import type { CanUseTool, HookCallback, HookConfig, JsonObject, McpServerConfig, PermissionMode } from "../types.js";
import { CallbackDispatcher } from "./dispatch.js";
import { registerHooks } from "./hooks.js";
import { MessageQueue } from "./message-queue.js";

export interface ControlSessionOptions {
  transport: Transport;
  /** Streaming sessions keep stdin open and may exchange control requests. */
  streaming: boolean;
  canUseTool?: CanUseTool;
  hooks?: HookConfig;
  mcpServers?: Record<string, McpServerConfig>;
  requestTimeoutMs?: number;
  closeGraceMs?: number;
}

export type SessionState = "created" | "started" | "initialized" | "closed";

interface PendingRequest {
  subtype: string;
  resolve: (response: JsonObject) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Multiplexes one agent connection: correlates host-issued control requests with
 * their responses, runs callbacks for agent-issued requests, and queues every
 * conversation message for the consumer.
 */
export class ControlSession {
  readonly streaming: boolean;
  private readonly transport: Transport;
  private readonly canUseTool?: CanUseTool;
  private readonly hooks?: HookConfig;
  private readonly sdkServers = new Map<string, SdkMcpServer>();
  private readonly requestTimeoutMs: number;
  private readonly closeGraceMs: number;

  private readonly pending = new Map<string, PendingRequest>();
  private readonly inflight = new Map<string, AbortController>();
  private readonly tasks = new Set<Promise<void>>();
  private readonly queue = new MessageQueue<JsonObject>();
  private readonly writeLock = new WriteLock();
  private readonly nextRequestId = createRequestIdGenerator();
  private readonly nextCallbackId = createCallbackIdGenerator();
  private readonly dispatcher: CallbackDispatcher;
  private readonly stopReading = new AbortController();
  private readonly logger = componentLogger("control-session");

  private hookCallbacks = new Map<string, HookCallback>();
  private state: SessionState = "created";
  private readLoop: Promise<void> | null = null;
  private closing: Promise<void> | null = null;
  private initResponse: JsonObject | null = null;
  private readonly firstResult: Promise<void>;
  private markFirstResult: () => void = () => undefined;

  constructor(options: ControlSessionOptions) {
    this.transport = options.transport;
    this.streaming = options.streaming;
    this.canUseTool = options.canUseTool;
    this.hooks = options.hooks;
    this.requestTimeoutMs = options.requestTimeoutMs ?? CONTROL_REQUEST_TIMEOUT_MS;
    this.closeGraceMs = options.closeGraceMs ?? CLOSE_GRACE_MS;
    for (const [name, config] of Object.entries(options.mcpServers ?? {})) {
      if (config.type === "sdk") this.sdkServers.set(name, config.instance);
    }
    this.firstResult = new Promise((resolve) => {
      this.markFirstResult = resolve;
    });
    this.dispatcher = new CallbackDispatcher({
      canUseTool: this.canUseTool,
      hookCallback: (id) => this.hookCallbacks.get(id),
      mcpServers: this.sdkServers,
    });
  }

  get lifecycle(): SessionState {
    return this.state;
  }

  /** Starts the background read loop. Later calls do nothing. */
  start(): void {
    if (this.readLoop || this.state === "closed") return;
    this.state = "started";
    this.readLoop = this.runReadLoop();
  }

  /**
   * Registers hook callbacks with the agent. Returns the agent's capabilities, or
   * null for a one-shot session where there is nothing to negotiate.
   */
  async initialize(): Promise<JsonObject | null> {
    if (!this.streaming) return null;
    if (this.initResponse) return this.initResponse;
    const { wire, callbacks } = registerHooks(this.hooks, this.nextCallbackId);
    this.hookCallbacks = callbacks;
    const response = await this.sendControlRequest({ subtype: "initialize", hooks: wire });
    this.initResponse = response;
    if (this.state !== "closed") this.state = "initialized";
    return response;
  }

  getServerInfo(): JsonObject | null {
    return this.initResponse;
  }

  async interrupt(): Promise<void> {
    await this.sendControlRequest({ subtype: "interrupt" });
  }

  async setPermissionMode(mode: PermissionMode): Promise<void> {
    await this.sendControlRequest({ subtype: "set_permission_mode", mode });
  }

  async setModel(model?: string): Promise<void> {
    await this.sendControlRequest({ subtype: "set_model", model: model ?? null });
  }

  async sendControlRequest(request: HostControlRequest): Promise<JsonObject> {
    if (!this.streaming) {
      throw new UsageError("Control requests require streaming mode");
    }
    if (this.state === "closed") {
      throw new CliConnectionError("Session closed");
    }
    const requestId = this.nextRequestId();
    const response = new Promise<JsonObject>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new ControlTimeoutError(request.subtype, this.requestTimeoutMs));
      }, this.requestTimeoutMs);
      this.pending.set(requestId, { subtype: request.subtype, resolve, reject, timer });
    });
    // close or a timeout can reject while the write below is still queued
    response.catch(() => undefined);

    try {
      await this.writeLine(controlRequest(requestId, request));
    } catch (err) {
      const entry = this.pending.get(requestId);
      if (entry) {
        clearTimeout(entry.timer);
        this.pending.delete(requestId);
      }
      throw err;
    }
    return response;
  }

  /** Writes one conversation record (typically a user message). */
  async sendMessage(record: JsonObject): Promise<void> {
    if (this.state === "closed") {
      throw new CliConnectionError("Session closed");
    }
    await this.writeLine(record);
  }

  /**
   * Writes every input record. With callbacks registered, stdin stays open until
   * the first result arrives so the agent can still send control requests.
   */
  async streamInput(input: AsyncIterable<JsonObject> | Iterable<JsonObject>): Promise<void> {
    const iterator = toAsyncIterator(input);
    const stopped = this.whenStopped();
    try {
      while (true) {
        const next = await Promise.race([iterator.next(), stopped]);
        if (next === "stopped") {
          iterator.return?.().catch((err: unknown) => this.logger.debug({ err: errorMessage(err) }, "Input cleanup failed"));
          return;
        }
        if (next.done) break;
        await this.writeLine(next.value);
      }
      if (this.hasCallbacks()) {
        const outcome = await Promise.race([this.firstResult.then(() => "result" as const), stopped]);
        if (outcome === "stopped") return;
      }
      await this.transport.endInput();
    } catch (err) {
      this.logger.debug({ err: errorMessage(err) }, "Error streaming input");
    }
  }

  /** Resolves once close() has begun. */
  private whenStopped(): Promise<"stopped"> {
    const { signal } = this.stopReading;
    if (signal.aborted) return Promise.resolve("stopped");
    return new Promise((resolve) => {
      signal.addEventListener("abort", () => resolve("stopped"), { once: true });
    });
  }

  private hasCallbacks(): boolean {
    return this.canUseTool !== undefined || this.hookCallbacks.size > 0 || this.sdkServers.size > 0;
  }

  /** Conversation messages in arrival order. Ends with the stream; rethrows a read failure once. */
  async *receiveMessages(): AsyncGenerator<JsonObject> {
    while (true) {
      const entry = await this.queue.take();
      if (entry.kind === "end") return;
      if (entry.kind === "error") throw entry.error;
      yield entry.value;
    }
  }

  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.state = "closed";
    this.stopReading.abort();
    if (this.readLoop) await this.readLoop;
    await this.drainDispatch();
    this.rejectPending(new CliConnectionError("Session closed"));
    this.queue.end();
    await this.transport.close();
  }

  private async drainDispatch(): Promise<void> {
    if (this.tasks.size === 0) return;
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<"expired">((resolve) => {
      timer = setTimeout(() => resolve("expired"), this.closeGraceMs);
    });
    const drained = Promise.allSettled([...this.tasks]).then(() => "drained" as const);
    const outcome = await Promise.race([drained, expired]);
    clearTimeout(timer);
    if (outcome === "expired") {
      this.logger.debug({ remaining: this.inflight.size }, "Cancelling callbacks still running at close");
      for (const controller of this.inflight.values()) controller.abort();
    }
  }

  private rejectPending(err: Error): void {
    for (const [id, entry] of this.pending) {
      clearTimeout(entry.timer);
      this.pending.delete(id);
      entry.reject(err);
    }
  }

  private writeLine(obj: unknown): Promise<void> {
    const line = serializeLine(obj);
    return this.writeLock.run(() => this.transport.write(line));
  }

  // ── Read loop ──────────────────────────────────────────────────────

  private async runReadLoop(): Promise<void> {
    const stopped = this.whenStopped();
    const iterator = this.transport.readMessages()[Symbol.asyncIterator]();
    try {
      while (true) {
        const next = await Promise.race([iterator.next(), stopped]);
        if (next === "stopped") {
          iterator.return?.().catch((err: unknown) => this.logger.debug({ err: errorMessage(err) }, "Reader cleanup failed"));
          break;
        }
        if (next.done) break;
        this.route(next.value);
      }
    } catch (err) {
      if (this.state !== "closed") {
        this.logger.error({ err: errorMessage(err) }, "Fatal error reading from agent");
        this.queue.fail(err instanceof Error ? err : new Error(String(err)));
      }
    } finally {
      this.rejectPending(
        this.state === "closed"
          ? new CliConnectionError("Session closed")
          : new CliConnectionError("Agent process ended before responding")
      );
      this.markFirstResult();
      this.queue.end();
    }
  }

  private route(message: JsonObject): void {
    switch (message.type) {
      case "control_response":
        this.resolvePending(message);
        return;
      case "control_request":
        this.startDispatch(message);
        return;
      case "control_cancel_request":
        this.cancelDispatch(message);
        return;
      case "keep_alive":
        return;
      default:
        if (message.type === "result") this.markFirstResult();
        this.queue.push(message);
    }
  }

  private resolvePending(message: JsonObject): void {
    const record = ControlResponseRecordSchema(message);
    if (record instanceof type.errors) {
      this.logger.debug({ err: record.summary }, "Dropping malformed control response");
      return;
    }
    const { request_id: requestId, subtype, error, response } = record.response;
    const entry = this.pending.get(requestId);
    if (!entry) {
      this.logger.debug({ requestId }, "Dropping control response for unknown request");
      return;
    }
    clearTimeout(entry.timer);
    this.pending.delete(requestId);
    if (subtype === "error") {
      entry.reject(new ControlResponseError(error ?? "Unknown error", requestId));
    } else {
      entry.resolve(isJsonObject(response) ? response : {});
    }
  }

  private startDispatch(message: JsonObject): void {
    const record = ControlRequestRecordSchema(message);
    if (record instanceof type.errors || !isJsonObject(message.request)) {
      this.rejectMalformed(message, record instanceof type.errors ? record.summary : "request must be an object");
      return;
    }
    const requestId = record.request_id;
    const controller = new AbortController();
    this.inflight.set(requestId, controller);
    this.logger.debug({ requestId, subtype: record.request.subtype }, "Dispatching control request");

    this.track(
      requestId,
      this.dispatcher
        .dispatch({ requestId, subtype: record.request.subtype, payload: message.request }, controller.signal)
        .then((line) => this.writeLine(line))
        .finally(() => this.inflight.delete(requestId))
    );
  }

  /** Answers a request the session cannot decode; without an id there is no one to answer. */
  private rejectMalformed(message: JsonObject, reason: string): void {
    const requestId = message.request_id;
    if (typeof requestId !== "string") {
      this.logger.debug({ err: reason }, "Dropping control request without request_id");
      return;
    }
    this.logger.debug({ requestId, err: reason }, "Rejecting malformed control request");
    this.track(requestId, this.writeLine(controlError(requestId, `Invalid control request: ${reason}`)));
  }

  private track(requestId: string, work: Promise<void>): void {
    const task: Promise<void> = work
      .catch((err: unknown) => {
        this.logger.warn({ requestId, err: errorMessage(err) }, "Failed to send control response");
      })
      .finally(() => {
        this.tasks.delete(task);
      });
    this.tasks.add(task);
  }

  private cancelDispatch(message: JsonObject): void {
    const record = ControlCancelRecordSchema(message);
    if (record instanceof type.errors) return;
    this.inflight.get(record.request_id)?.abort();
  }
}

function toAsyncIterator<T>(input: AsyncIterable<T> | Iterable<T>): AsyncIterator<T> {
  if (Symbol.asyncIterator in input) return input[Symbol.asyncIterator]();
  return (async function* () {
    yield* input;
  })();
}
